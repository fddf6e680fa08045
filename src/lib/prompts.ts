/**
 * Agent prompt loading.
 */

import { readFile, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { AgentPrompts } from '../types/run.js';

/**
 * Error thrown when a prompt file is missing or unreadable.
 */
export class PromptError extends Error {
  constructor(
    message: string,
    public readonly promptPath: string
  ) {
    super(message);
    this.name = 'PromptError';
  }
}

export interface PromptPaths {
  solve: string;
  review: string;
}

/**
 * Default locations under `~/.codex/prompts`.
 */
export function defaultPromptPaths(home: string = homedir()): PromptPaths {
  const dir = join(home, '.codex', 'prompts');
  return { solve: join(dir, 'trudge.md'), review: join(dir, 'trudge_review.md') };
}

/**
 * Strips a leading `---` front-matter block and the final newline.
 *
 * @example
 * ```typescript
 * stripFrontMatter('---\nname: x\n---\nHello\nWorld\n'); // 'Hello\nWorld'
 * ```
 */
export function stripFrontMatter(content: string): string {
  const lines = content.split('\n').map((line) => line.replace(/\r$/, ''));
  if (content.endsWith('\n')) {
    lines.pop();
  }

  const kept: string[] = [];
  let inFrontMatter = false;
  lines.forEach((line, index) => {
    if (index === 0 && line === '---') {
      inFrontMatter = true;
      return;
    }
    if (inFrontMatter) {
      if (line === '---') {
        inFrontMatter = false;
      }
      return;
    }
    kept.push(line);
  });
  return kept.join('\n');
}

async function renderPrompt(path: string): Promise<string> {
  const info = await stat(path).catch(() => null);
  if (!info || !info.isFile()) {
    throw new PromptError(`Missing prompt file: ${path}`, path);
  }
  try {
    return stripFrontMatter(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new PromptError(
      `Failed to read prompt ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
}

/**
 * Loads both agent prompts.
 *
 * @throws {PromptError} If either file is missing or unreadable
 */
export async function loadPrompts(paths: PromptPaths = defaultPromptPaths()): Promise<AgentPrompts> {
  return {
    solve: await renderPrompt(paths.solve),
    review: await renderPrompt(paths.review),
  };
}
