/**
 * Append-only transition log.
 *
 * Each record becomes exactly one line in the sink:
 * `<timestamp> <message> key=value ...`, with control characters in every
 * value escaped. Commands and arguments are written verbatim; redaction is
 * applied only to notification payloads (see notify.ts).
 */

import { appendFileSync } from 'node:fs';
import type {
  Transition,
  TransitionFields,
  TransitionListener,
  TransitionOrigin,
} from '../types/transition.js';

/**
 * Escapes newline, carriage return and tab as two-character sequences so a
 * value can never span lines.
 */
export function escapeLogValue(value: string): string {
  return value.replace(/\n/g, '\\n').replace(/\r/g, '\\r').replace(/\t/g, '\\t');
}

/**
 * Formats a Date as `YYYY-MM-DDTHH:MM:SSZ`.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Renders the message and fields of a transition (without timestamp).
 */
export function renderTransition(message: string, fields: Readonly<TransitionFields>): string {
  const parts = [escapeLogValue(message)];
  for (const [key, value] of Object.entries(fields)) {
    parts.push(`${key}=${escapeLogValue(String(value))}`);
  }
  return parts.join(' ');
}

/**
 * Options for creating a TransitionLog.
 */
export interface TransitionLogOptions {
  /** Sink path; null or empty disables file output */
  path?: string | null;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Records transitions to an optional file sink and forwards loop-origin
 * transitions to subscribers.
 */
export class TransitionLog {
  private readonly path: string | null;
  private readonly now: () => Date;
  private readonly listeners: TransitionListener[] = [];
  private disabled = false;

  constructor(options: TransitionLogOptions = {}) {
    this.path = options.path ? options.path : null;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Registers a listener for loop-origin transitions.
   */
  subscribe(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  /**
   * Records one transition.
   *
   * Runs even without a sink so that subscribers still see every event.
   * Transitions with origin `notification` are written but never forwarded.
   */
  async record(
    message: string,
    fields: TransitionFields = {},
    origin: TransitionOrigin = 'loop'
  ): Promise<Transition> {
    const transition: Transition = Object.freeze({
      timestamp: formatTimestamp(this.now()),
      message,
      fields: Object.freeze({ ...fields }),
      origin,
    });

    this.write(transition);

    if (origin === 'loop') {
      for (const listener of this.listeners) {
        await listener(transition);
      }
    }
    return transition;
  }

  private write(transition: Transition): void {
    if (this.path === null || this.disabled) {
      return;
    }
    const line = `${transition.timestamp} ${renderTransition(transition.message, transition.fields)}\n`;
    try {
      appendFileSync(this.path, line, 'utf-8');
    } catch (error) {
      // Surface once, keep running without the sink.
      this.disabled = true;
      console.warn(
        `Warning: transition logging disabled log_path=${this.path} io_error=${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }
}
