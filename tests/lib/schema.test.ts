import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadSchema, validateWithSchema } from '@/lib/schema.js';
import { CONFIG_SCHEMA_PATH } from '@/lib/config.js';

interface Point {
  x: number;
}

const pointSchema = {
  $id: 'test://point',
  type: 'object',
  required: ['x'],
  properties: { x: { type: 'integer' } },
};

function isPoint(value: unknown): value is Point {
  return typeof value === 'object' && value !== null && 'x' in value && typeof value.x === 'number';
}

describe('validateWithSchema', () => {
  it('returns typed data for a valid document', () => {
    const result = validateWithSchema({ x: 1 }, pointSchema, isPoint);
    expect(result).toEqual({ valid: true, data: { x: 1 }, errors: [] });
  });

  it('lists every error with a dotted path', () => {
    const result = validateWithSchema({ x: 'one' }, pointSchema, isPoint);
    expect(result).toEqual({ valid: false, data: null, errors: ['x: must be integer'] });
  });

  it('reports root errors', () => {
    const result = validateWithSchema({}, pointSchema, isPoint);
    expect(result.errors).toEqual(["(root): must have required property 'x'"]);
  });
});

describe('loadSchema', () => {
  it('loads the bundled config schema', async () => {
    const schema = await loadSchema(CONFIG_SCHEMA_PATH);
    expect(schema).toMatchObject({ title: 'trudger configuration' });
  });

  it('fails for a missing file', async () => {
    const missing = join(tmpdir(), 'trudger-no-such-schema.json');
    await expect(loadSchema(missing)).rejects.toThrow(`Failed to load schema from ${missing}`);
  });
});
