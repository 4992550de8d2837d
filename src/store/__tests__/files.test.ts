/**
 * Tests for config document reading.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigFileError } from '../../core/errors.js';
import { parseDocument, readDocument, safeReadFile } from '../files.js';

describe('config documents', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stratum-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a missing file', async () => {
    expect(await safeReadFile(join(dir, 'missing.yaml'))).toBeNull();
    expect(await readDocument(join(dir, 'missing.yaml'))).toBeNull();
  });

  it('parses by extension', async () => {
    await writeFile(join(dir, 'a.json'), '{"output": {"limit": 3}}');
    await writeFile(join(dir, 'a.yml'), 'output:\n  limit: 4\n');
    expect(await readDocument(join(dir, 'a.json'))).toEqual({ data: { output: { limit: 3 } } });
    expect(await readDocument(join(dir, 'a.yml'))).toEqual({ data: { output: { limit: 4 } } });
  });

  it('reads an empty YAML file as null data', async () => {
    await writeFile(join(dir, 'empty.yaml'), '');
    expect(await readDocument(join(dir, 'empty.yaml'))).toEqual({ data: null });
  });

  it('reports the path of a broken document', () => {
    expect(() => parseDocument('/etc/x.json', '{')).toThrow(ConfigFileError);
    expect(() => parseDocument('/etc/x.json', '{')).toThrow('Invalid JSON in: /etc/x.json');
    expect(() => parseDocument('/etc/x.yaml', 'a: [')).toThrow('Invalid YAML in: /etc/x.yaml');
  });
});
