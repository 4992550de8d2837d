/**
 * Tests for the config-file source.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigFileError } from '../../errors.js';
import { createLayer } from '../../parameters/layer.js';
import { createTypeRegistry } from '../../parameters/registry.js';
import { SourceChain } from '../chain.js';
import { configFileSource, loadConfigDocument } from '../config-file.js';
import { cliSource } from '../providers.js';

const registry = createTypeRegistry();
const output = createLayer(registry, {
  slug: 'output',
  name: 'Output',
  parameters: [
    { name: 'format', type: 'string', default: 'table' },
    { name: 'limit', type: 'int' },
  ],
});

describe('configFileSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'stratum-config-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads YAML files keyed by layer and parameter', async () => {
    const path = join(tempDir, 'config.yaml');
    await writeFile(path, 'output:\n  format: json\n  limit: 20\n');
    const store = await new SourceChain([configFileSource(path)]).run([output]);
    expect(store.current('output', 'format')).toEqual({ source: 'config', value: 'json' });
    expect(store.current('output', 'limit')).toEqual({ source: 'config', value: 20 });
  });

  it('reads JSON files by extension', async () => {
    const path = join(tempDir, 'config.json');
    await writeFile(path, JSON.stringify({ output: { format: 'csv' } }));
    const store = await new SourceChain([configFileSource(path)]).run([output]);
    expect(store.current('output', 'format')?.value).toBe('csv');
  });

  it('applies several files in order', async () => {
    const global = join(tempDir, 'global.yaml');
    const project = join(tempDir, 'project.yaml');
    await writeFile(global, 'output:\n  format: json\n  limit: 5\n');
    await writeFile(project, 'output:\n  format: yaml\n');
    const store = await new SourceChain([configFileSource([global, project])]).run([output]);
    expect(store.current('output', 'format')?.value).toBe('yaml');
    expect(store.current('output', 'limit')?.value).toBe(5);
  });

  it('loses to CLI values', async () => {
    const path = join(tempDir, 'config.yaml');
    await writeFile(path, 'output:\n  format: json\n');
    const store = await new SourceChain([cliSource({ output: { format: 'csv' } }), configFileSource(path)]).run([output]);
    expect(store.current('output', 'format')).toEqual({ source: 'cli', value: 'csv' });
  });

  it('skips a missing optional file and ignores unknown keys', async () => {
    const path = join(tempDir, 'config.yaml');
    await writeFile(path, 'output:\n  colour: true\nunknown:\n  x: 1\n');
    const store = await new SourceChain([
      configFileSource([join(tempDir, 'missing.yaml'), path]),
    ]).run([output]);
    expect(store.count()).toBe(0);
  });

  it('fails for a missing required file', async () => {
    const missing = join(tempDir, 'missing.yaml');
    await expect(
      new SourceChain([configFileSource(missing, { required: true })]).run([output]),
    ).rejects.toThrow(ConfigFileError);
  });

  it('fails for unparsable or mis-shaped documents', async () => {
    const broken = join(tempDir, 'broken.json');
    await writeFile(broken, '{ not json');
    await expect(loadConfigDocument(broken)).rejects.toThrow(`Invalid JSON in: ${broken}`);

    const shaped = join(tempDir, 'shaped.yaml');
    await writeFile(shaped, 'output: 3\n');
    await expect(loadConfigDocument(shaped)).rejects.toThrow(ConfigFileError);
  });

  it('treats an empty YAML document as empty config', async () => {
    const empty = join(tempDir, 'empty.yaml');
    await writeFile(empty, '');
    await expect(loadConfigDocument(empty)).resolves.toEqual({});
  });

  it('treats a layer without parameters as empty', async () => {
    const path = join(tempDir, 'config.yaml');
    await writeFile(path, 'output:\n');
    await expect(loadConfigDocument(path)).resolves.toEqual({ output: {} });
  });
});
