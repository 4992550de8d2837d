/**
 * Tests for the CLI source chain: precedence across defaults, config files,
 * environment and flags, plus terminal-driven table color.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createOutputLayer } from '../../core/layers/output.js';
import { createTypeRegistry } from '../../core/parameters/registry.js';
import { resolveParameters } from '../../core/resolution/engine.js';
import { SourceChain } from '../../core/sources/chain.js';
import { buildSources, standardLayers } from '../run.js';

const registry = createTypeRegistry();
const layers = [createOutputLayer(registry), ...standardLayers(registry)];

describe('buildSources', () => {
  let home: string;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'stratum-run-'));
    vi.stubEnv('STRATUM_HOME', join(home, 'global'));
    vi.stubEnv('STRATUM_DIR', join(home, 'project'));
    await mkdir(join(home, 'global'), { recursive: true });
    await mkdir(join(home, 'project'), { recursive: true });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(home, { recursive: true, force: true });
  });

  const resolve = (cli: Parameters<typeof buildSources>[0], env: Record<string, string> = {}, tty = false) =>
    resolveParameters(layers, new SourceChain(buildSources(cli, env, tty)));

  it('applies global config, project config, env and flags in that order', async () => {
    await writeFile(join(home, 'global', 'config.yaml'), 'output:\n  output: yaml\n  limit: 5\n  offset: 1\n');
    await writeFile(join(home, 'project', 'config.yaml'), 'output:\n  output: csv\n  limit: 7\n');

    const parsed = await resolve({ output: { limit: '9' } }, { STRATUM_OUTPUT: 'json' });
    const output = parsed.require('output');
    expect(output.value('output')).toBe('json');
    expect(output.source('output')).toBe('env');
    expect(output.value('limit')).toBe(9);
    expect(output.get('limit')?.history.map(c => c.source)).toEqual(['config', 'config', 'cli']);
    expect(output.value('offset')).toBe(1);
    expect(output.source('offset')).toBe('config');
  });

  it('loads an explicit config file last among config files', async () => {
    await writeFile(join(home, 'project', 'config.yaml'), 'output:\n  output: csv\n');
    const extra = join(home, 'extra.json');
    await writeFile(extra, JSON.stringify({ output: { output: 'jsonl' } }));

    const parsed = await resolve({ 'command-settings': { 'config-file': extra } });
    expect(parsed.require('output').value('output')).toBe('jsonl');
  });

  it('takes the explicit config file from the environment', async () => {
    const extra = join(home, 'extra.yaml');
    await writeFile(extra, 'logging:\n  log-level: debug\n');

    const parsed = await resolve({}, { STRATUM_CONFIG_FILE: extra });
    expect(parsed.require('logging').value('log-level')).toBe('debug');
  });

  it('fails when the explicit config file is missing', async () => {
    await expect(resolve({ 'command-settings': { 'config-file': join(home, 'nope.yaml') } })).rejects.toThrow(
      'Required config file not found',
    );
  });

  it('colors tables only on a terminal unless set explicitly', async () => {
    expect((await resolve({}, {}, true)).require('output').value('color')).toBe(true);
    expect((await resolve({}, {}, false)).require('output').value('color')).toBe(false);
    expect((await resolve({}, { NO_COLOR: '1' }, true)).require('output').value('color')).toBe(false);
    expect((await resolve({ output: { color: 'false' } }, {}, true)).require('output').value('color')).toBe(false);
    expect((await resolve({}, { STRATUM_COLOR: 'true' }, false)).require('output').value('color')).toBe(true);
  });
});
