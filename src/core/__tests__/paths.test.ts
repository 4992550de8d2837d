/**
 * Tests for path resolution and the config file cascade.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import {
  getStratumHome,
  getProjectDir,
  getGlobalConfigPath,
  getProjectConfigPath,
} from '../paths.js';
import { getConfigFileLocations } from '../config.js';

describe('getStratumHome', () => {
  const origEnv = process.env['STRATUM_HOME'];

  afterEach(() => {
    if (origEnv !== undefined) {
      process.env['STRATUM_HOME'] = origEnv;
    } else {
      delete process.env['STRATUM_HOME'];
    }
  });

  it('defaults to ~/.stratum', () => {
    delete process.env['STRATUM_HOME'];
    expect(getStratumHome()).toBe(join(homedir(), '.stratum'));
    expect(getGlobalConfigPath()).toBe(join(homedir(), '.stratum', 'config.yaml'));
  });

  it('respects STRATUM_HOME env var', () => {
    process.env['STRATUM_HOME'] = '/custom/stratum';
    expect(getStratumHome()).toBe('/custom/stratum');
  });
});

describe('getProjectDir', () => {
  const origEnv = process.env['STRATUM_DIR'];

  afterEach(() => {
    if (origEnv !== undefined) {
      process.env['STRATUM_DIR'] = origEnv;
    } else {
      delete process.env['STRATUM_DIR'];
    }
  });

  it('defaults to .stratum under the working directory', () => {
    delete process.env['STRATUM_DIR'];
    expect(getProjectDir('/work')).toBe(resolve('/work', '.stratum'));
    expect(getProjectConfigPath('/work')).toBe(join(resolve('/work', '.stratum'), 'config.yaml'));
  });

  it('resolves a relative STRATUM_DIR against the working directory', () => {
    process.env['STRATUM_DIR'] = 'conf';
    expect(getProjectDir('/work')).toBe(resolve('/work', 'conf'));
  });
});

describe('getConfigFileLocations', () => {
  it('lists global then project, both optional', () => {
    const locations = getConfigFileLocations(undefined, '/work');
    expect(locations.map(l => l.scope)).toEqual(['global', 'project']);
    expect(locations.every(l => !l.required)).toBe(true);
  });

  it('appends a required explicit file last', () => {
    const locations = getConfigFileLocations('/tmp/extra.yaml', '/work');
    expect(locations[2]).toEqual({ scope: 'explicit', path: '/tmp/extra.yaml', required: true });
  });
});
