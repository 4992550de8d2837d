/**
 * Tests for the logging layer.
 */

import { describe, it, expect } from 'vitest';
import { createTypeRegistry } from '../../parameters/registry.js';
import { resolveParameters } from '../../resolution/engine.js';
import { SourceChain } from '../../sources/chain.js';
import { cliSource, defaultsSource } from '../../sources/providers.js';
import { createLoggingLayer, getLoggingBinding, getLoggingConfig } from '../logging.js';

const logging = createLoggingLayer(createTypeRegistry());

describe('logging layer', () => {
  it('falls back to the default config when the layer is absent', async () => {
    const parsed = await resolveParameters([], new SourceChain([defaultsSource()]));
    expect(getLoggingConfig(parsed)).toEqual({ level: 'warn', maxFileSize: 10 * 1024 * 1024, maxFiles: 5 });
  });

  it('reads level and file from resolved parameters', async () => {
    const parsed = await resolveParameters(
      [logging],
      new SourceChain([defaultsSource(), cliSource({ logging: { 'log-level': 'debug', 'log-file': '/tmp/stratum.log' } })]),
    );
    expect(getLoggingConfig(parsed)).toEqual({
      level: 'debug',
      filePath: '/tmp/stratum.log',
      maxFileSize: 10 * 1024 * 1024,
      maxFiles: 5,
    });
  });

  it('reuses the binding made with the layer', () => {
    expect(getLoggingBinding(logging)).toBe(getLoggingBinding(logging));
  });
});
