/**
 * Tests for registering layer parameters as Commander options and reading
 * back the flags a user passed.
 */

import { Command } from 'commander';
import { describe, it, expect } from 'vitest';
import { ParameterDefinitionError } from '../../core/errors.js';
import { createLayer } from '../../core/parameters/layer.js';
import { createTypeRegistry } from '../../core/parameters/registry.js';
import { collectCliValues, registerLayerOptions } from '../parameters.js';

const registry = createTypeRegistry();

const db = createLayer(registry, {
  slug: 'db',
  name: 'Database',
  parameters: [
    { name: 'host', type: 'string', shortFlag: 'H', default: 'localhost', help: 'Database host' },
    { name: 'port', type: 'int' },
    { name: 'verbose', type: 'bool' },
    { name: 'tags', type: 'string-list' },
    { name: 'mode', type: 'choice', choices: ['ro', 'rw'], required: true, help: 'Access mode' },
  ],
});

function parse(args: string[]): Command {
  const command = new Command('test').exitOverride();
  registerLayerOptions(command, [db]);
  command.parse(args, { from: 'user' });
  return command;
}

describe('registerLayerOptions', () => {
  it('adds one option per parameter', () => {
    const command = new Command('test');
    registerLayerOptions(command, [db]);
    expect(command.options.map(o => o.flags)).toEqual([
      '-H, --host <value>',
      '--port <value>',
      '--verbose [value]',
      '--tags <value>',
      '--mode <value>',
    ]);
    expect(command.options[0]?.description).toBe('Database host (default: "localhost")');
    expect(command.options[4]?.description).toBe('Access mode (ro|rw) (required)');
  });

  it('uses the layer flag prefix', () => {
    const prefixed = createLayer(registry, {
      slug: 'replica',
      name: 'Replica',
      flagPrefix: 'replica-',
      parameters: [{ name: 'host', type: 'string' }],
    });
    const command = new Command('test').exitOverride();
    registerLayerOptions(command, [db, prefixed]);
    command.parse(['--host', 'a', '--replica-host', 'b'], { from: 'user' });
    expect(collectCliValues(command)).toEqual({ db: { host: 'a' }, replica: { host: 'b' } });
  });

  it('rejects two layers claiming the same flag', () => {
    const other = createLayer(registry, {
      slug: 'cache',
      name: 'Cache',
      parameters: [{ name: 'host', type: 'string' }],
    });
    expect(() => registerLayerOptions(new Command('test'), [db, other])).toThrow(ParameterDefinitionError);
    expect(() => registerLayerOptions(new Command('test'), [db, other])).toThrow(
      'Flag --host of cache.host clashes with db.host',
    );
  });
});

describe('collectCliValues', () => {
  it('returns raw strings for the flags that were passed', () => {
    const command = parse(['-H', 'db.local', '--port', '6000', '--mode', 'rw']);
    expect(collectCliValues(command)).toEqual({ db: { host: 'db.local', port: '6000', mode: 'rw' } });
  });

  it('collects repeated list flags', () => {
    const command = parse(['--tags', 'a', '--tags', 'b,c']);
    expect(collectCliValues(command)).toEqual({ db: { tags: ['a', 'b,c'] } });
  });

  it('reads booleans with and without a value', () => {
    expect(collectCliValues(parse(['--verbose']))).toEqual({ db: { verbose: 'true' } });
    expect(collectCliValues(parse(['--verbose', 'false']))).toEqual({ db: { verbose: 'false' } });
  });

  it('leaves out flags that were not passed', () => {
    expect(collectCliValues(parse([]))).toEqual({});
  });
});
