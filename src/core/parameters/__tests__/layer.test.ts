/**
 * Tests for parameter definitions, layers and layer bindings.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ParameterDefinitionError } from '../../errors.js';
import { createLayerBinding } from '../binding.js';
import { assertDistinctLayers, createLayer } from '../layer.js';
import { createTypeRegistry } from '../registry.js';
import type { ParameterDefinitionInput } from '../../../types/parameters.js';

const registry = createTypeRegistry();

describe('defineParameter (through createLayer)', () => {
  const layerWith = (parameter: ParameterDefinitionInput) =>
    createLayer(registry, { slug: 'test', name: 'Test', parameters: [parameter] });

  it('rejects a required parameter with a default', () => {
    expect(() => layerWith({ name: 'host', type: 'string', required: true, default: 'x' })).toThrow(
      'Parameter "host" in layer "test": a required parameter cannot declare a default',
    );
  });

  it('rejects choice kinds without choices', () => {
    expect(() => layerWith({ name: 'mode', type: 'choice' })).toThrow(ParameterDefinitionError);
    expect(() => layerWith({ name: 'modes', type: 'choice-list', choices: [] })).toThrow(
      'type "choice-list" needs a non-empty choices list',
    );
  });

  it('rejects defaults that do not parse or validate', () => {
    expect(() => layerWith({ name: 'port', type: 'int', default: 'abc' })).toThrow(
      'default does not parse as integer: expected an integer',
    );
    expect(() => layerWith({ name: 'port', type: 'int', min: 5, default: 1 })).toThrow(
      'default is invalid: 1 is less than the minimum 5',
    );
    expect(() => layerWith({ name: 'mode', type: 'choice', choices: ['a'], default: 'b' })).toThrow(
      'default is invalid',
    );
  });

  it('does not read file-backed defaults at definition time', () => {
    const layer = layerWith({ name: 'input', type: 'file', default: '/nonexistent/input.txt' });
    expect(layer.get('input')?.default).toBe('/nonexistent/input.txt');
  });

  it('rejects bad names, short flags, bounds and patterns', () => {
    expect(() => layerWith({ name: 'Bad_Name', type: 'string' })).toThrow('name must be kebab-case');
    expect(() => layerWith({ name: 'x', type: 'string', shortFlag: 'xy' })).toThrow('must be a single letter');
    expect(() => layerWith({ name: 'n', type: 'int', min: 10, max: 1 })).toThrow('min 10 is greater than max 1');
    expect(() => layerWith({ name: 's', type: 'string', pattern: '(' })).toThrow('invalid pattern');
  });

  it('carries layer and parameter in the error context', () => {
    try {
      layerWith({ name: 'port', type: 'int', default: 'abc' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParameterDefinitionError);
      if (err instanceof ParameterDefinitionError) {
        expect(err.context).toEqual({ layer: 'test', parameter: 'port' });
      }
    }
  });
});

describe('ParameterLayer', () => {
  it('keeps declaration order and is frozen', () => {
    const layer = createLayer(registry, {
      slug: 'db',
      name: 'Database',
      flagPrefix: 'db-',
      parameters: [
        { name: 'host', type: 'string', default: 'localhost' },
        { name: 'port', type: 'int', default: 5432 },
      ],
    });
    expect(layer.definitions.map(d => d.name)).toEqual(['host', 'port']);
    expect(layer.flagName('host')).toBe('db-host');
    expect(layer.get('port')?.required).toBe(false);
    expect(Object.isFrozen(layer)).toBe(true);
    expect(Object.isFrozen(layer.definitions)).toBe(true);
    expect(Object.isFrozen(layer.get('host'))).toBe(true);
  });

  it('rejects duplicate parameters and short flags', () => {
    expect(() =>
      createLayer(registry, {
        slug: 'dup',
        name: 'Dup',
        parameters: [
          { name: 'a', type: 'string' },
          { name: 'a', type: 'int' },
        ],
      }),
    ).toThrow('Duplicate parameter "a" in layer "dup"');
    expect(() =>
      createLayer(registry, {
        slug: 'dup',
        name: 'Dup',
        parameters: [
          { name: 'a', type: 'string', shortFlag: 'x' },
          { name: 'b', type: 'string', shortFlag: 'x' },
        ],
      }),
    ).toThrow('Short flag -x used twice in layer "dup"');
  });

  it('rejects invalid slugs', () => {
    expect(() => createLayer(registry, { slug: 'My Layer', name: 'x', parameters: [] })).toThrow(
      ParameterDefinitionError,
    );
  });

  it('detects duplicate layer slugs in one command', () => {
    const a = createLayer(registry, { slug: 'same', name: 'A', parameters: [] });
    const b = createLayer(registry, { slug: 'same', name: 'B', parameters: [] });
    expect(() => assertDistinctLayers([a, b])).toThrow('Layer "same" declared twice');
  });
});

describe('createLayerBinding', () => {
  it('rejects fields bound to unknown parameters', () => {
    const layer = createLayer(registry, {
      slug: 'db',
      name: 'Database',
      parameters: [{ name: 'host', type: 'string' }],
    });
    const schema = z.object({ host: z.string(), port: z.number() });
    expect(() => createLayerBinding(layer, schema, { host: 'host', port: 'port' })).toThrow(
      'Field "port" is bound to unknown parameter "port" of layer "db"',
    );
  });
});
