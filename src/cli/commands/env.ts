/**
 * env: environment variables as rows, sorted by name.
 */

import { defineRowsCommand } from '../../core/commands/define.js';
import type { RowsCommand } from '../../core/commands/types.js';
import { createLayer } from '../../core/parameters/layer.js';
import type { ParameterTypeRegistry } from '../../core/parameters/registry.js';
import { standardLayers } from '../run.js';

export function createEnvCommand(
  registry: ParameterTypeRegistry,
  env: Readonly<Record<string, string | undefined>> = process.env,
): RowsCommand {
  const layer = createLayer(registry, {
    slug: 'env',
    name: 'Environment',
    parameters: [
      { name: 'prefix', type: 'string', help: 'Only variables whose name starts with this prefix' },
    ],
  });

  return defineRowsCommand(
    {
      name: 'env',
      description: 'List environment variables as rows',
      layers: [layer, ...standardLayers(registry)],
      async run(parsed, rows) {
        const prefix = parsed.require('env').getString('prefix') ?? '';
        const names = Object.keys(env).filter(name => name.startsWith(prefix)).sort();
        for (const name of names) {
          if (!(await rows.addRow({ name, value: env[name] ?? '' }))) return;
        }
      },
    },
    registry,
  );
}
