/**
 * echo: a writer command; prints a message a number of times.
 */

import { defineWriterCommand } from '../../core/commands/define.js';
import type { WriterCommand } from '../../core/commands/types.js';
import { createLayer } from '../../core/parameters/layer.js';
import type { ParameterTypeRegistry } from '../../core/parameters/registry.js';
import { standardLayers } from '../run.js';

export function createEchoCommand(registry: ParameterTypeRegistry): WriterCommand {
  const layer = createLayer(registry, {
    slug: 'echo',
    name: 'Echo',
    parameters: [
      { name: 'message', type: 'string', required: true, shortFlag: 'm', help: 'Text to print' },
      { name: 'times', type: 'int', min: 1, default: 1, help: 'How many times' },
    ],
  });

  return defineWriterCommand({
    name: 'echo',
    description: 'Print a message',
    layers: [layer, ...standardLayers(registry)],
    async run(parsed, out) {
      const echo = parsed.require('echo');
      const message = echo.getString('message') ?? '';
      const times = echo.getNumber('times') ?? 1;
      for (let i = 0; i < times; i++) {
        await out.write(message + '\n');
      }
    },
  });
}
