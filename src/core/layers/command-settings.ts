/**
 * Settings about the invocation itself rather than the command's work.
 */

import { createLayer, type ParameterLayer } from '../parameters/layer.js';
import type { ParameterTypeRegistry } from '../parameters/registry.js';
import type { ParsedLayers } from '../resolution/parsed-layers.js';

export const COMMAND_SETTINGS_LAYER = 'command-settings';

export function createCommandSettingsLayer(registry: ParameterTypeRegistry): ParameterLayer {
  return createLayer(registry, {
    slug: COMMAND_SETTINGS_LAYER,
    name: 'Command settings',
    parameters: [
      { name: 'config-file', type: 'string', help: 'Additional config file, applied after global and project config' },
      { name: 'print-parameters', type: 'bool', help: 'Print resolved parameters and their sources instead of running' },
    ],
  });
}

export function shouldPrintParameters(parsed: ParsedLayers): boolean {
  return parsed.get(COMMAND_SETTINGS_LAYER)?.getBoolean('print-parameters') ?? false;
}
