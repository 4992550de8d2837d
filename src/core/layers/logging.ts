/**
 * The logging layer lets logging be configured like any other parameters:
 * config file, STRATUM_LOG_LEVEL, or --log-level.
 */

import { z } from 'zod';
import { LOG_LEVELS, type LoggingConfig } from '../../types/config.js';
import { DEFAULT_LOGGING } from '../config.js';
import { createLayerBinding, projectLayer, type LayerBinding } from '../parameters/binding.js';
import { createLayer, type ParameterLayer } from '../parameters/layer.js';
import type { ParameterTypeRegistry } from '../parameters/registry.js';
import type { ParsedLayers } from '../resolution/parsed-layers.js';

export const LOGGING_LAYER = 'logging';

export function createLoggingLayer(registry: ParameterTypeRegistry): ParameterLayer {
  const layer = createLayer(registry, {
    slug: LOGGING_LAYER,
    name: 'Logging',
    parameters: [
      { name: 'log-level', type: 'choice', choices: LOG_LEVELS, default: DEFAULT_LOGGING.level, help: 'Log level' },
      { name: 'log-file', type: 'string', help: 'Write logs to a rotating file instead of stderr' },
    ],
  });
  getLoggingBinding(layer);
  return layer;
}

const LoggingSettingsSchema = z.object({
  level: z.enum(LOG_LEVELS).default(DEFAULT_LOGGING.level),
  filePath: z.string().optional(),
});

type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;

const bindings = new WeakMap<ParameterLayer, LayerBinding<LoggingSettings>>();

export function getLoggingBinding(layer: ParameterLayer): LayerBinding<LoggingSettings> {
  let binding = bindings.get(layer);
  if (!binding) {
    binding = createLayerBinding(layer, LoggingSettingsSchema, { level: 'log-level', filePath: 'log-file' });
    bindings.set(layer, binding);
  }
  return binding;
}

/** Logging configuration from resolved layers; defaults when the layer is absent. */
export function getLoggingConfig(parsed: ParsedLayers): LoggingConfig {
  const layer = parsed.get(LOGGING_LAYER);
  if (!layer) return { ...DEFAULT_LOGGING };
  return { ...DEFAULT_LOGGING, ...projectLayer(layer, getLoggingBinding(layer.layer)) };
}
