/**
 * Configuration-file source.
 *
 * Files are JSON or YAML documents keyed by layer slug, then parameter name:
 *
 *   output:
 *     output: json
 *     limit: 20
 *
 * Several files apply in order, so a project file overrides a global one.
 * A missing file contributes nothing unless it was marked required.
 */

import { z } from 'zod';
import { ConfigFileError } from '../errors.js';
import { getLogger } from '../logger.js';
import { readDocument } from '../../store/files.js';
import type { ConfigFileLocation } from '../../types/config.js';
import type { LayerValues, SourceProvider } from './providers.js';

const ConfigDocumentSchema = z.record(z.string(), z.record(z.string(), z.unknown()).nullable());

/** A config file path, or a location carrying its own required flag. */
export type ConfigFileInput = string | ConfigFileLocation;

function isList(files: ConfigFileInput | readonly ConfigFileInput[]): files is readonly ConfigFileInput[] {
  return Array.isArray(files);
}

/**
 * Load one config document.
 * Returns null when the file does not exist and is not required.
 */
export async function loadConfigDocument(path: string, required = false): Promise<LayerValues | null> {
  const doc = await readDocument(path);
  if (doc === null) {
    if (required) {
      throw new ConfigFileError(path, `Required config file not found: ${path}`);
    }
    return null;
  }
  // An empty YAML document is an empty config.
  if (doc.data === null || doc.data === undefined) return {};

  const parsed = ConfigDocumentSchema.safeParse(doc.data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at "${issue.path.join('.')}"` : '';
    throw new ConfigFileError(
      path,
      `Config file ${path} must map layer slugs to parameter maps${where}`,
    );
  }

  const values: Record<string, Record<string, unknown>> = {};
  for (const [slug, params] of Object.entries(parsed.data)) {
    values[slug] = params ?? {};
  }
  return values;
}

/**
 * Contributes values from one or more config files, applied in order.
 * Unknown layers and parameters are ignored (and logged at debug).
 */
export function configFileSource(
  files: ConfigFileInput | readonly ConfigFileInput[],
  options: { required?: boolean } = {},
): SourceProvider {
  const locations = (isList(files) ? files : [files]).map(
    (f: ConfigFileInput): { path: string; required: boolean } =>
      typeof f === 'string' ? { path: f, required: options.required ?? false } : f,
  );
  const log = getLogger('sources');

  return {
    source: 'config',
    name: `config:${locations.map(l => l.path).join(',')}`,
    async contribute(layers, writer) {
      const known = new Set(layers.map(l => l.slug));
      for (const location of locations) {
        const values = await loadConfigDocument(location.path, location.required);
        if (values === null) {
          log.debug({ path: location.path }, 'config file not found, skipping');
          continue;
        }
        for (const [slug, params] of Object.entries(values)) {
          if (!known.has(slug)) {
            log.debug({ path: location.path, layer: slug }, 'ignoring unknown layer in config file');
            continue;
          }
          for (const [name, value] of Object.entries(params)) {
            if (!writer.set(slug, name, value)) {
              log.debug({ path: location.path, layer: slug, parameter: name }, 'ignoring unknown parameter in config file');
            }
          }
        }
      }
    },
  };
}
