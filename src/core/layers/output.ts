/**
 * The output layer: everything that shapes row output (format, filtering,
 * columns, ordering, paging), and the factory that turns it into a pipeline.
 */

import { z } from 'zod';
import { ParameterValidationError } from '../errors.js';
import { getLogger } from '../logger.js';
import { createLayerBinding, projectLayer, type LayerBinding } from '../parameters/binding.js';
import { createLayer, type ParameterLayer } from '../parameters/layer.js';
import type { ParameterTypeRegistry } from '../parameters/registry.js';
import type { ParsedLayers } from '../resolution/parsed-layers.js';
import type { OutputDestination } from '../rows/destination.js';
import { checkFilterSyntax } from '../rows/filter-expression.js';
import { RowPipeline } from '../rows/pipeline.js';
import { SINK_FORMATS, TABLE_STYLES, createSink } from '../rows/sinks/index.js';
import {
  checkSortKey,
  columnsStage,
  filterStage,
  limitStage,
  sortStage,
  type RowStage,
} from '../rows/stages.js';

export const OUTPUT_LAYER = 'output';

export function createOutputLayer(registry: ParameterTypeRegistry): ParameterLayer {
  const layer = createLayer(registry, {
    slug: OUTPUT_LAYER,
    name: 'Output',
    description: 'Row output format, selection and ordering',
    parameters: [
      { name: 'output', type: 'choice', shortFlag: 'o', choices: SINK_FORMATS, default: 'table', help: 'Output format' },
      { name: 'table-style', type: 'choice', choices: TABLE_STYLES, default: 'ascii', help: 'Table style' },
      { name: 'max-column-width', type: 'int', min: 0, default: 40, help: 'Truncate table cells (0 = no limit)' },
      { name: 'fields', type: 'string-list', help: 'Fields to output, in order' },
      { name: 'exclude', type: 'string-list', help: 'Fields to leave out' },
      {
        name: 'filter',
        type: 'string',
        help: 'Keep rows matching an expression, e.g. "size > 100 && type == \'file\'"',
        validate: value => (typeof value === 'string' ? checkFilterSyntax(value) : undefined),
      },
      {
        name: 'sort-by',
        type: 'string-list',
        help: 'Sort keys; prefix with - for descending',
        validate: value => {
          if (!Array.isArray(value)) return undefined;
          for (const spec of value) {
            const problem = typeof spec === 'string' ? checkSortKey(spec) : undefined;
            if (problem) return problem;
          }
          return undefined;
        },
      },
      { name: 'limit', type: 'int', min: 0, help: 'Output at most this many rows' },
      { name: 'offset', type: 'int', min: 0, default: 0, help: 'Skip this many rows first' },
      {
        name: 'csv-separator',
        type: 'string',
        help: 'Field separator for csv output',
        validate: value => (typeof value === 'string' && value.length !== 1 ? 'must be a single character' : undefined),
      },
      { name: 'with-headers', type: 'bool', default: true, help: 'Write a header row (csv/tsv)' },
      { name: 'flatten-separator', type: 'string', default: '.', help: 'Joins nested keys in csv columns' },
      { name: 'template', type: 'string', help: 'Row template, e.g. "{{ name }}: {{ size }}"' },
      { name: 'template-file', type: 'string-from-file', help: 'Read the row template from a file' },
      { name: 'color', type: 'bool', help: 'Colorize table headers' },
    ],
  });
  getOutputBinding(layer);
  return layer;
}

const OutputSettingsSchema = z.object({
  format: z.enum(SINK_FORMATS).default('table'),
  tableStyle: z.enum(TABLE_STYLES).default('ascii'),
  maxColumnWidth: z.number().int().min(0).default(40),
  fields: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  filter: z.string().optional(),
  sortBy: z.array(z.string()).default([]),
  limit: z.number().int().min(0).optional(),
  offset: z.number().int().min(0).default(0),
  csvSeparator: z.string().optional(),
  withHeaders: z.boolean().default(true),
  flattenSeparator: z.string().default('.'),
  template: z.string().optional(),
  templateFile: z.string().optional(),
  color: z.boolean().default(false),
});

export type OutputSettings = z.infer<typeof OutputSettingsSchema>;

const OUTPUT_FIELDS = {
  format: 'output',
  tableStyle: 'table-style',
  maxColumnWidth: 'max-column-width',
  fields: 'fields',
  exclude: 'exclude',
  filter: 'filter',
  sortBy: 'sort-by',
  limit: 'limit',
  offset: 'offset',
  csvSeparator: 'csv-separator',
  withHeaders: 'with-headers',
  flattenSeparator: 'flatten-separator',
  template: 'template',
  templateFile: 'template-file',
  color: 'color',
} as const satisfies Record<keyof OutputSettings, string>;

const bindings = new WeakMap<ParameterLayer, LayerBinding<OutputSettings>>();

/** The settings binding of an output layer, created with the layer and reused. */
export function getOutputBinding(layer: ParameterLayer): LayerBinding<OutputSettings> {
  let binding = bindings.get(layer);
  if (!binding) {
    binding = createLayerBinding(layer, OutputSettingsSchema, OUTPUT_FIELDS);
    bindings.set(layer, binding);
  }
  return binding;
}

/** Read the output layer into typed settings. */
export function getOutputSettings(parsed: ParsedLayers): OutputSettings {
  const layer = parsed.require(OUTPUT_LAYER);
  return projectLayer(layer, getOutputBinding(layer.layer));
}

/** Stages in application order: filter, sort, limit, columns. */
export function buildStages(settings: OutputSettings): RowStage[] {
  const stages: RowStage[] = [];
  if (settings.filter !== undefined) stages.push(filterStage(settings.filter));
  if (settings.sortBy.length > 0) stages.push(sortStage(settings.sortBy));
  if (settings.limit !== undefined || settings.offset > 0) {
    stages.push(limitStage({ limit: settings.limit, offset: settings.offset }));
  }
  if (settings.fields.length > 0 || settings.exclude.length > 0) {
    stages.push(columnsStage({ fields: settings.fields, exclude: settings.exclude }));
  }
  return stages;
}

/**
 * Build a row pipeline from resolved layers. The command's output layer
 * decides stages and sink.
 */
export function createPipelineFromLayers(
  parsed: ParsedLayers,
  destination: OutputDestination,
  signal?: AbortSignal,
): RowPipeline {
  const settings = getOutputSettings(parsed);
  const template = settings.template ?? settings.templateFile;
  if (settings.format === 'template' && template === undefined) {
    throw new ParameterValidationError(OUTPUT_LAYER, 'template', 'template output needs --template or --template-file');
  }

  const exclude = new Set(settings.exclude);
  const columns = settings.fields.filter(f => !exclude.has(f));
  const sink = createSink(settings.format, destination, {
    columns,
    tableStyle: settings.tableStyle,
    maxColumnWidth: settings.maxColumnWidth,
    color: settings.color,
    csvSeparator: settings.csvSeparator,
    withHeaders: settings.withHeaders,
    flattenSeparator: settings.flattenSeparator,
    template,
  });

  const pipeline = new RowPipeline({ sink, stages: buildStages(settings), signal });
  if (pipeline.buffering === 'buffered') {
    getLogger('pipeline').debug({ format: settings.format }, 'output is buffered until the command finishes');
  }
  return pipeline;
}
