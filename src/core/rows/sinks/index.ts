/**
 * Sink factory.
 */

import { ParameterDefinitionError } from '../../errors.js';
import type { OutputDestination } from '../destination.js';
import { CsvSink } from './csv.js';
import { JsonlSink, JsonSink, YamlSink } from './json.js';
import { TableSink, type TableStyle } from './table.js';
import { TemplateSink } from './template.js';
import type { RowSink, SinkFormat } from './types.js';

export interface SinkOptions {
  columns?: readonly string[];
  tableStyle?: TableStyle;
  maxColumnWidth?: number;
  color?: boolean;
  csvSeparator?: string;
  withHeaders?: boolean;
  flatten?: boolean;
  flattenSeparator?: string;
  template?: string;
  templateSeparator?: string;
}

export function createSink(format: SinkFormat, destination: OutputDestination, options: SinkOptions = {}): RowSink {
  switch (format) {
    case 'table':
      return new TableSink(destination, {
        style: options.tableStyle,
        maxColumnWidth: options.maxColumnWidth,
        color: options.color,
        columns: options.columns,
      });
    case 'json':
      return new JsonSink(destination);
    case 'jsonl':
      return new JsonlSink(destination);
    case 'yaml':
      return new YamlSink(destination);
    case 'csv':
    case 'tsv':
      return new CsvSink(
        destination,
        {
          separator: options.csvSeparator,
          withHeaders: options.withHeaders,
          flatten: options.flatten,
          flattenSeparator: options.flattenSeparator,
          columns: options.columns,
        },
        format,
      );
    case 'template':
      if (options.template === undefined) {
        throw new ParameterDefinitionError('Template output needs a template');
      }
      return new TemplateSink(destination, { template: options.template, separator: options.templateSeparator });
  }
}

export { SINK_FORMATS, BufferedSink, type RowSink, type SinkFormat } from './types.js';
export { TABLE_STYLES, TableSink, type TableStyle } from './table.js';
export { CsvSink } from './csv.js';
export { JsonSink, JsonlSink, YamlSink } from './json.js';
export { TemplateSink, renderTemplate } from './template.js';
