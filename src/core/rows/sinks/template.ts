/**
 * Template sink: renders each row through a `{{ field }}` template.
 *
 * Placeholders take a field path (`{{ name }}`, `{{ meta.owner }}`) or
 * `{{ @index }}`. Missing fields render empty, lists and maps as compact JSON.
 */

import { ParameterDefinitionError } from '../../errors.js';
import type { OutputDestination } from '../destination.js';
import type { Row } from '../row.js';
import { formatValue } from '../value.js';
import type { RowSink } from './types.js';

const PLACEHOLDER = /\{\{\s*(@index|[A-Za-z0-9_][A-Za-z0-9_.-]*)\s*\}\}/g;

export interface TemplateSinkOptions {
  template: string;
  /** Written between rendered rows. */
  separator?: string;
}

/** Render one row. */
export function renderTemplate(template: string, row: Row, index: number): string {
  return template.replace(PLACEHOLDER, (_match, token: string) =>
    token === '@index' ? String(index) : formatValue(row.lookup(token)),
  );
}

export class TemplateSink implements RowSink {
  readonly format = 'template';
  readonly buffering = 'streaming';
  private readonly template: string;
  private readonly separator: string;
  private written = 0;

  constructor(private readonly destination: OutputDestination, options: TemplateSinkOptions) {
    if (options.template === '') {
      throw new ParameterDefinitionError('Template output needs a non-empty template');
    }
    // A template file's final newline would double the separator.
    this.template = options.template.replace(/\r?\n$/, '');
    this.separator = options.separator ?? '\n';
  }

  async write(row: Row, index: number): Promise<void> {
    const prefix = this.written > 0 ? this.separator : '';
    await this.destination.write(prefix + renderTemplate(this.template, row, index));
    this.written++;
  }

  async close(): Promise<void> {
    if (this.written > 0) await this.destination.write('\n');
    await this.destination.end();
  }

  discard(): void {}
}
