import { stringify } from 'yaml';
import type { Row } from '../row.js';
import type { OutputDestination } from '../destination.js';
import { BufferedSink, type RowSink } from './types.js';

/** Pretty-printed JSON array of every row. */
export class JsonSink extends BufferedSink {
  readonly format = 'json';

  protected render(rows: readonly Row[]): string {
    if (rows.length === 0) return '[]\n';
    return JSON.stringify(rows.map(row => row.toPlainObject()), null, 2) + '\n';
  }
}

/** YAML sequence of every row. */
export class YamlSink extends BufferedSink {
  readonly format = 'yaml';

  protected render(rows: readonly Row[]): string {
    return stringify(rows.map(row => row.toPlainObject()));
  }
}

/** One compact JSON object per line, written as rows arrive. */
export class JsonlSink implements RowSink {
  readonly format = 'jsonl';
  readonly buffering = 'streaming';

  constructor(private readonly destination: OutputDestination) {}

  async write(row: Row): Promise<void> {
    await this.destination.write(JSON.stringify(row.toPlainObject()) + '\n');
  }

  async close(): Promise<void> {
    await this.destination.end();
  }

  discard(): void {}
}
