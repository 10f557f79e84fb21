import type { FileReader } from '../../domain/ports/FileReader.js';
import type { Row } from '../../domain/model/Row.js';
import { isRecord } from '../utils/isRecord.js';

export interface JsonReaderOptions {
  /** Parse format: 'array' for a JSON array of objects, 'lines' for JSON Lines. Default: 'auto'. */
  readonly format?: 'array' | 'lines' | 'auto';
}

/** JSON reader supporting a JSON array of objects and JSON Lines, with auto-detection. Nested values are kept. */
export class JsonReader implements FileReader {
  private readonly format: 'array' | 'lines' | 'auto';

  constructor(options?: JsonReaderOptions) {
    this.format = options?.format ?? 'auto';
  }

  *parse(content: string): Iterable<Row> {
    const trimmed = content.trim();
    if (trimmed === '') return;

    const format = this.format === 'auto' ? (trimmed.startsWith('[') ? 'array' : 'lines') : this.format;

    if (format === 'array') {
      yield* this.parseArray(trimmed);
    } else {
      yield* this.parseLines(trimmed);
    }
  }

  private *parseArray(content: string): Iterable<Row> {
    const parsed: unknown = JSON.parse(content);

    if (!Array.isArray(parsed)) {
      throw new Error('JsonReader: expected a JSON array of objects');
    }

    for (const item of parsed) {
      yield this.toRow(item, 'each item in the array must be a plain object');
    }
  }

  private *parseLines(content: string): Iterable<Row> {
    const lines = content.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const line = (lines[i] ?? '').trim();
      if (line === '') continue;
      yield this.toRow(JSON.parse(line), `line ${String(i + 1)} must be a plain object`);
    }
  }

  private toRow(value: unknown, message: string): Row {
    if (!isRecord(value)) {
      throw new Error(`JsonReader: ${message}`);
    }
    return value;
  }
}
