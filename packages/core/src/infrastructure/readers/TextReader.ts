import type { FileReader } from '../../domain/ports/FileReader.js';
import type { Row } from '../../domain/model/Row.js';

/** Plain-text reader: one `{ text }` row per line. Blank lines are kept as empty strings. */
export class TextReader implements FileReader {
  *parse(content: string): Iterable<Row> {
    if (content === '') return;
    const lines = content.split(/\r?\n/);
    // A trailing newline does not start another row.
    if (lines[lines.length - 1] === '') lines.pop();
    for (const text of lines) {
      yield { text };
    }
  }
}
