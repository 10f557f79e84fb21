import type { Row } from '../model/Row.js';

/** Port for turning the text content of one data file into rows. */
export interface FileReader {
  parse(content: string): Iterable<Row>;
  /** Column names declared by the file itself, such as a CSV header row. Rows may add more. */
  header?(content: string): readonly string[];
}
