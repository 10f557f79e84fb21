import type { FileReader } from '../../domain/ports/FileReader.js';
import { UnresolvableFiletypeError } from '../../domain/errors/RowstreamError.js';
import { CsvReader } from './CsvReader.js';
import { JsonReader } from './JsonReader.js';
import { TextReader } from './TextReader.js';

/** Maps filetypes to readers. `csv`, `tsv`, `json` and `text` (also `txt`) are registered by default. */
export class FileReaderRegistry {
  private readonly readers = new Map<string, FileReader>();

  constructor() {
    this.register('csv', new CsvReader());
    this.register('tsv', new CsvReader({ delimiter: '\t' }));
    this.register('json', new JsonReader());
    this.register('text', new TextReader());
    this.register('txt', new TextReader());
  }

  register(filetype: string, reader: FileReader): this {
    this.readers.set(filetype.toLowerCase(), reader);
    return this;
  }

  has(filetype: string): boolean {
    return this.readers.has(filetype.toLowerCase());
  }

  /** @throws UnresolvableFiletypeError if no reader is registered for the filetype. */
  get(filetype: string): FileReader {
    const reader = this.readers.get(filetype.toLowerCase());
    if (!reader) {
      throw new UnresolvableFiletypeError(
        `No reader registered for filetype '${filetype}'. Registered: ${[...this.readers.keys()].join(', ')}`,
        { filetype },
      );
    }
    return reader;
  }
}
