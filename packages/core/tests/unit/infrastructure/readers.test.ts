import { describe, it, expect } from 'vitest';
import { CsvReader } from '../../../src/infrastructure/readers/CsvReader.js';
import { JsonReader } from '../../../src/infrastructure/readers/JsonReader.js';
import { TextReader } from '../../../src/infrastructure/readers/TextReader.js';
import { FileReaderRegistry } from '../../../src/infrastructure/readers/FileReaderRegistry.js';
import { UnresolvableFiletypeError } from '../../../src/domain/errors/RowstreamError.js';

describe('CsvReader', () => {
  it('should read rows keyed by the header', () => {
    const rows = [...new CsvReader().parse('instruction,score\nSay hi,3\nSay bye,4\n')];

    expect(rows).toEqual([
      { instruction: 'Say hi', score: 3 },
      { instruction: 'Say bye', score: 4 },
    ]);
  });

  it('should keep values as strings without dynamic typing', () => {
    const rows = [...new CsvReader({ dynamicTyping: false }).parse('id,flag\n7,true\n')];

    expect(rows).toEqual([{ id: '7', flag: 'true' }]);
  });

  it('should honour quoted fields', () => {
    const rows = [...new CsvReader().parse('text\n"hello, world"\n')];

    expect(rows).toEqual([{ text: 'hello, world' }]);
  });

  it('should read tab-separated values with an explicit delimiter', () => {
    const rows = [...new CsvReader({ delimiter: '\t' }).parse('a\tb\nx\ty\n')];

    expect(rows).toEqual([{ a: 'x', b: 'y' }]);
  });

  it('should report the header columns', () => {
    expect(new CsvReader().header('a,b\n')).toEqual(['a', 'b']);
    expect(new CsvReader({ delimiter: '\t' }).header('x\ty\n1\t2\n')).toEqual(['x', 'y']);
  });

  it('should report no header for empty content', () => {
    expect(new CsvReader().header('')).toEqual([]);
  });

  it('should skip empty lines', () => {
    const rows = [...new CsvReader().parse('a\nx\n\ny\n')];

    expect(rows).toEqual([{ a: 'x' }, { a: 'y' }]);
  });
});

describe('JsonReader', () => {
  it('should read a JSON array of objects', () => {
    expect([...new JsonReader().parse('[{"a":1},{"a":2}]')]).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('should read JSON Lines and keep nested values', () => {
    const content = '{"messages":[{"role":"user","content":"hi"}]}\n\n{"messages":[]}\n';

    expect([...new JsonReader().parse(content)]).toEqual([
      { messages: [{ role: 'user', content: 'hi' }] },
      { messages: [] },
    ]);
  });

  it('should read nothing from empty content', () => {
    expect([...new JsonReader().parse('  \n')]).toEqual([]);
  });

  it('should reject an array item that is not an object', () => {
    expect(() => [...new JsonReader().parse('[1]')]).toThrow(
      'JsonReader: each item in the array must be a plain object',
    );
  });

  it('should reject a line that is not an object', () => {
    expect(() => [...new JsonReader({ format: 'lines' }).parse('{"a":1}\n"text"\n')]).toThrow(
      'JsonReader: line 2 must be a plain object',
    );
  });

  it('should reject a top-level object in array format', () => {
    expect(() => [...new JsonReader({ format: 'array' }).parse('{"a":1}')]).toThrow(
      'JsonReader: expected a JSON array of objects',
    );
  });
});

describe('TextReader', () => {
  it('should yield one row per line', () => {
    expect([...new TextReader().parse('first\nsecond\n')]).toEqual([{ text: 'first' }, { text: 'second' }]);
  });

  it('should keep blank lines and handle CRLF', () => {
    expect([...new TextReader().parse('a\r\n\r\nb')]).toEqual([{ text: 'a' }, { text: '' }, { text: 'b' }]);
  });

  it('should read nothing from empty content', () => {
    expect([...new TextReader().parse('')]).toEqual([]);
  });
});

describe('FileReaderRegistry', () => {
  it('should register the built-in filetypes', () => {
    const registry = new FileReaderRegistry();

    for (const filetype of ['csv', 'tsv', 'json', 'text', 'txt']) {
      expect(registry.has(filetype)).toBe(true);
    }
  });

  it('should read tsv with a tab delimiter', () => {
    const rows = [...new FileReaderRegistry().get('tsv').parse('a\tb\n1\t2\n')];

    expect(rows).toEqual([{ a: 1, b: 2 }]);
  });

  it('should look filetypes up case-insensitively', () => {
    expect(new FileReaderRegistry().get('JSON')).toBeInstanceOf(JsonReader);
  });

  it('should accept custom readers', () => {
    const registry = new FileReaderRegistry().register('lines', new TextReader());

    expect([...registry.get('lines').parse('x')]).toEqual([{ text: 'x' }]);
  });

  it('should fail for an unknown filetype', () => {
    expect(() => new FileReaderRegistry().get('parquet')).toThrow(UnresolvableFiletypeError);
    expect(() => new FileReaderRegistry().get('parquet')).toThrow(
      "No reader registered for filetype 'parquet'. Registered: csv, tsv, json, text, txt",
    );
  });
});
