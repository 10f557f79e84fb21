import { posix } from 'node:path';
import type { FileSystem } from '../ports/FileSystem.js';
import type { ErrorDetails } from '../errors/RowstreamError.js';
import { SourceUnavailableError, UnresolvableFiletypeError } from '../errors/RowstreamError.js';

/** How the files under a path map to logical splits. */
export type DataFiles =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'sequence'; readonly files: readonly string[] }
  | { readonly kind: 'grouped'; readonly groups: Readonly<Record<string, readonly string[]>> };

export interface Classification {
  readonly dataFiles: DataFiles;
  /** Filetype inferred from the first file, see `inferFiletype()`. Empty when the file has no extension. */
  readonly filetype: string;
}

/** Split that ungrouped files belong to. */
export const DEFAULT_SPLIT = 'train';

const FILETYPE_SYNONYMS: Readonly<Record<string, string>> = {
  jsonl: 'json',
};

/** Filetype of a path, taken from its extension. `jsonl` is read as `json`. */
export function inferFiletype(path: string): string {
  const extension = posix.extname(path).slice(1).toLowerCase();
  return FILETYPE_SYNONYMS[extension] ?? extension;
}

/**
 * Decide how a path is loaded.
 *
 * - A file is loaded on its own.
 * - The files directly inside a directory form a flat `sequence`.
 * - Files one level down are grouped by the name of the sub-directory that holds them,
 *   which names the split they belong to.
 *
 * A directory holding both yields the sequence. Children are visited in
 * lexicographic order and hidden entries (leading `.`) are ignored.
 *
 * @throws SourceUnavailableError if the path is neither a file nor a directory.
 * @throws UnresolvableFiletypeError if a directory holds no files at either level.
 */
export async function classifyPath(path: string, fileSystem: FileSystem): Promise<Classification> {
  if (await fileSystem.isFile(path)) {
    return { dataFiles: { kind: 'file', path }, filetype: inferFiletype(path) };
  }

  if (!(await fileSystem.isDirectory(path))) {
    throw new SourceUnavailableError(`PathClassifier: '${path}' does not exist or is not a file or directory`, {
      path,
    });
  }

  const sequence: string[] = [];
  const groups: Record<string, string[]> = {};

  for (const child of await listVisible(path, fileSystem)) {
    if (await fileSystem.isFile(child)) {
      sequence.push(child);
    } else if (await fileSystem.isDirectory(child)) {
      const files: string[] = [];
      for (const nested of await listVisible(child, fileSystem)) {
        if (await fileSystem.isFile(nested)) files.push(nested);
      }
      if (files.length > 0) groups[posix.basename(child)] = files;
    }
  }

  const first = sequence[0] ?? Object.values(groups)[0]?.[0];
  if (first === undefined) {
    throw new UnresolvableFiletypeError(`PathClassifier: directory '${path}' contains no files`, { path });
  }

  return {
    dataFiles: sequence.length > 0 ? { kind: 'sequence', files: sequence } : { kind: 'grouped', groups },
    filetype: inferFiletype(first),
  };
}

/**
 * Files that make up one split.
 *
 * A single file or a flat sequence forms the `train` split; grouped files are
 * looked up by split name.
 *
 * @throws SourceUnavailableError if the split does not exist.
 */
export function filesForSplit(dataFiles: DataFiles, split: string, context: ErrorDetails = {}): readonly string[] {
  const available = dataFiles.kind === 'grouped' ? Object.keys(dataFiles.groups) : [DEFAULT_SPLIT];
  const files =
    dataFiles.kind === 'file'
      ? [dataFiles.path]
      : dataFiles.kind === 'sequence'
        ? dataFiles.files
        : dataFiles.groups[split];

  if (!available.includes(split) || files === undefined) {
    throw new SourceUnavailableError(`Split '${split}' not found. Available splits: ${available.join(', ')}`, {
      ...context,
      split,
      available,
    });
  }
  return files;
}

async function listVisible(path: string, fileSystem: FileSystem): Promise<string[]> {
  const children = await fileSystem.list(path);
  return children.filter((child) => !posix.basename(child).startsWith('.')).sort();
}
