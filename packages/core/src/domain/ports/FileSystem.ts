/** Credentials or backend configuration for a filesystem. Passed through untouched. */
export type StorageOptions = Readonly<Record<string, unknown>>;

/**
 * Port for a local or object-storage filesystem.
 *
 * Paths are passed as given by the caller (including any `protocol://` prefix).
 * `list()` returns the full paths of the immediate children of a directory.
 */
export interface FileSystem {
  exists(path: string): Promise<boolean>;
  isFile(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
  list(path: string): Promise<readonly string[]>;
  readText(path: string): Promise<string>;
}

/** Create a filesystem for the given storage options. */
export type FileSystemFactory = (storageOptions?: StorageOptions) => FileSystem;
