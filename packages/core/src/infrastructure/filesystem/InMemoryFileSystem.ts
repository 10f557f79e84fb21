import type { FileSystem } from '../../domain/ports/FileSystem.js';

/**
 * Non-persistent filesystem holding file contents in a Map.
 *
 * Directories are implied by the paths of the files they contain. Useful for
 * tests and for registering an in-process backend under a custom protocol.
 */
export class InMemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();

  constructor(files?: Readonly<Record<string, string>>) {
    for (const [path, content] of Object.entries(files ?? {})) {
      this.writeText(path, content);
    }
  }

  writeText(path: string, content: string): void {
    this.files.set(normalize(path), content);
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.hasFile(path) || this.hasDirectory(path));
  }

  isFile(path: string): Promise<boolean> {
    return Promise.resolve(this.hasFile(path));
  }

  isDirectory(path: string): Promise<boolean> {
    return Promise.resolve(this.hasDirectory(path));
  }

  list(path: string): Promise<readonly string[]> {
    if (!this.hasDirectory(path)) {
      return Promise.reject(new Error(`InMemoryFileSystem: no such directory '${path}'`));
    }
    const prefix = `${normalize(path)}/`;
    const children = new Set<string>();
    for (const file of this.files.keys()) {
      if (!file.startsWith(prefix)) continue;
      const name = file.slice(prefix.length).split('/')[0];
      if (name) children.add(prefix + name);
    }
    return Promise.resolve([...children]);
  }

  readText(path: string): Promise<string> {
    const content = this.files.get(normalize(path));
    if (content === undefined) {
      return Promise.reject(new Error(`InMemoryFileSystem: no such file '${path}'`));
    }
    return Promise.resolve(content);
  }

  private hasFile(path: string): boolean {
    return this.files.has(normalize(path));
  }

  private hasDirectory(path: string): boolean {
    const prefix = `${normalize(path)}/`;
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) return true;
    }
    return false;
  }
}

function normalize(path: string): string {
  return path.endsWith('/') && !path.endsWith('://') ? path.slice(0, -1) : path;
}
