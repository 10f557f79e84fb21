import { readdir, readFile, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { join } from 'node:path';
import type { FileSystem } from '../../domain/ports/FileSystem.js';

/** Local filesystem backed by `node:fs`. Accepts plain paths and `file://` paths. Node.js only. */
export class NodeFileSystem implements FileSystem {
  async exists(path: string): Promise<boolean> {
    return (await this.stat(path)) !== null;
  }

  async isFile(path: string): Promise<boolean> {
    return (await this.stat(path))?.isFile() ?? false;
  }

  async isDirectory(path: string): Promise<boolean> {
    return (await this.stat(path))?.isDirectory() ?? false;
  }

  async list(path: string): Promise<readonly string[]> {
    const local = toLocalPath(path);
    const prefix = local === path ? '' : 'file://';
    const names = await readdir(local);
    return names.map((name) => prefix + join(local, name));
  }

  readText(path: string): Promise<string> {
    return readFile(toLocalPath(path), { encoding: 'utf-8' });
  }

  private async stat(path: string): Promise<Stats | null> {
    try {
      return await stat(toLocalPath(path));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}

function toLocalPath(path: string): string {
  return path.startsWith('file://') ? path.slice('file://'.length) : path;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
