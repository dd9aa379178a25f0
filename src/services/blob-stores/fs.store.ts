import fs from 'fs';
import path from 'path';
import type { BlobStore } from '../../models/blob-store.model';
import { StorageError } from '../../utils/errors';

/** Directory-backed store for local runs; keys map to relative paths */
export class FsBlobStore implements BlobStore {
  readonly kind = 'fs';
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = path.resolve(rootDir);
  }

  async upload(key: string, bytes: Uint8Array, _contentType: string): Promise<void> {
    try {
      const filePath = this.resolveKey(key);
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, bytes);
    } catch (error) {
      throw new StorageError('upload', key, error);
    }
  }

  async list(prefix: string): Promise<string[]> {
    try {
      if (!fs.existsSync(this.root)) return [];
      const keys = await this.walk(this.root);
      return keys.filter((key) => key.startsWith(prefix)).sort();
    } catch (error) {
      throw new StorageError('list', prefix, error);
    }
  }

  async download(key: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(this.resolveKey(key));
    } catch (error) {
      throw new StorageError('download', key, error);
    }
  }

  private resolveKey(key: string): string {
    const filePath = path.resolve(this.root, key);
    if (!filePath.startsWith(this.root + path.sep)) {
      throw new Error(`Key '${key}' escapes the storage directory`);
    }
    return filePath;
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    const keys: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        keys.push(...(await this.walk(fullPath)));
      } else if (entry.isFile()) {
        keys.push(path.relative(this.root, fullPath).split(path.sep).join('/'));
      }
    }
    return keys;
  }
}
