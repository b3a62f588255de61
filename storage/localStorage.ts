import type { Dirent } from "fs";
import { mkdir, readFile, readdir, stat, writeFile } from "fs/promises";
import path from "path";
import type { ListOptions, StorageBackend, StoredObject } from "./types";

// Filesystem backend: no network, no credentials, locators never expire
export class LocalStorageBackend implements StorageBackend {
  readonly mode = "local" as const;
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async persist(key: string, bytes: Buffer, _contentType: string): Promise<string> {
    const fullPath = this.resolveKey(key);
    await mkdir(path.dirname(fullPath), { recursive: true });
    await writeFile(fullPath, bytes);
    return fullPath;
  }

  async fetch(key: string): Promise<Buffer> {
    return readFile(this.resolveKey(key));
  }

  /**
   * Walks only the folder the prefix names, visiting entries in reverse name
   * order so report folders (named by date) come newest first, and stops as
   * soon as `maxObjects` keys were collected.
   */
  async list(prefix: string, options: ListOptions = {}): Promise<StoredObject[]> {
    const limit = options.maxObjects ?? Number.POSITIVE_INFINITY;
    const objects: StoredObject[] = [];
    if (limit <= 0) return objects;

    const folderEnd = prefix.lastIndexOf("/");
    const start = folderEnd > 0 ? this.resolveKey(prefix.slice(0, folderEnd)) : this.root;
    await this.walk(start, prefix, limit, objects);
    return objects;
  }

  async locate(key: string): Promise<string> {
    return this.resolveKey(key);
  }

  describe(): string {
    return `local folder ${this.root}`;
  }

  private resolveKey(key: string): string {
    const fullPath = path.resolve(this.root, ...key.split("/"));
    const relative = path.relative(this.root, fullPath);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Storage key escapes the report folder: ${key}`);
    }
    return fullPath;
  }

  private async walk(
    dir: string,
    prefix: string,
    limit: number,
    into: StoredObject[]
  ): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      // A fresh report folder has not been created yet
      if (isMissing(error)) return;
      throw error;
    }
    entries.sort((a, b) => (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));

    for (const entry of entries) {
      if (into.length >= limit) return;
      const fullPath = path.join(dir, entry.name);
      const key = path.relative(this.root, fullPath).split(path.sep).join("/");

      if (entry.isDirectory()) {
        const folderKey = `${key}/`;
        if (folderKey.startsWith(prefix) || prefix.startsWith(folderKey)) {
          await this.walk(fullPath, prefix, limit, into);
        }
      } else if (entry.isFile() && key.startsWith(prefix)) {
        const info = await stat(fullPath);
        into.push({ key, lastModified: info.mtime, sizeBytes: info.size });
      }
    }
  }
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}
