import type { ObjectStore } from "./objectStore";
import type { ListOptions, StorageBackend, StoredObject } from "./types";

export const DEFAULT_URL_EXPIRATION_SECONDS = 7 * 24 * 60 * 60;
export const DEFAULT_PAGE_SIZE = 1000;

export interface RemoteStorageOptions {
  urlExpirationSeconds?: number;
  pageSize?: number;
}

/**
 * Object-store backend. Every persisted object answers with a presigned URL
 * that expires after `urlExpirationSeconds`.
 */
export class RemoteStorageBackend implements StorageBackend {
  readonly mode = "remote" as const;
  private readonly urlExpirationSeconds: number;
  private readonly pageSize: number;

  constructor(private readonly store: ObjectStore, options: RemoteStorageOptions = {}) {
    this.urlExpirationSeconds =
      options.urlExpirationSeconds ?? DEFAULT_URL_EXPIRATION_SECONDS;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async persist(key: string, bytes: Buffer, contentType: string): Promise<string> {
    await this.store.putObject(key, bytes, contentType);
    return this.locate(key);
  }

  async fetch(key: string): Promise<Buffer> {
    return this.store.getObject(key);
  }

  /**
   * Follows continuation cursors until the store runs dry or the ceiling is hit.
   * Object stores only page in ascending key order, so a bounded listing covers
   * the oldest report folders under the prefix; callers that must see recent
   * reports past the ceiling list unbounded (a tag search does).
   */
  async list(prefix: string, options: ListOptions = {}): Promise<StoredObject[]> {
    const { maxObjects } = options;
    const objects: StoredObject[] = [];
    let cursor: string | undefined;

    do {
      const page = await this.store.listPage(prefix, cursor, this.pageSize);
      objects.push(...page.objects);
      cursor = page.nextCursor;

      if (maxObjects !== undefined && objects.length >= maxObjects) {
        break;
      }
    } while (cursor);

    return objects;
  }

  async locate(key: string): Promise<string> {
    return this.store.presignGet(key, this.urlExpirationSeconds);
  }

  describe(): string {
    return `object store ${this.store.location}`;
  }
}
