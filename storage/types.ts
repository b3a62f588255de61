export type StorageMode = "local" | "remote";

export interface StoredObject {
  key: string;
  lastModified: Date;
  sizeBytes: number;
}

export interface ListOptions {
  // Stop listing once this many objects were fetched; unbounded when omitted.
  // Which window a bounded listing keeps is up to the backend.
  maxObjects?: number;
}

/**
 * Where report bytes live. Keys are relative, "/"-separated paths such as
 * `bot1/2025-06-26_14-03-09-000_AB12/index.html`; a locator is what a human opens
 * (a file path locally, a time-limited URL remotely).
 */
export interface StorageBackend {
  readonly mode: StorageMode;
  persist(key: string, bytes: Buffer, contentType: string): Promise<string>;
  fetch(key: string): Promise<Buffer>;
  list(prefix: string, options?: ListOptions): Promise<StoredObject[]>;
  locate(key: string): Promise<string>;
  describe(): string;
}
