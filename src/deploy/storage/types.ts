export interface StoredObject {
  key: string;
  etag: string | null;
}

export interface StorageResult {
  key: string;
  url?: string;
  etag?: string;
}

export interface StorageBackend {
  name: string;
  /** Null when the object does not exist (or cannot be seen). */
  headObject(key: string): Promise<StoredObject | null>;
  putObject(key: string, data: Buffer, contentType?: string): Promise<StorageResult>;
}
