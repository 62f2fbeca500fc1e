export interface CachedResponse {
  key: string;
  storedAt: string;
  body: string;
  metadata?: Record<string, unknown>;
}

export interface CacheWriteInput {
  key: string;
  body: string;
  metadata?: Record<string, unknown>;
}

/** Stores raw API response bodies by namespace and request checksum. */
export interface ResponseCache {
  read(namespace: string, key: string): Promise<CachedResponse | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}
