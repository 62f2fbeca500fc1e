import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod/v4';
import { isNotFoundError } from '../utils/errors.js';
import type { CacheWriteInput, CachedResponse, ResponseCache } from './cache.js';

const metadataFileSchema = z.object({
  storedAt: z.string(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

type MetadataFile = z.infer<typeof metadataFileSchema>;

export interface FileCacheOptions {
  baseDir?: string;
  /** Entries older than this are treated as missing. */
  maxAgeMs?: number | undefined;
  now?: () => Date;
}

export class FileCache implements ResponseCache {
  private readonly baseDir: string;
  private readonly maxAgeMs: number | undefined;
  private readonly now: () => Date;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
    this.maxAgeMs = options.maxAgeMs;
    this.now = options.now ?? (() => new Date());
  }

  async read(namespace: string, key: string): Promise<CachedResponse | null> {
    const { bodyPath, metaPath } = this.paths(namespace, key);

    let body: string;
    let metaRaw: string;
    try {
      [body, metaRaw] = await Promise.all([fs.readFile(bodyPath, 'utf8'), fs.readFile(metaPath, 'utf8')]);
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }

    const meta = metadataFileSchema.parse(JSON.parse(metaRaw));
    if (this.isExpired(meta.storedAt)) {
      return null;
    }

    return {
      key,
      body,
      storedAt: meta.storedAt,
      ...(meta.metadata ? { metadata: meta.metadata } : {}),
    };
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(namespace, entry.key);
    await fs.mkdir(dir, { recursive: true });

    const meta: MetadataFile = { storedAt: this.now().toISOString() };
    if (entry.metadata) {
      meta.metadata = entry.metadata;
    }

    await Promise.all([
      fs.writeFile(bodyPath, entry.body, 'utf8'),
      fs.writeFile(metaPath, JSON.stringify(meta, null, 2), 'utf8'),
    ]);
  }

  private isExpired(storedAt: string): boolean {
    if (this.maxAgeMs === undefined) {
      return false;
    }
    const storedMs = Date.parse(storedAt);
    if (Number.isNaN(storedMs)) {
      return true;
    }
    return this.now().getTime() - storedMs > this.maxAgeMs;
  }

  private paths(namespace: string, key: string) {
    const dir = path.join(this.baseDir, namespace);
    return {
      dir,
      bodyPath: path.join(dir, `${key}.body`),
      metaPath: path.join(dir, `${key}.meta.json`),
    };
  }
}
