import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileCache } from './fileCache.js';

const dirs: string[] = [];

async function makeBaseDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'airline-status-cache-'));
  dirs.push(dir);
  return dir;
}

describe('FileCache', () => {
  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it('returns null for a missing entry', async () => {
    const cache = new FileCache({ baseDir: await makeBaseDir() });
    expect(await cache.read('wikipedia', 'abc')).toBeNull();
  });

  it('round-trips a body with its metadata', async () => {
    const baseDir = await makeBaseDir();
    const now = () => new Date('2024-03-01T10:00:00.000Z');
    const cache = new FileCache({ baseDir, now });

    await cache.write('wikipedia', { key: 'abc', body: '{"ok":true}', metadata: { status: 200 } });

    expect(await cache.read('wikipedia', 'abc')).toEqual({
      key: 'abc',
      body: '{"ok":true}',
      storedAt: '2024-03-01T10:00:00.000Z',
      metadata: { status: 200 },
    });
    expect(await readFile(join(baseDir, 'wikipedia', 'abc.body'), 'utf8')).toBe('{"ok":true}');
  });

  it('treats entries older than maxAgeMs as missing', async () => {
    const baseDir = await makeBaseDir();
    let current = new Date('2024-03-01T10:00:00.000Z');
    const cache = new FileCache({ baseDir, maxAgeMs: 60_000, now: () => current });

    await cache.write('wikipedia', { key: 'abc', body: 'payload' });
    current = new Date('2024-03-01T10:00:30.000Z');
    expect((await cache.read('wikipedia', 'abc'))?.body).toBe('payload');

    current = new Date('2024-03-01T10:02:00.000Z');
    expect(await cache.read('wikipedia', 'abc')).toBeNull();
  });
});
