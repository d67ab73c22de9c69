import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, writeFile } from 'node:fs/promises';
import { createTestApp, type TestApp } from '../mocks/app.js';
import { cacheRecord } from '../mocks/fixtures.js';

const KEY = 'vpro-apocalypse-now-1979-tt0078788-m';

describe('Cache API', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
    await t.container.cache.write(KEY, cacheRecord({ fetched_at: new Date().toISOString() }));
  });

  afterEach(async () => {
    await t.cleanup();
  });

  it('GET /api/cache/stats counts entries by state', async () => {
    const res = await t.app.request('/api/cache/stats');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        entryCounts: { total: 1, found: 1, notFound: 0, expired: 0, corrupt: 0 },
        maxEntries: 10_000,
        maxSizeBytes: 500 * 1024 * 1024,
      },
    });
  });

  it('GET /api/cache/keys lists keys', async () => {
    const res = await t.app.request('/api/cache/keys');
    expect(await res.json()).toMatchObject({ data: { count: 1, keys: [KEY] } });
  });

  it('GET /api/cache/{key} returns the record', async () => {
    const res = await t.app.request(`/api/cache/${KEY}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { lookup_key: KEY, status: 'found', internal_id: '8290' } });
  });

  it('GET /api/cache/{key} answers 404 for an unknown key', async () => {
    const res = await t.app.request('/api/cache/vpro-unknown-0-none-m');

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      error: { code: 'NOT_FOUND', message: 'No cache entry for key', details: { key: 'vpro-unknown-0-none-m' } },
    });
  });

  it('rejects keys that were not built by the resolver', async () => {
    const res = await t.app.request('/api/cache/not-a-key');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_REQUEST', message: 'Malformed lookup key' } });
  });

  it('DELETE /api/cache/{key} removes the entry', async () => {
    const res = await t.app.request(`/api/cache/${KEY}`, { method: 'DELETE' });
    expect(await res.json()).toMatchObject({ data: { key: KEY, deleted: true } });

    const second = await t.app.request(`/api/cache/${KEY}`, { method: 'DELETE' });
    expect(await second.json()).toMatchObject({ data: { key: KEY, deleted: false } });
  });

  describe('POST /api/cache/clear', () => {
    it('keeps the credential file by default', async () => {
      await t.container.cache.write('vpro-borgen-2010-none-s', cacheRecord({
        lookup_key: 'vpro-borgen-2010-none-s',
        title: 'Borgen',
        year: 2010,
        media_type: 'series',
        fetched_at: new Date().toISOString(),
      }));
      await writeFile(t.container.cache.credentialsPath, '{}');

      const res = await t.app.request('/api/cache/clear', { method: 'POST' });

      expect(await res.json()).toMatchObject({ data: { deleted: 2 } });
      await expect(access(t.container.cache.credentialsPath)).resolves.toBeUndefined();
    });

    it('removes the credential file when asked', async () => {
      await writeFile(t.container.cache.credentialsPath, '{}');

      const res = await t.app.request('/api/cache/clear?preserve_credentials=false', { method: 'POST' });

      expect(await res.json()).toMatchObject({ data: { deleted: 2 } });
      await expect(access(t.container.cache.credentialsPath)).rejects.toThrow();
    });
  });
});
