import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DedupIndex, parseIndexDocument } from './dedupIndex';
import { StorageUnavailableError } from './errors';
import { MemoryObjectStore } from './storage';

const INDEX_KEY = 'imo_gallery.json';
const options = { indexKey: INDEX_KEY, checkBase: 'vessel-gallery' };

/** Store whose reads fail like a backend answering 503. */
class FlakyReadStore extends MemoryObjectStore {
  failReads = false;

  async get(key: string): Promise<Buffer | null> {
    if (this.failReads) throw new Error(`Supabase download failed for ${key}: Service Unavailable`);
    return super.get(key);
  }
}

async function seed(store: MemoryObjectStore, ids: string[]): Promise<void> {
  await store.put(INDEX_KEY, JSON.stringify({ lastUpdated: '2026-01-01T00:00:00.000Z', ids }), 'application/json');
}

function persistedIds(store: MemoryObjectStore): string[] {
  const raw = store.objects.get(INDEX_KEY)?.body.toString() ?? '{"ids":[]}';
  return Array.from(parseIndexDocument(raw));
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

describe('parseIndexDocument', () => {
  it('keeps only valid vessel ids', () => {
    const ids = parseIndexDocument(JSON.stringify({ ids: ['1234567', '123', 7654321, 'IMO_1111111', '2222222'] }));
    expect(Array.from(ids)).toEqual(['1234567', '2222222']);
  });

  it('treats corrupt or misshapen documents as empty', () => {
    expect(parseIndexDocument('{not json').size).toBe(0);
    expect(parseIndexDocument('["1234567"]').size).toBe(0);
    expect(parseIndexDocument('{"ids":"1234567"}').size).toBe(0);
  });
});

describe('DedupIndex', () => {
  it('starts empty when no document exists', async () => {
    const index = new DedupIndex(new MemoryObjectStore(), options);

    expect((await index.load()).size).toBe(0);
    expect(index.contains('1234567')).toBe(false);
  });

  it('starts empty on a corrupt document', async () => {
    const store = new MemoryObjectStore();
    await store.put(INDEX_KEY, 'garbage', 'application/json');
    const index = new DedupIndex(store, options);

    expect((await index.load()).size).toBe(0);
    expect(console.warn).toHaveBeenCalled();
  });

  it('propagates a storage outage on load', async () => {
    const store = new MemoryObjectStore();
    store.setUnavailable(true);

    await expect(new DedupIndex(store, options).load()).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it('refuses to load when the document cannot be read', async () => {
    const store = new FlakyReadStore();
    await seed(store, ['1111111', '2222222']);
    store.failReads = true;

    await expect(new DedupIndex(store, options).load()).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it('does not overwrite the document when the re-read before flush fails', async () => {
    const store = new FlakyReadStore();
    await seed(store, ['1111111', '2222222']);
    const index = new DedupIndex(store, options);
    await index.load();
    index.markPending('3333333');
    store.failReads = true;

    await expect(index.flush()).rejects.toThrow(
      'Could not read dedup index imo_gallery.json: Supabase download failed for imo_gallery.json: Service Unavailable',
    );
    expect(persistedIds(store)).toEqual(['1111111', '2222222']);
    expect(index.pendingCount).toBe(1);
  });

  it('splits vessels into pending and already indexed', async () => {
    const store = new MemoryObjectStore();
    await seed(store, ['1111111']);
    const index = new DedupIndex(store, options);
    await index.load();

    const { pending, indexed } = index.partition([{ id: '1111111' }, { id: '2222222' }]);

    expect(indexed.map((v) => v.id)).toEqual(['1111111']);
    expect(pending.map((v) => v.id)).toEqual(['2222222']);
  });

  it('only grows on flush', async () => {
    const store = new MemoryObjectStore();
    await seed(store, ['1111111', '3333333']);
    const index = new DedupIndex(store, options);
    await index.load();

    index.markPending('2222222');
    expect(index.contains('2222222')).toBe(true);
    expect(await index.flush()).toBe(true);

    expect(persistedIds(store)).toEqual(['1111111', '2222222', '3333333']);
    expect(index.pendingCount).toBe(0);
  });

  it('skips the write when nothing is pending', async () => {
    const store = new MemoryObjectStore();
    const index = new DedupIndex(store, options);
    await index.load();
    index.markPending('not-an-id');

    expect(await index.flush()).toBe(false);
    expect(store.writes).toEqual([]);
  });

  it('merges with ids another writer flushed in the meantime', async () => {
    const store = new MemoryObjectStore();
    await seed(store, ['1111111']);
    const first = new DedupIndex(store, options);
    const second = new DedupIndex(store, options);
    await first.load();
    await second.load();

    first.markPending('2222222');
    second.markPending('3333333');
    await first.flush();
    await second.flush();

    expect(persistedIds(store)).toEqual(['1111111', '2222222', '3333333']);
  });

  it('rebuilds from vessel folders and ignores unrelated keys', async () => {
    const store = new MemoryObjectStore();
    await seed(store, ['9999999']);
    await store.put('vessel-gallery/IMO_1234567/5000001.jpg', Buffer.from('a'), 'image/jpeg');
    await store.put('vessel-gallery/7654321/5000002.jpg', Buffer.from('b'), 'image/jpeg');
    await store.put('vessel-gallery/archive/IMO_3333333/5000003.jpg', Buffer.from('c'), 'image/jpeg');
    await store.put('vessel-gallery/IMO_12345/5000004.jpg', Buffer.from('d'), 'image/jpeg');
    await store.put('vessel-gallery/thumbnails/5000005.jpg', Buffer.from('e'), 'image/jpeg');
    await store.put('vessel-gallery/1234567.jpg', Buffer.from('f'), 'image/jpeg');
    await store.put('other/IMO_4444444/5000006.jpg', Buffer.from('g'), 'image/jpeg');
    const index = new DedupIndex(store, options);

    const rebuilt = await index.rebuild();

    expect(Array.from(rebuilt).sort()).toEqual(['1234567', '3333333', '7654321']);
    expect(persistedIds(store)).toEqual(['1234567', '3333333', '7654321']);
    expect(index.contains('9999999')).toBe(false);
  });

  it('does not list inside vessel folders while rebuilding', async () => {
    const store = new MemoryObjectStore();
    await store.put('vessel-gallery/IMO_1234567/2024/5000001.jpg', Buffer.from('a'), 'image/jpeg');
    await store.put('vessel-gallery/IMO_1234567/IMO_7654321/5000002.jpg', Buffer.from('b'), 'image/jpeg');
    const list = vi.spyOn(store, 'list');
    const index = new DedupIndex(store, options);

    const rebuilt = await index.rebuild();

    expect(Array.from(rebuilt)).toEqual(['1234567']);
    expect(list).toHaveBeenCalledWith('vessel-gallery', expect.objectContaining({ directoriesOnly: true }));
  });
});
