import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DedupIndex } from './dedupIndex';
import { StorageUnavailableError } from './errors';
import { GalleryDiscovery, buildGalleryUrl } from './gallery';
import type { DiscoveryConfig } from './gallery';
import { BatchProcessor, logRunSummary } from './orchestrator';
import type { BatchProcessorDeps } from './orchestrator';
import { PhotoStore } from './photoStore';
import { MemoryObjectStore } from './storage';
import { RoutedClient, galleryHtml } from './testHelpers';
import type { Reply } from './testHelpers';
import type { DiscoveryResult, VesselStoreResult } from './types';

const BASE = 'https://photos.test';

const discoveryConfig: DiscoveryConfig = {
  baseUrl: BASE,
  maxPhotosPerVessel: 40,
  galleryPageSize: 12,
  maxGalleryPages: 10,
  alternateSortMaxPages: 2,
  galleryConcurrency: 4,
};

const batchConfig = { batchSize: 10, batchConcurrency: 10 };

function discovered(photoIds: string[]): DiscoveryResult {
  return { photoIds, totalReported: photoIds.length, pagesFetched: 1, errors: [] };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('BatchProcessor end to end', () => {
  function setup() {
    const routes = new Map<string, Reply | Error>([
      [buildGalleryUrl(BASE, '1234567', 'newest', 1), { status: 200, body: galleryHtml(['5000001', '5000002', '5000003'], '3 photos found') }],
      [`${BASE}/photos/big/1/0/0/5000001.jpg`, { status: 200, contentType: 'image/jpeg', body: Buffer.from('one') }],
      [`${BASE}/photos/big/2/0/0/5000002.jpg`, { status: 200, contentType: 'image/jpeg', body: Buffer.from('two') }],
      [`${BASE}/photos/big/3/0/0/5000003.jpg`, { status: 200, contentType: 'image/jpeg', body: Buffer.from('three') }],
    ]);
    const client = new RoutedClient(routes);
    const store = new MemoryObjectStore();
    const index = new DedupIndex(store, { indexKey: 'imo_gallery.json', checkBase: 'vessel-gallery' });
    const processor = new BatchProcessor({
      discovery: new GalleryDiscovery(client, discoveryConfig),
      photoStore: new PhotoStore(client, store, { baseUrl: BASE, uploadBase: 'vessel-gallery', downloadConcurrency: 20 }),
      index,
      config: batchConfig,
    });
    return { client, store, index, processor };
  }

  it('stores every photo of a new vessel and records it in the index', async () => {
    const { store, index, processor } = setup();

    const summary = await processor.run([{ id: '1234567', details: { name: 'TEST VESSEL A', vesselType: 'Container', extractedAt: 'now' } }]);

    expect(summary).toMatchObject({
      totalVessels: 1,
      skippedVessels: 0,
      totalItemsStored: 3,
      failedVessels: 0,
      indexFlushed: true,
    });
    expect(summary.results[0]).toMatchObject({
      vesselId: '1234567',
      vesselName: 'TEST VESSEL A',
      found: 3,
      stored: 3,
      totalAvailable: 3,
      errors: [],
    });
    expect(index.contains('1234567')).toBe(true);
    expect(store.objects.has('vessel-gallery/IMO_1234567/5000003.json')).toBe(true);
    const doc = JSON.parse(store.objects.get('imo_gallery.json')?.body.toString() ?? '{}');
    expect(doc.ids).toEqual(['1234567']);
  });

  it('skips the vessel on the next run', async () => {
    const { client, processor } = setup();
    await processor.run([{ id: '1234567' }]);
    const requestsAfterFirstRun = client.requests.length;

    const summary = await processor.run([{ id: '1234567' }]);

    expect(summary).toMatchObject({ totalVessels: 0, skippedVessels: 1, totalItemsStored: 0, indexFlushed: false });
    expect(client.requests).toHaveLength(requestsAfterFirstRun);
  });
});

describe('BatchProcessor failure accounting', () => {
  function processorWith(deps: Partial<BatchProcessorDeps>, store = new MemoryObjectStore()) {
    const index = new DedupIndex(store, { indexKey: 'imo_gallery.json', checkBase: 'vessel-gallery' });
    const processor = new BatchProcessor({
      discovery: { discover: async (id) => discovered([`${id.slice(0, 4)}1`]) },
      photoStore: { storeVesselPhotos: async (_id, photoIds): Promise<VesselStoreResult> => ({ found: photoIds.length, stored: photoIds.length, errors: [] }) },
      index,
      config: batchConfig,
      ...deps,
    });
    return { processor, index, store };
  }

  it('counts vessels without photos and vessels that throw as failed', async () => {
    const { processor, index } = processorWith({
      discovery: {
        discover: async (id) => {
          if (id === '2222222') throw new Error('parser exploded');
          if (id === '3333333') return discovered([]);
          return discovered(['5000001', '5000002']);
        },
      },
    });

    const summary = await processor.run([{ id: '1111111' }, { id: '2222222' }, { id: '3333333' }]);

    expect(summary.totalVessels).toBe(3);
    expect(summary.failedVessels).toBe(2);
    expect(summary.totalItemsStored).toBe(2);
    expect(summary.results.find((r) => r.vesselId === '2222222')?.errors).toEqual(['parser exploded']);
    expect(index.ids()).toEqual(['1111111']);
  });

  it('processes every batch', async () => {
    const discover = vi.fn(async (id: string) => discovered([`${id.slice(0, 4)}1`]));
    const { processor } = processorWith({ discovery: { discover }, config: { batchSize: 2, batchConcurrency: 2 } });
    const vessels = ['1000001', '1000002', '1000003', '1000004', '1000005'].map((id) => ({ id }));

    const summary = await processor.run(vessels);

    expect(discover).toHaveBeenCalledTimes(5);
    expect(summary.results.map((r) => r.vesselId)).toEqual(['1000001', '1000002', '1000003', '1000004', '1000005']);
  });

  it('stops scheduling after a storage outage and still reports and indexes finished vessels', async () => {
    const discover = vi.fn(async (id: string) => discovered([`${id.slice(0, 4)}1`]));
    const { processor, store } = processorWith({
      discovery: { discover },
      photoStore: {
        storeVesselPhotos: async (id, photoIds): Promise<VesselStoreResult> => {
          if (id === '2222222') throw new StorageUnavailableError('bucket gone');
          return { found: photoIds.length, stored: photoIds.length, errors: [] };
        },
      },
      config: { batchSize: 1, batchConcurrency: 1 },
    });

    const summary = await processor.run([{ id: '1111111' }, { id: '2222222' }, { id: '3333333' }]);

    expect(discover.mock.calls.map(([id]) => id)).toEqual(['1111111', '2222222']);
    expect(summary).toMatchObject({
      totalVessels: 3,
      totalItemsStored: 1,
      failedVessels: 2,
      indexFlushed: true,
      abortReason: 'bucket gone',
    });
    expect(summary.results.map((r) => r.errors)).toEqual([[], ['run aborted: bucket gone'], ['run aborted: bucket gone']]);
    const doc = JSON.parse(store.objects.get('imo_gallery.json')?.body.toString() ?? '{}');
    expect(doc.ids).toEqual(['1111111']);
  });

  it('leaves the index alone when no vessel finished before the outage', async () => {
    const store = new MemoryObjectStore();
    const { processor } = processorWith(
      {
        photoStore: {
          storeVesselPhotos: async () => {
            throw new StorageUnavailableError('bucket gone');
          },
        },
      },
      store,
    );

    const summary = await processor.run([{ id: '1111111' }, { id: '2222222' }]);

    expect(summary).toMatchObject({ failedVessels: 2, indexFlushed: false, abortReason: 'bucket gone' });
    expect(store.writes).toEqual([]);
  });

  it('reports a failed index flush in the summary', async () => {
    const store = new MemoryObjectStore();
    const { processor } = processorWith(
      {
        photoStore: {
          storeVesselPhotos: async (_id, photoIds): Promise<VesselStoreResult> => {
            store.setUnavailable(true);
            return { found: photoIds.length, stored: photoIds.length, errors: [] };
          },
        },
      },
      store,
    );

    const summary = await processor.run([{ id: '1111111' }]);

    expect(summary).toMatchObject({
      totalItemsStored: 1,
      failedVessels: 0,
      indexFlushed: false,
      abortReason: 'In-memory store marked unavailable',
    });
  });

  it('produces no summary when the index cannot be loaded', async () => {
    const store = new MemoryObjectStore();
    store.setUnavailable(true);
    const discover = vi.fn(async (id: string) => discovered([id]));
    const { processor } = processorWith({ discovery: { discover } }, store);

    await expect(processor.run([{ id: '1111111' }])).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(discover).not.toHaveBeenCalled();
  });
});

describe('logRunSummary', () => {
  it('prints the totals', () => {
    logRunSummary({
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:10.000Z',
      totalVessels: 2,
      skippedVessels: 1,
      totalItemsStored: 5,
      failedVessels: 1,
      elapsedMs: 10000,
      indexFlushed: true,
      results: [],
    });

    expect(console.log).toHaveBeenCalledWith('📸 Photos stored: 5');
    expect(console.log).toHaveBeenCalledWith('📊 Average photos/vessel: 5.0');
    expect(console.log).toHaveBeenCalledWith('⚡ Average time/vessel: 5.0s');
    expect(console.log).not.toHaveBeenCalledWith(expect.stringContaining('Run aborted'));
  });

  it('prints the abort reason', () => {
    logRunSummary({
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:00:01.000Z',
      totalVessels: 1,
      skippedVessels: 0,
      totalItemsStored: 0,
      failedVessels: 1,
      elapsedMs: 1000,
      indexFlushed: false,
      abortReason: 'bucket gone',
      results: [],
    });

    expect(console.log).toHaveBeenCalledWith('🛑 Run aborted: bucket gone');
  });
});
