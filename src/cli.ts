#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { loadScraperConfig, loadStorageConfig, loadVesselSourceConfig } from './config';
import type { ScraperConfig, StorageConfig } from './config';
import { DedupIndex } from './dedupIndex';
import { DownloadClient } from './downloader';
import { errorMessage } from './errors';
import { GalleryDiscovery } from './gallery';
import { BatchProcessor, logRunSummary } from './orchestrator';
import { PhotoStore } from './photoStore';
import { SessionPool, createBrowserSession } from './session';
import { MemoryObjectStore, SupabaseObjectStore } from './storage';
import type { ObjectStore } from './storage';
import { createSupabaseClient } from './supabaseClient';
import type { RunSummary } from './types';
import { parseArgs, sleep } from './utils';
import { requireVesselId } from './vesselId';
import { createVesselSource } from './vesselSource';

interface CliOptions {
  mode?: string;
  ids: string[];
  csvPath?: string;
  summaryOut?: string;
  rebuildIndex: boolean;
  everyHours?: number;
  dryRun: boolean;
}

const DRY_RUN_STORAGE: Pick<StorageConfig, 'uploadBase' | 'checkBase' | 'indexKey'> = {
  uploadBase: 'vessel-gallery',
  checkBase: 'vessel-gallery',
  indexKey: 'imo_gallery.json',
};

function readOptions(): CliOptions {
  const args = parseArgs();
  const ids =
    typeof args.imo === 'string'
      ? args.imo
          .split(',')
          .map((s) => s.trim())
          .filter(Boolean)
          .map(requireVesselId)
      : [];
  let everyHours: number | undefined;
  if (args['every-hours'] !== undefined) {
    everyHours = Number(args['every-hours']);
    if (!Number.isFinite(everyHours) || everyHours <= 0) {
      throw new Error(`Invalid --every-hours: "${String(args['every-hours'])}"`);
    }
  }
  return {
    mode: typeof args.mode === 'string' ? args.mode : undefined,
    ids,
    csvPath: typeof args.csv === 'string' ? args.csv : undefined,
    summaryOut: typeof args['summary-out'] === 'string' ? args['summary-out'] : undefined,
    rebuildIndex: Boolean(args['rebuild-index']),
    everyHours,
    dryRun: Boolean(args['dry-run'] ?? args.dryRun),
  };
}

async function connectStorage(dryRun: boolean): Promise<{ store: ObjectStore; storage: typeof DRY_RUN_STORAGE }> {
  if (dryRun) {
    console.log('🧪 Dry run: photos are kept in memory and discarded at exit');
    return { store: new MemoryObjectStore(), storage: DRY_RUN_STORAGE };
  }
  const storage = loadStorageConfig();
  const store = new SupabaseObjectStore(createSupabaseClient(storage), storage.supabaseBucket);
  await store.checkConnection();
  return { store, storage };
}

async function createSessionPool(config: ScraperConfig): Promise<SessionPool> {
  return SessionPool.create(
    (slot, generation) =>
      createBrowserSession({
        baseUrl: config.baseUrl,
        probeUrl: `${config.baseUrl}/photos/gallery`,
        timeoutMs: config.requestTimeoutMs,
        userAgentOffset: slot + generation,
      }),
    {
      size: config.sessionPoolSize,
      maxRetries: config.maxRetries,
      backoffBaseMs: config.retryBackoffMs,
      jitterMs: config.retryJitterMs,
      requestDelayMinMs: config.requestDelayMinMs,
      requestDelayMaxMs: config.requestDelayMaxMs,
      concurrency: config.galleryConcurrency,
    },
  );
}

async function runOnce(options: CliOptions, config: ScraperConfig): Promise<RunSummary | null> {
  const { store, storage } = await connectStorage(options.dryRun);
  const index = new DedupIndex(store, { indexKey: storage.indexKey, checkBase: storage.checkBase });

  const sourceConfig = loadVesselSourceConfig(options.mode ? { ...process.env, SCRAPER_MODE: options.mode } : process.env);
  const vessels = await createVesselSource(sourceConfig, { ids: options.ids, csvPath: options.csvPath }).listVessels();
  if (vessels.length === 0) {
    console.log('❌ No vessels to process');
    return null;
  }

  const pool = await createSessionPool(config);
  const downloader = new DownloadClient({
    credentials: () => pool.credentials(),
    timeoutMs: config.downloadTimeoutMs,
    maxRetries: config.maxRetries,
    backoffBaseMs: config.retryBackoffMs,
    jitterMs: config.retryJitterMs,
  });

  const processor = new BatchProcessor({
    discovery: new GalleryDiscovery(pool, config),
    photoStore: new PhotoStore(downloader, store, {
      baseUrl: config.baseUrl,
      uploadBase: storage.uploadBase,
      downloadConcurrency: config.downloadConcurrency,
      downloadDelayMinMs: 10,
      downloadDelayMaxMs: 50,
    }),
    index,
    config,
  });

  const summary = await processor.run(vessels);
  logRunSummary(summary);

  if (options.summaryOut) {
    const target = path.resolve(options.summaryOut);
    await fs.promises.writeFile(target, JSON.stringify(summary, null, 2));
    console.log(`📝 Summary written to ${target}`);
  }
  return summary;
}

async function rebuildIndex(dryRun: boolean): Promise<void> {
  const { store, storage } = await connectStorage(dryRun);
  const index = new DedupIndex(store, { indexKey: storage.indexKey, checkBase: storage.checkBase });
  await index.rebuild();
}

async function main() {
  const options = readOptions();
  const config = loadScraperConfig();

  if (options.rebuildIndex) {
    await rebuildIndex(options.dryRun);
    return;
  }

  if (!options.everyHours) {
    const summary = await runOnce(options, config);
    if (summary?.abortReason) process.exitCode = 1;
    return;
  }

  const intervalMs = options.everyHours * 60 * 60 * 1000;
  console.log(`⏰ Scheduled mode: running every ${options.everyHours} hour(s)`);
  for (let run = 1; ; run += 1) {
    console.log(`\n🚢 Scheduled run #${run} at ${new Date().toISOString()}`);
    try {
      await runOnce(options, config);
    } catch (err) {
      console.error(`✗ Scheduled run #${run} failed: ${errorMessage(err)}`);
    }
    console.log(`💤 Next run at ${new Date(Date.now() + intervalMs).toISOString()}`);
    await sleep(intervalMs);
  }
}

main().catch((err) => {
  console.error(`\n❌ Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
