import pLimit from 'p-limit';
import type { ScraperConfig } from './config';
import type { DedupIndex } from './dedupIndex';
import { errorMessage, isFatalError } from './errors';
import type { GalleryDiscovery } from './gallery';
import type { PhotoStore } from './photoStore';
import type { RunSummary, ScrapeResult, VesselRecord } from './types';
import { chunk, formatSeconds } from './utils';

export interface BatchProcessorDeps {
  discovery: Pick<GalleryDiscovery, 'discover'>;
  photoStore: Pick<PhotoStore, 'storeVesselPhotos'>;
  index: DedupIndex;
  config: Pick<ScraperConfig, 'batchSize' | 'batchConcurrency'>;
}

/**
 * Runs vessels through discovery and the download pipeline in fixed-size
 * batches, then records the vessels that got photos in the dedup index.
 */
export class BatchProcessor {
  constructor(private readonly deps: BatchProcessorDeps) {}

  async run(vessels: VesselRecord[]): Promise<RunSummary> {
    const { index, config } = this.deps;
    const started = Date.now();
    const startedAt = new Date(started).toISOString();

    await index.load();
    const { pending, indexed } = index.partition(vessels);
    console.log(`📋 ${vessels.length} vessel(s): ${indexed.length} already in gallery, ${pending.length} to scrape`);

    const results: ScrapeResult[] = [];
    let abort: unknown = null;
    const batches = chunk(pending, Math.max(1, config.batchSize));
    for (const [i, batch] of batches.entries()) {
      if (abort !== null) {
        results.push(...batch.map((vessel) => notProcessed(vessel, abort)));
        continue;
      }
      console.log(`\n📦 Batch ${i + 1}/${batches.length} (${batch.length} vessel(s))`);
      const outcome = await this.runBatch(batch);
      results.push(...outcome.results);
      if (outcome.fatal !== null) {
        abort = outcome.fatal;
        console.error(`❌ Run stopped: ${errorMessage(abort)}`);
      }
    }

    for (const result of results) {
      if (result.stored > 0) index.markPending(result.vesselId);
    }
    let indexFlushed = false;
    try {
      indexFlushed = await index.flush();
    } catch (err) {
      console.error(`❌ Dedup index not updated: ${errorMessage(err)}`);
      if (abort === null) abort = err;
    }

    const finished = Date.now();
    return {
      startedAt,
      finishedAt: new Date(finished).toISOString(),
      totalVessels: pending.length,
      skippedVessels: indexed.length,
      totalItemsStored: results.reduce((sum, r) => sum + r.stored, 0),
      failedVessels: results.filter((r) => r.stored === 0).length,
      elapsedMs: finished - started,
      indexFlushed,
      ...(abort !== null ? { abortReason: errorMessage(abort) } : {}),
      results,
    };
  }

  async processVessel(vessel: VesselRecord): Promise<ScrapeResult> {
    const started = Date.now();
    const vesselName = vessel.details?.name ?? 'Unknown';
    const result: ScrapeResult = {
      vesselId: vessel.id,
      vesselName,
      found: 0,
      stored: 0,
      totalAvailable: -1,
      elapsedMs: 0,
      errors: [],
    };

    try {
      const discovery = await this.deps.discovery.discover(vessel.id);
      result.totalAvailable = discovery.totalReported;
      result.errors.push(...discovery.errors);

      if (discovery.photoIds.length > 0) {
        const stored = await this.deps.photoStore.storeVesselPhotos(vessel.id, discovery.photoIds, vessel.details);
        result.found = stored.found;
        result.stored = stored.stored;
        result.errors.push(...stored.errors);
      }
    } catch (err) {
      if (isFatalError(err)) throw err;
      console.error(`  ✗ IMO ${vessel.id} failed: ${errorMessage(err)}`);
      result.errors.push(errorMessage(err));
    }

    result.elapsedMs = Date.now() - started;
    const mark = result.stored > 0 ? '✓' : '✗';
    console.log(
      `  ${mark} IMO ${vessel.id} (${vesselName}): ${result.stored}/${result.found} stored in ${formatSeconds(result.elapsedMs)}`,
    );
    return result;
  }

  /**
   * Runs one batch. A fatal error stops vessels that have not started yet;
   * it is returned alongside the results instead of thrown.
   */
  private async runBatch(batch: VesselRecord[]): Promise<{ results: ScrapeResult[]; fatal: unknown }> {
    const limit = pLimit(Math.max(1, this.deps.config.batchConcurrency));
    let fatal: unknown = null;

    const settled = await Promise.allSettled(
      batch.map((vessel) =>
        limit(async () => {
          if (fatal !== null) throw fatal;
          try {
            return await this.processVessel(vessel);
          } catch (err) {
            fatal = err;
            throw err;
          }
        }),
      ),
    );

    const results = settled.map((outcome, i) =>
      outcome.status === 'fulfilled' ? outcome.value : notProcessed(batch[i], outcome.reason),
    );
    return { results, fatal };
  }
}

function notProcessed(vessel: VesselRecord, reason: unknown): ScrapeResult {
  return {
    vesselId: vessel.id,
    vesselName: vessel.details?.name ?? 'Unknown',
    found: 0,
    stored: 0,
    totalAvailable: -1,
    elapsedMs: 0,
    errors: [`run aborted: ${errorMessage(reason)}`],
  };
}

export function logRunSummary(summary: RunSummary): void {
  const scraped = summary.totalVessels - summary.failedVessels;
  console.log(`\n${'='.repeat(60)}`);
  console.log('📊 RUN SUMMARY');
  console.log('='.repeat(60));
  console.log(`📋 Vessels to scrape: ${summary.totalVessels}`);
  console.log(`✅ Already in gallery: ${summary.skippedVessels}`);
  console.log(`🆕 Vessels with new photos: ${scraped}`);
  console.log(`❌ Failed vessels: ${summary.failedVessels}`);
  console.log(`📸 Photos stored: ${summary.totalItemsStored}`);
  if (scraped > 0) {
    console.log(`📊 Average photos/vessel: ${(summary.totalItemsStored / scraped).toFixed(1)}`);
  }
  console.log(`\n⏱️  Total time: ${formatSeconds(summary.elapsedMs)}`);
  if (summary.totalVessels > 0) {
    console.log(`⚡ Average time/vessel: ${formatSeconds(summary.elapsedMs / summary.totalVessels)}`);
  }
  if (summary.totalItemsStored > 0 && summary.elapsedMs > 0) {
    console.log(`🚀 Download rate: ${(summary.totalItemsStored / (summary.elapsedMs / 1000)).toFixed(1)} photos/s`);
  }
  console.log(`💾 Dedup index ${summary.indexFlushed ? 'updated' : 'unchanged'}`);
  if (summary.abortReason) {
    console.log(`🛑 Run aborted: ${summary.abortReason}`);
  }
  console.log('='.repeat(60));
}
