import { StorageUnavailableError, errorMessage, isFatalError } from './errors';
import type { ObjectStore } from './storage';
import type { DedupIndexDocument, VesselId, VesselRecord } from './types';
import { isVesselId, vesselIdFromFolder } from './vesselId';

export interface DedupIndexOptions {
  /** Object key of the persisted index document. */
  indexKey: string;
  /** Folder whose vessel sub-folders count as already captured. */
  checkBase: string;
}

export interface PartitionResult {
  pending: VesselRecord[];
  indexed: VesselRecord[];
}

/**
 * Persisted set of vessel ids that already have photos in storage.
 *
 * `confirmed` mirrors the last document read or written; `pending` holds
 * ids marked during this run and not yet flushed. Flushing merges with
 * whatever another writer persisted in the meantime and never drops ids.
 */
export class DedupIndex {
  private confirmed = new Set<VesselId>();
  private readonly pending = new Set<VesselId>();

  constructor(
    private readonly store: ObjectStore,
    private readonly options: DedupIndexOptions,
  ) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  async load(): Promise<Set<VesselId>> {
    this.confirmed = await this.readDocument();
    console.log(`📚 Dedup index loaded: ${this.confirmed.size} vessel(s)`);
    return new Set(this.confirmed);
  }

  contains(vesselId: VesselId): boolean {
    return this.confirmed.has(vesselId) || this.pending.has(vesselId);
  }

  markPending(vesselId: VesselId): void {
    if (!isVesselId(vesselId)) return;
    if (!this.confirmed.has(vesselId)) this.pending.add(vesselId);
  }

  partition(vessels: VesselRecord[]): PartitionResult {
    const result: PartitionResult = { pending: [], indexed: [] };
    for (const vessel of vessels) {
      (this.contains(vessel.id) ? result.indexed : result.pending).push(vessel);
    }
    return result;
  }

  /**
   * Persist pending ids. Returns false when there was nothing to write.
   */
  async flush(): Promise<boolean> {
    if (this.pending.size === 0) return false;
    const latest = await this.readDocument();
    const merged = new Set<VesselId>([...latest, ...this.confirmed, ...this.pending]);
    await this.writeDocument(merged);
    console.log(`💾 Dedup index updated: ${merged.size} vessel(s) (${this.pending.size} new)`);
    this.confirmed = merged;
    this.pending.clear();
    return true;
  }

  /**
   * Replace the index with the vessel folders found under the check base.
   */
  async rebuild(): Promise<Set<VesselId>> {
    console.log(`🔎 Scanning storage under "${this.options.checkBase || '/'}" for vessel folders...`);
    const found = new Set<VesselId>();
    const isVesselFolder = (name: string) => vesselIdFromFolder(name) !== null;
    for await (const key of this.store.list(this.options.checkBase, { directoriesOnly: true, stopAt: isVesselFolder })) {
      const segments = key.split('/').filter(Boolean);
      const id = vesselIdFromFolder(segments[segments.length - 1] ?? '');
      if (id) found.add(id);
    }
    await this.writeDocument(found);
    this.confirmed = found;
    this.pending.clear();
    console.log(`✅ Dedup index rebuilt: ${found.size} vessel(s)`);
    return new Set(found);
  }

  ids(): VesselId[] {
    return Array.from(new Set([...this.confirmed, ...this.pending])).sort();
  }

  private async readDocument(): Promise<Set<VesselId>> {
    let raw: Buffer | null;
    try {
      raw = await this.store.get(this.options.indexKey);
    } catch (err) {
      // Only a missing or corrupt document may read as empty
      if (isFatalError(err)) throw err;
      throw new StorageUnavailableError(`Could not read dedup index ${this.options.indexKey}: ${errorMessage(err)}`, err);
    }
    if (!raw) return new Set();
    return parseIndexDocument(raw.toString('utf-8'), this.options.indexKey);
  }

  private async writeDocument(ids: Set<VesselId>): Promise<void> {
    const doc: DedupIndexDocument = {
      lastUpdated: new Date().toISOString(),
      ids: Array.from(ids).sort(),
    };
    await this.store.put(this.options.indexKey, JSON.stringify(doc, null, 2), 'application/json');
  }
}

export function parseIndexDocument(text: string, source = 'dedup index'): Set<VesselId> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    console.warn(`⚠ Corrupt ${source} (${errorMessage(err)}); starting empty`);
    return new Set();
  }
  if (typeof parsed !== 'object' || parsed === null || !('ids' in parsed) || !Array.isArray(parsed.ids)) {
    console.warn(`⚠ Unexpected shape in ${source}; starting empty`);
    return new Set();
  }
  const ids = new Set<VesselId>();
  for (const value of parsed.ids) {
    if (typeof value === 'string' && isVesselId(value)) ids.add(value);
  }
  return ids;
}
