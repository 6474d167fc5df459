/** Canonical 7-digit IMO number. */
export type VesselId = string;

export type PhotoId = string;

export interface VesselDetails {
  name: string;
  vesselType: string;
  mmsi?: string;
  destination?: string;
  lat?: number;
  lon?: number;
  speed?: number;
  course?: number;
  observedAt?: string; // last position time reported by the tracker
  extractedAt: string;
}

export interface VesselRecord {
  id: VesselId;
  details?: VesselDetails;
}

export interface FetchedResponse {
  url: string;
  status: number;
  contentType: string;
  body: Buffer;
}

export interface DiscoveryResult {
  photoIds: PhotoId[];
  /** -1 unknown, 0 confirmed empty, otherwise the count the site reports. */
  totalReported: number;
  pagesFetched: number;
  errors: string[];
}

export interface PhotoMetadata {
  vesselId: VesselId;
  photoId: PhotoId;
  imageUrl: string;
  pageUrl: string;
  scrapedAt: string;
  contentType: string;
  byteSize: number;
  sha256: string;
  width?: number;
  height?: number;
  vessel?: VesselDetails;
}

export interface StoredPhoto {
  imageKey: string;
  metadataKey: string;
  metadata: PhotoMetadata;
}

export interface VesselStoreResult {
  found: number;
  stored: number;
  errors: string[];
}

export interface ScrapeResult {
  vesselId: VesselId;
  vesselName: string;
  found: number;
  stored: number;
  totalAvailable: number;
  elapsedMs: number;
  errors: string[];
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  totalVessels: number;
  skippedVessels: number;
  totalItemsStored: number;
  failedVessels: number;
  elapsedMs: number;
  indexFlushed: boolean;
  /** Set when a storage failure stopped the run after work was scheduled. */
  abortReason?: string;
  results: ScrapeResult[];
}

export interface DedupIndexDocument {
  lastUpdated: string;
  ids: VesselId[];
}
