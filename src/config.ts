import path from 'path';
import dotenv from 'dotenv';

// Load .env from project root explicitly to work when executed from dist/
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

type Env = Record<string, string | undefined>;

export interface StorageConfig {
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
  supabaseBucket: string;
  /** Folder new photos are written under. */
  uploadBase: string;
  /** Folder scanned when rebuilding the dedup index. */
  checkBase: string;
  indexKey: string;
}

export interface ScraperConfig {
  baseUrl: string;
  maxPhotosPerVessel: number;
  /** Photos on a full gallery page; fewer means page 1 was the last page. */
  galleryPageSize: number;
  maxGalleryPages: number;
  alternateSortMaxPages: number;
  maxRetries: number;
  retryBackoffMs: number;
  retryJitterMs: number;
  requestDelayMinMs: number;
  requestDelayMaxMs: number;
  galleryConcurrency: number;
  downloadConcurrency: number;
  sessionPoolSize: number;
  batchSize: number;
  batchConcurrency: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
}

export type ScraperMode = 'api' | 'static';

export interface VesselSourceConfig {
  mode: ScraperMode;
  datalasticApiKey?: string;
  datalasticBaseUrl: string;
  portLat: number;
  portLon: number;
  searchRadiusKm: number;
}

export const DEFAULT_SCRAPER_CONFIG: ScraperConfig = {
  baseUrl: 'https://www.shipspotting.com',
  maxPhotosPerVessel: 40,
  galleryPageSize: 12,
  maxGalleryPages: 10,
  alternateSortMaxPages: 2,
  maxRetries: 3,
  retryBackoffMs: 1000,
  retryJitterMs: 1000,
  requestDelayMinMs: 50,
  requestDelayMaxMs: 120,
  galleryConcurrency: 4,
  downloadConcurrency: 20,
  sessionPoolSize: 2,
  batchSize: 10,
  batchConcurrency: 10,
  requestTimeoutMs: 15000,
  downloadTimeoutMs: 10000,
};

function intEnv(env: Env, name: string, defaultValue: number, min = 1): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid value for ${name}: "${raw}" (expected an integer >= ${min})`);
  }
  return value;
}

function floatEnv(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const value = Number(raw.trim());
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid value for ${name}: "${raw}" (expected a number)`);
  }
  return value;
}

export function loadStorageConfig(env: Env = process.env): StorageConfig {
  const required = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'SUPABASE_BUCKET'] as const;
  const missing = required.filter((key) => !env[key]);
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(', ')}`);
  }
  const uploadBase = (env.GALLERY_UPLOAD_BASE || 'vessel-gallery').replace(/^\/+|\/+$/g, '');
  return {
    supabaseUrl: env.SUPABASE_URL ?? '',
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? '',
    supabaseBucket: env.SUPABASE_BUCKET ?? '',
    uploadBase,
    checkBase: (env.GALLERY_CHECK_BASE || uploadBase).replace(/^\/+|\/+$/g, ''),
    indexKey: env.DEDUP_INDEX_KEY || 'imo_gallery.json',
  };
}

export function loadScraperConfig(env: Env = process.env): ScraperConfig {
  const d = DEFAULT_SCRAPER_CONFIG;
  const config: ScraperConfig = {
    baseUrl: (env.SHIPSPOTTING_BASE_URL || d.baseUrl).replace(/\/+$/, ''),
    maxPhotosPerVessel: intEnv(env, 'MAX_PHOTOS_PER_IMO', d.maxPhotosPerVessel),
    galleryPageSize: intEnv(env, 'GALLERY_PAGE_SIZE', d.galleryPageSize),
    maxGalleryPages: intEnv(env, 'MAX_GALLERY_PAGES', d.maxGalleryPages),
    alternateSortMaxPages: intEnv(env, 'ALT_SORT_MAX_PAGES', d.alternateSortMaxPages),
    maxRetries: intEnv(env, 'MAX_RETRIES', d.maxRetries),
    retryBackoffMs: intEnv(env, 'RETRY_BACKOFF_MS', d.retryBackoffMs, 0),
    retryJitterMs: intEnv(env, 'RETRY_JITTER_MS', d.retryJitterMs, 0),
    requestDelayMinMs: intEnv(env, 'REQUEST_DELAY_MIN_MS', d.requestDelayMinMs, 0),
    requestDelayMaxMs: intEnv(env, 'REQUEST_DELAY_MAX_MS', d.requestDelayMaxMs, 0),
    galleryConcurrency: intEnv(env, 'GALLERY_CONCURRENCY', d.galleryConcurrency),
    downloadConcurrency: intEnv(env, 'DOWNLOAD_CONCURRENCY', d.downloadConcurrency),
    sessionPoolSize: intEnv(env, 'SESSION_POOL_SIZE', d.sessionPoolSize),
    batchSize: intEnv(env, 'BATCH_SIZE', d.batchSize),
    batchConcurrency: intEnv(env, 'BATCH_CONCURRENCY', d.batchConcurrency),
    requestTimeoutMs: intEnv(env, 'REQUEST_TIMEOUT_MS', d.requestTimeoutMs),
    downloadTimeoutMs: intEnv(env, 'DOWNLOAD_TIMEOUT_MS', d.downloadTimeoutMs),
  };
  if (config.requestDelayMaxMs < config.requestDelayMinMs) {
    throw new Error('REQUEST_DELAY_MAX_MS must not be lower than REQUEST_DELAY_MIN_MS');
  }
  return config;
}

export function loadVesselSourceConfig(env: Env = process.env): VesselSourceConfig {
  const rawMode = (env.SCRAPER_MODE || 'static').trim().toLowerCase();
  if (rawMode !== 'api' && rawMode !== 'static') {
    throw new Error(`Invalid SCRAPER_MODE: "${rawMode}" (expected "api" or "static")`);
  }
  return {
    mode: rawMode,
    datalasticApiKey: env.DATALASTIC_API_KEY || undefined,
    datalasticBaseUrl: (env.DATALASTIC_BASE_URL || 'https://api.datalastic.com/api/v0').replace(/\/+$/, ''),
    // Haifa Bay
    portLat: floatEnv(env, 'PORT_LAT', 32.8154),
    portLon: floatEnv(env, 'PORT_LON', 35.0043),
    searchRadiusKm: intEnv(env, 'SEARCH_RADIUS_KM', 15),
  };
}
