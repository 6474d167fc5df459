import { describe, it, expect } from 'vitest';
import { DEFAULT_SCRAPER_CONFIG, loadScraperConfig, loadStorageConfig, loadVesselSourceConfig } from './config';

const storageEnv = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
  SUPABASE_BUCKET: 'vessels',
};

describe('loadStorageConfig', () => {
  it('lists every missing required variable', () => {
    expect(() => loadStorageConfig({ SUPABASE_URL: 'http://localhost:54321' })).toThrow(
      'Missing required env vars: SUPABASE_SERVICE_ROLE_KEY, SUPABASE_BUCKET',
    );
  });

  it('applies folder defaults', () => {
    const config = loadStorageConfig(storageEnv);
    expect(config.uploadBase).toBe('vessel-gallery');
    expect(config.checkBase).toBe('vessel-gallery');
    expect(config.indexKey).toBe('imo_gallery.json');
  });

  it('trims slashes from folder settings', () => {
    const config = loadStorageConfig({ ...storageEnv, GALLERY_UPLOAD_BASE: '/photos/new/', GALLERY_CHECK_BASE: 'photos/' });
    expect(config.uploadBase).toBe('photos/new');
    expect(config.checkBase).toBe('photos');
  });
});

describe('loadScraperConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadScraperConfig({})).toEqual(DEFAULT_SCRAPER_CONFIG);
  });

  it('parses overrides and strips the trailing slash of the base url', () => {
    const config = loadScraperConfig({ SHIPSPOTTING_BASE_URL: 'http://localhost:8080/', MAX_PHOTOS_PER_IMO: '5', RETRY_BACKOFF_MS: '0' });
    expect(config.baseUrl).toBe('http://localhost:8080');
    expect(config.maxPhotosPerVessel).toBe(5);
    expect(config.retryBackoffMs).toBe(0);
  });

  it('rejects non-numeric and out-of-range values', () => {
    expect(() => loadScraperConfig({ MAX_RETRIES: 'three' })).toThrow(
      'Invalid value for MAX_RETRIES: "three" (expected an integer >= 1)',
    );
    expect(() => loadScraperConfig({ BATCH_SIZE: '0' })).toThrow('Invalid value for BATCH_SIZE');
    expect(() => loadScraperConfig({ REQUEST_DELAY_MIN_MS: '200', REQUEST_DELAY_MAX_MS: '100' })).toThrow(
      'REQUEST_DELAY_MAX_MS must not be lower than REQUEST_DELAY_MIN_MS',
    );
  });
});

describe('loadVesselSourceConfig', () => {
  it('defaults to static mode around Haifa Bay', () => {
    const config = loadVesselSourceConfig({});
    expect(config.mode).toBe('static');
    expect(config.portLat).toBe(32.8154);
    expect(config.portLon).toBe(35.0043);
    expect(config.searchRadiusKm).toBe(15);
    expect(config.datalasticApiKey).toBeUndefined();
  });

  it('rejects unknown modes', () => {
    expect(() => loadVesselSourceConfig({ SCRAPER_MODE: 'hardcoded' })).toThrow('Invalid SCRAPER_MODE: "hardcoded"');
  });
});
