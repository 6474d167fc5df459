import * as cheerio from 'cheerio';
import type { ScraperConfig } from './config';
import type { PageSource } from './session';
import type { DiscoveryResult, PhotoId, VesselId } from './types';
import { chunk } from './utils';

export type SortOrder = 'newest' | 'oldest' | 'popular';

export const PRIMARY_SORT: SortOrder = 'newest';
export const ALTERNATE_SORTS: SortOrder[] = ['oldest', 'popular'];

const PHOTO_LINK = /\/photos\/(\d+)(?:[/?#]|$)/;
const MIN_PHOTO_ID_LENGTH = 4;

// First match wins
const TOTAL_PATTERNS = [/(\d[\d,]*)\s+photos?\s+found/i, /found\s+(\d[\d,]*)\s+photos?/i];

export interface GalleryPage {
  photoIds: Set<PhotoId>;
  /** -1 when the page does not state a total. */
  reportedTotal: number;
}

export type DiscoveryConfig = Pick<
  ScraperConfig,
  | 'baseUrl'
  | 'maxPhotosPerVessel'
  | 'galleryPageSize'
  | 'maxGalleryPages'
  | 'alternateSortMaxPages'
  | 'galleryConcurrency'
>;

export function buildGalleryUrl(baseUrl: string, vesselId: VesselId, sortBy: SortOrder = PRIMARY_SORT, page = 1): string {
  const params = new URLSearchParams({
    shipName: '',
    shipNameSearchMode: 'exact',
    imo: vesselId,
    mmsi: '',
    eni: '',
    callSign: '',
    category: '',
    user: '',
    country: '',
    location: '',
    viewType: 'normal',
    sortBy,
    page: String(page),
  });
  return `${baseUrl}/photos/gallery?${params.toString()}`;
}

export function extractPhotoIds($: cheerio.CheerioAPI): Set<PhotoId> {
  const ids = new Set<PhotoId>();
  $('a[href]').each((_, elem) => {
    const href = $(elem).attr('href') || '';
    const match = href.match(PHOTO_LINK);
    if (match && match[1].length >= MIN_PHOTO_ID_LENGTH) {
      ids.add(match[1]);
    }
  });
  return ids;
}

export function extractReportedTotal(text: string): number {
  for (const pattern of TOTAL_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      const value = parseInt(match[1].replace(/,/g, ''), 10);
      if (!Number.isNaN(value)) return value;
    }
  }
  return -1;
}

export function parseGalleryPage(html: string): GalleryPage {
  const $ = cheerio.load(html);
  const text = $.root().text().replace(/\s+/g, ' ');
  return {
    photoIds: extractPhotoIds($),
    reportedTotal: extractReportedTotal(text),
  };
}

/** Pages to fetch for one sort order, page 1 included. */
export function pagesNeeded(page1Count: number, reportedTotal: number, target: number, pageSize: number, maxPages: number): number {
  if (page1Count === 0 || page1Count < pageSize) return 1;
  if (reportedTotal > 0) {
    return Math.max(1, Math.min(maxPages, Math.ceil(Math.min(target, reportedTotal) / page1Count)));
  }
  // Full page and no total: the cap is the only bound we have
  return maxPages;
}

interface SortSearch {
  /** Page 1 answered (even if empty). */
  reachable: boolean;
  page1Empty: boolean;
  bestTotal: number;
  pagesFetched: number;
}

/**
 * Finds photo ids for one vessel by paging through its gallery listing.
 */
export class GalleryDiscovery {
  constructor(
    private readonly pages: PageSource,
    private readonly config: DiscoveryConfig,
  ) {}

  async discover(vesselId: VesselId): Promise<DiscoveryResult> {
    const target = this.config.maxPhotosPerVessel;
    const collected = new Set<PhotoId>();
    const errors: string[] = [];

    console.log(`🔍 Searching for IMO ${vesselId}...`);

    const primary = await this.searchSortOrder(vesselId, PRIMARY_SORT, this.config.maxGalleryPages, target, collected, errors);
    let pagesFetched = primary.pagesFetched;
    let bestTotal = primary.bestTotal;

    if (!primary.reachable) {
      return { photoIds: [], totalReported: -1, pagesFetched, errors };
    }
    if (primary.page1Empty) {
      console.log(`  No photos found for IMO ${vesselId}`);
      return { photoIds: [], totalReported: 0, pagesFetched, errors };
    }
    if (bestTotal > 0) {
      console.log(`  📊 Site reports ${bestTotal} photos for IMO ${vesselId}`);
    }

    // Alternate sorts only help when the site told us more exist
    const goal = bestTotal > 0 ? Math.min(target, bestTotal) : collected.size;
    if (collected.size < goal) {
      for (const sortBy of ALTERNATE_SORTS) {
        const before = collected.size;
        const alt = await this.searchSortOrder(vesselId, sortBy, this.config.alternateSortMaxPages, target, collected, errors);
        pagesFetched += alt.pagesFetched;
        bestTotal = Math.max(bestTotal, alt.bestTotal);
        if (collected.size > before) {
          console.log(`  ➕ ${collected.size - before} more photo(s) from sort "${sortBy}"`);
        }
        if (collected.size >= goal) break;
      }
    }

    const photoIds = Array.from(collected).slice(0, target);
    const totalReported = bestTotal > 0 ? bestTotal : collected.size;
    console.log(`  📷 Collected ${photoIds.length} photo IDs for IMO ${vesselId}`);
    return { photoIds, totalReported, pagesFetched, errors };
  }

  /**
   * Search one sort order, adding new ids into `collected`. Pages after the
   * first go out in waves of `galleryConcurrency`; the target is checked
   * between waves, never mid-wave.
   */
  private async searchSortOrder(
    vesselId: VesselId,
    sortBy: SortOrder,
    maxPages: number,
    target: number,
    collected: Set<PhotoId>,
    errors: string[],
  ): Promise<SortSearch> {
    const first = await this.fetchPage(vesselId, sortBy, 1, errors);
    if (!first) {
      return { reachable: false, page1Empty: false, bestTotal: -1, pagesFetched: 0 };
    }

    first.photoIds.forEach((id) => collected.add(id));
    let bestTotal = first.reportedTotal;
    const page1Count = first.photoIds.size;
    if (page1Count === 0) {
      return { reachable: true, page1Empty: true, bestTotal: Math.max(bestTotal, 0), pagesFetched: 1 };
    }

    const lastPage = pagesNeeded(page1Count, bestTotal, target, this.config.galleryPageSize, maxPages);
    let pagesFetched = 1;
    const remaining = Array.from({ length: Math.max(0, lastPage - 1) }, (_, i) => i + 2);

    for (const wave of chunk(remaining, Math.max(1, this.config.galleryConcurrency))) {
      if (collected.size >= target) break;
      const results = await Promise.all(wave.map((page) => this.fetchPage(vesselId, sortBy, page, errors)));
      for (const page of results) {
        if (!page) continue;
        pagesFetched += 1;
        page.photoIds.forEach((id) => collected.add(id));
        bestTotal = Math.max(bestTotal, page.reportedTotal);
      }
    }

    return { reachable: true, page1Empty: false, bestTotal, pagesFetched };
  }

  private async fetchPage(vesselId: VesselId, sortBy: SortOrder, page: number, errors: string[]): Promise<GalleryPage | null> {
    const url = buildGalleryUrl(this.config.baseUrl, vesselId, sortBy, page);
    const res = await this.pages.get(url);
    if (!res || res.status !== 200) {
      const reason = res ? `status ${res.status}` : 'no response';
      errors.push(`gallery page ${page} (${sortBy}): ${reason}`);
      console.warn(`  ⚠ Gallery page ${page} (${sortBy}) for IMO ${vesselId} unavailable: ${reason}`);
      return null;
    }
    return parseGalleryPage(res.body.toString('utf-8'));
  }
}
