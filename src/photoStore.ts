import crypto from 'crypto';
import sizeOf from 'image-size';
import pLimit from 'p-limit';
import { errorMessage, isFatalError } from './errors';
import type { HttpClient } from './session';
import type { FetchedResponse, PhotoId, PhotoMetadata, StoredPhoto, VesselDetails, VesselId, VesselStoreResult } from './types';
import type { ObjectStore } from './storage';
import { debug, randomBetween, sleep } from './utils';
import { vesselFolderName } from './vesselId';

export interface PhotoStoreOptions {
  baseUrl: string;
  uploadBase: string;
  downloadConcurrency: number;
  /** Pause before each download, in ms. */
  downloadDelayMinMs?: number;
  downloadDelayMaxMs?: number;
}

export function photoPageUrl(baseUrl: string, photoId: PhotoId): string {
  return `${baseUrl}/photos/${photoId}`;
}

/**
 * Image URLs for a photo id, most likely first. The structured path nests
 * the last three digits in reverse order: 1234567 -> big/7/6/5/1234567.jpg
 */
export function candidateImageUrls(baseUrl: string, photoId: PhotoId): string[] {
  const urls: string[] = [];
  if (photoId.length >= 3) {
    const path = photoId.slice(-3).split('').reverse().join('/');
    urls.push(`${baseUrl}/photos/big/${path}/${photoId}.jpg`);
  }
  urls.push(`${baseUrl}/photos/big/${photoId}.jpg`, `${baseUrl}/photos/large/${photoId}.jpg`);
  return urls;
}

/** Keys depend only on the two ids; the content type never changes them. */
export function photoKeys(uploadBase: string, vesselId: VesselId, photoId: PhotoId): { imageKey: string; metadataKey: string } {
  const folder = [uploadBase, vesselFolderName(vesselId)].filter(Boolean).join('/');
  return {
    imageKey: `${folder}/${photoId}.jpg`,
    metadataKey: `${folder}/${photoId}.json`,
  };
}

function isImage(contentType: string): boolean {
  return contentType.toLowerCase().includes('image');
}

function imageDimensions(body: Buffer): { width?: number; height?: number } {
  try {
    const dimensions = sizeOf(body);
    return { width: dimensions.width, height: dimensions.height };
  } catch (err) {
    debug(`Could not read image dimensions: ${errorMessage(err)}`);
    return {};
  }
}

/**
 * Downloads photos and writes them, with a metadata document, to the
 * object store. All downloads share one concurrency limit.
 */
export class PhotoStore {
  private readonly limit: ReturnType<typeof pLimit>;
  private fatal: unknown = null;

  constructor(
    private readonly client: HttpClient,
    private readonly store: ObjectStore,
    private readonly options: PhotoStoreOptions,
  ) {
    this.limit = pLimit(options.downloadConcurrency);
  }

  /**
   * Try each candidate URL until one answers 200 with an image. Returns
   * null when none does. Storage errors propagate.
   */
  async storePhoto(vesselId: VesselId, photoId: PhotoId, vessel?: VesselDetails): Promise<StoredPhoto | null> {
    for (const imageUrl of candidateImageUrls(this.options.baseUrl, photoId)) {
      let res: FetchedResponse;
      try {
        res = await this.client.fetch(imageUrl);
      } catch (err) {
        debug(`Failed to download ${imageUrl}: ${errorMessage(err)}`);
        continue;
      }
      if (res.status !== 200 || !isImage(res.contentType)) continue;

      const contentType = res.contentType.split(';')[0].trim();
      const { imageKey, metadataKey } = photoKeys(this.options.uploadBase, vesselId, photoId);
      const metadata: PhotoMetadata = {
        vesselId,
        photoId,
        imageUrl,
        pageUrl: photoPageUrl(this.options.baseUrl, photoId),
        scrapedAt: new Date().toISOString(),
        contentType,
        byteSize: res.body.byteLength,
        sha256: crypto.createHash('sha256').update(res.body).digest('hex'),
        ...imageDimensions(res.body),
        ...(vessel ? { vessel } : {}),
      };

      await this.store.put(imageKey, res.body, contentType);
      await this.store.put(metadataKey, JSON.stringify(metadata, null, 2), 'application/json');
      return { imageKey, metadataKey, metadata };
    }
    return null;
  }

  /**
   * Store every photo of one vessel. Item failures are counted; a fatal
   * storage error stops queued downloads and is rethrown.
   */
  async storeVesselPhotos(vesselId: VesselId, photoIds: PhotoId[], vessel?: VesselDetails): Promise<VesselStoreResult> {
    const errors: string[] = [];
    let stored = 0;
    let processed = 0;

    const task = (photoId: PhotoId) =>
      this.limit(async () => {
        if (this.fatal) throw this.fatal;
        await sleep(randomBetween(this.options.downloadDelayMinMs ?? 0, this.options.downloadDelayMaxMs ?? 0));
        try {
          const result = await this.storePhoto(vesselId, photoId, vessel);
          if (result) {
            stored += 1;
          } else {
            errors.push(`photo ${photoId}: no image at any candidate URL`);
          }
        } catch (err) {
          if (isFatalError(err)) {
            this.fatal = err;
            throw err;
          }
          errors.push(`photo ${photoId}: ${errorMessage(err)}`);
        } finally {
          processed += 1;
          if (processed % 10 === 0 || processed === photoIds.length) {
            console.log(`  Progress: ${processed}/${photoIds.length} images processed, ${stored} stored`);
          }
        }
      });

    const settled = await Promise.allSettled(photoIds.map(task));
    for (const outcome of settled) {
      if (outcome.status === 'rejected') throw outcome.reason;
    }
    return { found: photoIds.length, stored, errors };
  }
}
