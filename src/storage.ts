import type { SupabaseClient } from '@supabase/supabase-js';
import { StorageUnavailableError, errorMessage } from './errors';

export interface ListOptions {
  /** Yield folder keys (ending in `/`) instead of object keys. */
  directoriesOnly?: boolean;
  /** Folders whose name matches are yielded but not descended into. */
  stopAt?: (folderName: string) => boolean;
}

export interface ObjectStore {
  /** Create or overwrite. */
  put(key: string, body: Buffer | string, contentType: string): Promise<void>;
  get(key: string): Promise<Buffer | null>;
  /** Recursive listing below `prefix`. */
  list(prefix: string, options?: ListOptions): AsyncIterable<string>;
  checkConnection(): Promise<void>;
}

type StorageBucket = ReturnType<SupabaseClient['storage']['from']>;

interface ListedEntry {
  name: string;
  isFolder: boolean;
}

const LIST_PAGE_SIZE = 1000;

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  // Upload errors carry the API body, where the code is a string
  if ('statusCode' in error && (typeof error.statusCode === 'string' || typeof error.statusCode === 'number')) {
    const code = Number(error.statusCode);
    if (Number.isInteger(code)) return code;
  }
  if ('originalError' in error) return statusOf(error.originalError);
  return undefined;
}

function isNotFound(error: { message: string }): boolean {
  return statusOf(error) === 404 || /not.?found/i.test(error.message);
}

/**
 * Errors without an HTTP status are transport failures; 401/403 mean the
 * service key or bucket policy is wrong. Both would lose every write.
 */
function storageFailure(context: string, error: { message: string }): Error {
  const status = statusOf(error);
  if (status === undefined || status === 401 || status === 403) {
    return new StorageUnavailableError(`${context}: ${error.message}`, error);
  }
  return new Error(`${context}: ${error.message}`);
}

/** A thrown error (rather than a returned one) never reached the API. */
async function request<T>(context: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    throw new StorageUnavailableError(`${context}: ${errorMessage(err)}`, err);
  }
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

export class SupabaseObjectStore implements ObjectStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string,
  ) {}

  private get files(): StorageBucket {
    return this.client.storage.from(this.bucket);
  }

  async put(key: string, body: Buffer | string, contentType: string): Promise<void> {
    const context = `Supabase upload failed for ${key}`;
    const { error } = await request(context, () => this.files.upload(key, body, { contentType, upsert: true }));
    if (error) {
      throw storageFailure(context, error);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    const context = `Supabase download failed for ${key}`;
    const { data, error } = await request(context, () => this.files.download(key));
    if (error) {
      if (isNotFound(error)) return null;
      throw storageFailure(context, error);
    }
    if (!data) return null;
    return Buffer.from(await data.arrayBuffer());
  }

  async *list(prefix: string, options: ListOptions = {}): AsyncGenerator<string> {
    const queue = [trimSlashes(prefix)];
    for (let i = 0; i < queue.length; i += 1) {
      const dir = queue[i];
      const entries = await this.listDirectory(dir);
      for (const entry of entries) {
        const key = dir ? `${dir}/${entry.name}` : entry.name;
        if (entry.isFolder) {
          if (options.directoriesOnly) yield `${key}/`;
          if (!options.stopAt?.(entry.name)) queue.push(key);
        } else if (!options.directoriesOnly) {
          yield key;
        }
      }
    }
  }

  async checkConnection(): Promise<void> {
    const context = `Bucket '${this.bucket}' is not accessible`;
    const { error } = await request(context, () => this.client.storage.getBucket(this.bucket));
    if (error) {
      throw new StorageUnavailableError(`${context}: ${error.message}`, error);
    }
    console.log(`✅ Storage bucket '${this.bucket}' is accessible`);
  }

  private async listDirectory(dir: string): Promise<ListedEntry[]> {
    const entries: ListedEntry[] = [];
    for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
      const context = `Supabase list failed for ${dir || '/'}`;
      const { data, error } = await request(context, () =>
        this.files.list(dir, {
          limit: LIST_PAGE_SIZE,
          offset,
          sortBy: { column: 'name', order: 'asc' },
        }),
      );
      if (error) {
        throw storageFailure(context, error);
      }
      const page = data ?? [];
      // Folders come back without an id
      entries.push(...page.map((item) => ({ name: item.name, isFolder: !item.id })));
      if (page.length < LIST_PAGE_SIZE) break;
    }
    return entries;
  }
}

/**
 * Process-local store. Backs `--dry-run` and the tests.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, { body: Buffer; contentType: string }>();
  readonly writes: string[] = [];
  private unavailable = false;

  setUnavailable(flag: boolean): void {
    this.unavailable = flag;
  }

  async put(key: string, body: Buffer | string, contentType: string): Promise<void> {
    this.ensureAvailable();
    this.objects.set(key, { body: Buffer.isBuffer(body) ? body : Buffer.from(body), contentType });
    this.writes.push(key);
  }

  async get(key: string): Promise<Buffer | null> {
    this.ensureAvailable();
    return this.objects.get(key)?.body ?? null;
  }

  async *list(prefix: string, options: ListOptions = {}): AsyncGenerator<string> {
    this.ensureAvailable();
    const root = trimSlashes(prefix);
    const keys = Array.from(this.objects.keys())
      .filter((key) => !root || key.startsWith(`${root}/`))
      .sort();
    const start = root ? root.split('/').length : 0;
    const folders = new Set<string>();
    const files: string[] = [];
    for (const key of keys) {
      const parts = key.split('/');
      let stopped = false;
      for (let depth = start + 1; depth < parts.length && !stopped; depth += 1) {
        folders.add(`${parts.slice(0, depth).join('/')}/`);
        stopped = options.stopAt?.(parts[depth - 1]) ?? false;
      }
      if (!stopped) files.push(key);
    }
    yield* options.directoriesOnly ? Array.from(folders).sort() : files;
  }

  async checkConnection(): Promise<void> {
    this.ensureAvailable();
  }

  private ensureAvailable(): void {
    if (this.unavailable) {
      throw new StorageUnavailableError('In-memory store marked unavailable');
    }
  }
}
