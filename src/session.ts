/**
 * Browser-like HTTP sessions for the photo site, and a pool that retries,
 * backs off and re-establishes sessions that hit a challenge (403).
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import pLimit from 'p-limit';
import { SessionEstablishError, errorMessage } from './errors';
import type { FetchedResponse } from './types';
import { debug, randomBetween, sleep } from './utils';

// User agents for rotation
export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

export interface SessionCredentials {
  headers: Record<string, string>;
  /** Value for a `Cookie` request header; empty when the site set none. */
  cookie: string;
}

export interface HttpClient {
  fetch(url: string): Promise<FetchedResponse>;
}

export interface HttpSession extends HttpClient {
  readonly label: string;
  credentials(): SessionCredentials;
}

/** Anything discovery can page through. `null` means unavailable this run. */
export interface PageSource {
  get(url: string): Promise<FetchedResponse | null>;
}

/** Creates an established session for a pool slot; `generation` counts re-establishments. */
export type SessionFactory = (slot: number, generation: number) => Promise<HttpSession>;

export function browserHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Accept-Encoding': 'gzip, deflate',
    Connection: 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
  };
}

export function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data);
  return Buffer.alloc(0);
}

export interface BrowserSessionOptions {
  baseUrl: string;
  /** Gallery URL requested after the home page to confirm access. */
  probeUrl?: string;
  timeoutMs: number;
  /** Index into USER_AGENTS to start from. */
  userAgentOffset?: number;
  adapter?: AxiosAdapter;
}

export class BrowserSession implements HttpSession {
  readonly label: string;
  private readonly http: AxiosInstance;
  private readonly headers: Record<string, string>;
  private readonly cookies = new Map<string, string>();

  constructor(userAgent: string, options: Pick<BrowserSessionOptions, 'timeoutMs' | 'adapter'>) {
    this.label = userAgent.split(' ').slice(0, 3).join(' ');
    this.headers = browserHeaders(userAgent);
    this.http = axios.create({
      headers: this.headers,
      timeout: options.timeoutMs,
      responseType: 'arraybuffer',
      maxRedirects: 5,
      // Status handling belongs to the pool
      validateStatus: () => true,
      adapter: options.adapter,
    });
    this.http.interceptors.request.use((config) => {
      const cookie = this.cookieHeader();
      if (cookie) config.headers.set('Cookie', cookie);
      return config;
    });
    this.http.interceptors.response.use((response) => {
      this.storeCookies(response.headers['set-cookie']);
      return response;
    });
  }

  async fetch(url: string): Promise<FetchedResponse> {
    const res = await this.http.get<unknown>(url);
    return {
      url,
      status: res.status,
      contentType: String(res.headers['content-type'] ?? ''),
      body: toBuffer(res.data),
    };
  }

  credentials(): SessionCredentials {
    return { headers: { ...this.headers }, cookie: this.cookieHeader() };
  }

  /**
   * Request the home page (and the probe URL) to collect cookies.
   * Returns the status the site answered the last request with.
   */
  async warmUp(baseUrl: string, probeUrl?: string): Promise<number> {
    const home = await this.fetch(baseUrl);
    if (home.status === 403) return 403;
    if (home.status >= 400) {
      throw new SessionEstablishError(`Warm-up request to ${baseUrl} returned ${home.status}`, home.status);
    }
    if (!probeUrl) return home.status;
    const probe = await this.fetch(probeUrl);
    return probe.status;
  }

  private cookieHeader(): string {
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }

  private storeCookies(setCookie: unknown): void {
    if (!Array.isArray(setCookie)) return;
    for (const entry of setCookie) {
      if (typeof entry !== 'string') continue;
      const pair = entry.split(';')[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (value) {
        this.cookies.set(name, value);
      } else {
        this.cookies.delete(name);
      }
    }
  }
}

/**
 * Create a session and pass the warm-up. A 403 during warm-up rotates to
 * the next User-Agent once before giving up.
 */
export async function createBrowserSession(options: BrowserSessionOptions): Promise<BrowserSession> {
  const offset = options.userAgentOffset ?? 0;
  const tries = Math.min(2, USER_AGENTS.length);
  for (let i = 0; i < tries; i += 1) {
    const userAgent = USER_AGENTS[(offset + i) % USER_AGENTS.length];
    const session = new BrowserSession(userAgent, options);
    const status = await session.warmUp(options.baseUrl, options.probeUrl);
    if (status !== 403) {
      console.log(`  ✓ Session established (${session.label}..., status: ${status})`);
      return session;
    }
    console.warn(`  ⚠ Challenge (403) during warm-up with ${session.label}..., rotating User-Agent`);
  }
  throw new SessionEstablishError(`Could not pass the challenge at ${options.baseUrl}`, 403);
}

export interface SessionPoolOptions {
  size: number;
  /** Attempt ceiling per `get`. */
  maxRetries: number;
  backoffBaseMs: number;
  jitterMs: number;
  requestDelayMinMs: number;
  requestDelayMaxMs: number;
  /** Global cap on in-flight requests, independent of pool size. */
  concurrency: number;
}

/**
 * Round-robins requests over independently established sessions. A single
 * session is a pool of size 1.
 */
export class SessionPool implements PageSource {
  private readonly slots: HttpSession[];
  private readonly generations: number[];
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly swapLock = pLimit(1);
  private nextSlot = 0;

  private constructor(
    private readonly factory: SessionFactory,
    slots: HttpSession[],
    private readonly options: SessionPoolOptions,
  ) {
    this.slots = slots;
    this.generations = slots.map(() => 0);
    this.limit = pLimit(options.concurrency);
  }

  static async create(factory: SessionFactory, options: SessionPoolOptions): Promise<SessionPool> {
    const size = Math.max(1, options.size);
    console.log(`🔐 Establishing ${size} browser session(s)...`);
    const settled = await Promise.allSettled(Array.from({ length: size }, (_, slot) => factory(slot, 0)));
    const slots: HttpSession[] = [];
    const failures: string[] = [];
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        slots.push(result.value);
      } else {
        failures.push(errorMessage(result.reason));
      }
    }
    if (slots.length === 0) {
      throw new SessionEstablishError(`Failed to establish any session: ${failures[0] ?? 'unknown error'}`);
    }
    if (failures.length) {
      console.warn(`  ⚠ ${failures.length}/${size} session(s) failed to establish, continuing with ${slots.length}`);
    }
    return new SessionPool(factory, slots, options);
  }

  get size(): number {
    return this.slots.length;
  }

  session(slot: number): HttpSession {
    return this.slots[slot];
  }

  credentials(): SessionCredentials {
    return this.slots[0].credentials();
  }

  get(url: string): Promise<FetchedResponse | null> {
    return this.limit(() => this.getWithRetry(url));
  }

  /**
   * Replace the session in `slot` unless a concurrent caller already did.
   * The swap happens under the pool lock so other slots keep serving.
   */
  async reestablish(slot: number, stale: HttpSession): Promise<HttpSession> {
    return this.swapLock(async () => {
      const current = this.slots[slot];
      if (current !== stale) return current;
      const generation = this.generations[slot] + 1;
      const fresh = await this.factory(slot, generation);
      this.generations[slot] = generation;
      this.slots[slot] = fresh;
      console.log(`  🔄 Session ${slot + 1} re-established (${fresh.label})`);
      return fresh;
    });
  }

  backoffDelay(attempt: number): number {
    return this.options.backoffBaseMs * 2 ** attempt + randomBetween(0, this.options.jitterMs);
  }

  private async getWithRetry(url: string): Promise<FetchedResponse | null> {
    const { maxRetries } = this.options;
    const slot = this.nextSlot;
    this.nextSlot = (this.nextSlot + 1) % this.slots.length;

    await sleep(randomBetween(this.options.requestDelayMinMs, this.options.requestDelayMaxMs));

    for (let attempt = 0; attempt < maxRetries; attempt += 1) {
      const isLast = attempt === maxRetries - 1;
      const session = this.slots[slot];

      let res: FetchedResponse;
      try {
        res = await session.fetch(url);
      } catch (err) {
        debug(`Request failed (${errorMessage(err)}): ${url}`);
        if (!isLast) await sleep(this.backoffDelay(attempt));
        continue;
      }

      if (res.status === 429) {
        const wait = this.backoffDelay(attempt);
        console.warn(`  ⚠ Rate limited (429), backing off ${(wait / 1000).toFixed(1)}s`);
        if (!isLast) await sleep(wait);
        continue;
      }

      if (res.status === 403) {
        console.warn(`  ⚠ Got 403 on attempt ${attempt + 1}, re-establishing session ${slot + 1}`);
        try {
          await this.reestablish(slot, session);
        } catch (err) {
          console.warn(`  ⚠ Re-establishing session ${slot + 1} failed: ${errorMessage(err)}`);
          if (!isLast) await sleep(this.backoffDelay(attempt));
        }
        continue;
      }

      if (res.status >= 500) {
        debug(`Server error ${res.status}: ${url}`);
        if (!isLast) await sleep(this.backoffDelay(attempt));
        continue;
      }

      return res;
    }

    console.error(`  ✗ Failed after ${maxRetries} attempts: ${url}`);
    return null;
  }
}
