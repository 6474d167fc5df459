/**
 * In-process stand-ins shared by the test suites.
 */

import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import type { HttpClient, HttpSession, PageSource, SessionCredentials } from './session';
import type { FetchedResponse } from './types';

export type Reply = { status: number; contentType?: string; body?: Buffer | string; headers?: Record<string, string | string[]> };

export function response(url: string, reply: Reply): FetchedResponse {
  const body = reply.body ?? '';
  return {
    url,
    status: reply.status,
    contentType: reply.contentType ?? 'text/html',
    body: Buffer.isBuffer(body) ? body : Buffer.from(body),
  };
}

/**
 * Session that answers from a script; an `Error` entry is thrown instead.
 * The last entry repeats once the script is used up.
 */
export class ScriptedSession implements HttpSession {
  readonly requests: string[] = [];

  constructor(
    readonly label: string,
    private readonly script: Array<Reply | Error>,
    private readonly cookie = '',
  ) {}

  async fetch(url: string): Promise<FetchedResponse> {
    this.requests.push(url);
    const step = this.script[Math.min(this.requests.length - 1, this.script.length - 1)];
    if (step instanceof Error) throw step;
    return response(url, step);
  }

  credentials(): SessionCredentials {
    return { headers: { 'User-Agent': this.label }, cookie: this.cookie };
  }
}

/** Routes by URL; unknown URLs answer 404. */
export class RoutedClient implements HttpClient, PageSource {
  readonly requests: string[] = [];

  constructor(private readonly routes: Map<string, Reply | Error>) {}

  async fetch(url: string): Promise<FetchedResponse> {
    this.requests.push(url);
    const route = this.routes.get(url);
    if (route instanceof Error) throw route;
    return response(url, route ?? { status: 404 });
  }

  async get(url: string): Promise<FetchedResponse | null> {
    const route = this.routes.get(url);
    if (route instanceof Error) {
      this.requests.push(url);
      return null;
    }
    return this.fetch(url);
  }
}

export function galleryHtml(photoIds: string[], totalText = ''): string {
  const links = photoIds.map((id) => `<div class="photo"><a href="/photos/${id}">Photo ${id}</a></div>`).join('\n');
  return `<html><body><header><a href="/photos/gallery">Gallery</a></header><p>${totalText}</p>${links}</body></html>`;
}

/** 24-byte PNG header carrying the given dimensions. */
export function pngHeader(width: number, height: number): Buffer {
  const buf = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buf, 0);
  buf.writeUInt32BE(13, 8);
  buf.write('IHDR', 12, 'ascii');
  buf.writeUInt32BE(width, 16);
  buf.writeUInt32BE(height, 20);
  return buf;
}

/**
 * Axios adapter answering from a list of replies in order. Applies
 * `validateStatus` the way the built-in adapters do.
 */
export function scriptedAdapter(
  replies: Array<Reply | Error>,
  seen: InternalAxiosRequestConfig[] = [],
): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    const step = replies[Math.min(seen.length - 1, replies.length - 1)];
    if (step instanceof Error) {
      throw new AxiosError(step.message, 'ECONNRESET', config);
    }
    const res: AxiosResponse = {
      data: step.body ?? '',
      status: step.status,
      statusText: String(step.status),
      headers: AxiosHeaders.from({ 'content-type': step.contentType ?? 'text/html', ...step.headers }),
      config,
    };
    if (config.validateStatus && !config.validateStatus(res.status)) {
      throw new AxiosError(`Request failed with status code ${res.status}`, AxiosError.ERR_BAD_RESPONSE, config, null, res);
    }
    return res;
  };
}
