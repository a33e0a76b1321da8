import fetch from 'node-fetch';
import { TextDecoder } from 'node:util';
import { FetchError } from '../../core/errors.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal },
) => Promise<FetchResponseLike>;

export interface FetchPageOptions {
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

export interface FetchedPage {
  url: string;
  markup: string;
}

/** Charset label from a Content-Type header, if it names one. */
export function charsetOf(contentType: string | null): string | undefined {
  const m = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return m ? m[1] : undefined;
}

/** Decodes with the declared charset; UTF-8 when none is declared or the label is unknown. */
export function decodeBody(body: ArrayBuffer, contentType: string | null): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charsetOf(contentType) ?? 'utf-8');
  } catch (e) {
    if (!(e instanceof RangeError)) throw e;
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(body);
}

/** Prepends https:// when the address carries no http(s) scheme. */
export function normalizeUrl(input: string): string {
  const url = input.trim();
  if (!url) throw new FetchError('no address given', input);
  if (/^https?:\/\//i.test(url)) return url;
  return 'https://' + url;
}

export async function fetchPage(input: string, opts: FetchPageOptions = {}): Promise<FetchedPage> {
  const url = normalizeUrl(input);
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const doFetch: FetchLike = opts.fetchImpl ?? ((u, init) => fetch(u, init));

  let res: FetchResponseLike;
  try {
    res = await doFetch(url, {
      headers: { 'User-Agent': opts.userAgent ?? DEFAULT_USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    const reason = e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError')
      ? `timed out after ${timeoutMs} ms`
      : e instanceof Error ? e.message : String(e);
    throw new FetchError(reason, url, { cause: e });
  }
  if (!res.ok) {
    throw new FetchError(`HTTP ${res.status} ${res.statusText}`.trim(), url, { status: res.status });
  }
  const markup = decodeBody(await res.arrayBuffer(), res.headers.get('content-type'));
  return { url, markup };
}
