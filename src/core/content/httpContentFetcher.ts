import { Client, interceptors, Dispatcher } from 'undici';
const { redirect } = interceptors;
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import { getEnvironment } from '../../config/environment';
import { MAX_REDIRECTIONS, USER_AGENT } from '../../config/constants';
import { withTiming, createChildLogger, generateCorrelationId } from '../../utils/logger';
import { TimeoutError, NetworkError, errorMessage } from '../errors';

export interface FetchOptions {
  timeoutMs?: number;
  method?: 'GET' | 'HEAD';
  headers?: Record<string, string>;
  correlationId?: string;
}

export interface FetchResult {
  statusCode: number;
  bodyText: string;
  contentType?: string;
}

export interface BinaryFetchResult {
  statusCode: number;
  body: Buffer;
  contentType?: string;
}

/** Page fetcher seam used by every extractor; tests inject their own. */
export type PageFetcher = (url: string, options?: FetchOptions) => Promise<FetchResult>;

const DEFAULT_HEADERS: Record<string, string> = {
  'user-agent': USER_AGENT,
  accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'accept-language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
  'accept-encoding': 'gzip, br, deflate',
};

interface RawResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: Buffer;
}

function headerValue(
  headers: Record<string, string | string[] | undefined>,
  name: string
): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function decodeBody(buf: Buffer, encoding: string): Buffer {
  if (encoding.includes('br')) return brotliDecompressSync(buf);
  if (encoding.includes('gzip')) return gunzipSync(buf);
  if (encoding.includes('deflate')) return inflateSync(buf);
  return buf;
}

async function closeClient(client: Dispatcher | null): Promise<void> {
  if (!client) return;
  await Promise.race([
    client.close(),
    new Promise<void>((_, reject) =>
      setTimeout(() => reject(new Error('Client close timeout')), 2000).unref()
    ),
  ]);
}

async function performRequest(url: string, options: FetchOptions): Promise<RawResponse> {
  const { REQUEST_TIMEOUT_MS } = getEnvironment();
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  if (!/^https?:\/\//i.test(url)) {
    throw new NetworkError('Only http(s) schemes are allowed');
  }

  const log = createChildLogger(options.correlationId ?? generateCorrelationId());
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | null = null;
  let client: Dispatcher | null = null;

  try {
    const urlObj = new URL(url);
    const path = urlObj.pathname + urlObj.search;

    client = new Client(urlObj.origin).compose(redirect({ maxRedirections: MAX_REDIRECTIONS }));

    const requestPromise = client.request({
      path,
      method: options.method ?? 'GET',
      signal: controller.signal,
      headers: { ...DEFAULT_HEADERS, ...(options.headers ?? {}) },
    });

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError('Request timed out', timeoutMs));
      }, timeoutMs);
    });

    const res = await withTiming(
      log,
      'http.fetch',
      async () => Promise.race([requestPromise, timeoutPromise]),
      { url, method: options.method ?? 'GET' }
    );

    const ab = await res.body.arrayBuffer();
    if (timeoutId) clearTimeout(timeoutId);

    const encoding = (headerValue(res.headers, 'content-encoding') ?? '').toLowerCase();
    const body = ab.byteLength > 0 ? decodeBody(Buffer.from(ab), encoding) : Buffer.alloc(0);

    log.debug(
      { statusCode: res.statusCode, encoding, bodySize: body.length },
      'HTTP response body read'
    );

    return { statusCode: res.statusCode, headers: res.headers, body };
  } catch (err) {
    if (err instanceof TimeoutError) {
      throw err;
    }
    if (err instanceof Error && err.name === 'AbortError') {
      throw new TimeoutError('Request timed out', timeoutMs);
    }
    throw new NetworkError(errorMessage(err));
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    try {
      await closeClient(client);
    } catch (closeError) {
      log.warn({ error: errorMessage(closeError) }, 'Client close failed or timed out');
    }
  }
}

export async function fetchUrl(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  const res = await performRequest(url, options);

  if (res.statusCode >= 400) {
    throw new NetworkError('HTTP error', res.statusCode);
  }

  return {
    statusCode: res.statusCode,
    bodyText: res.body.toString('utf8'),
    contentType: headerValue(res.headers, 'content-type'),
  };
}

export async function fetchBuffer(
  url: string,
  options: FetchOptions = {}
): Promise<BinaryFetchResult> {
  const res = await performRequest(url, options);

  if (res.statusCode >= 400) {
    throw new NetworkError('HTTP error', res.statusCode);
  }

  return {
    statusCode: res.statusCode,
    body: res.body,
    contentType: headerValue(res.headers, 'content-type'),
  };
}

/** HEAD request that reports the status code instead of throwing on 4xx/5xx. */
export async function probeUrl(url: string, options: FetchOptions = {}): Promise<number> {
  const res = await performRequest(url, { ...options, method: 'HEAD' });
  return res.statusCode;
}
