import { ClassificationError } from '../errors';
import { DEFAULT_BLOG_PLATFORMS, type BlogPlatformRule } from './platforms';

export type UrlClassification =
  | { kind: 'video'; url: string }
  | { kind: 'editor-blog'; url: string; platform: BlogPlatformRule }
  | { kind: 'article'; url: string };

const VIDEO_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com', 'youtu.be']);

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const VIDEO_PATH_PREFIXES = ['/embed/', '/shorts/', '/live/', '/v/'];

export function parseHttpUrl(input: string): URL {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    throw new ClassificationError('not a valid URL', input);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ClassificationError(`unsupported scheme ${url.protocol}`, input);
  }
  return url;
}

export function isVideoUrl(url: URL): boolean {
  return VIDEO_HOSTS.has(url.hostname.toLowerCase());
}

/**
 * Rewrites a platform's mobile host to its desktop host. URLs on other hosts are returned as given.
 */
export function normalizePlatformUrl(url: URL, platform: BlogPlatformRule): string {
  if (platform.mobileHost && url.hostname.toLowerCase() === platform.mobileHost) {
    const rewritten = new URL(url.href);
    rewritten.hostname = platform.canonicalHost;
    return rewritten.toString();
  }
  return url.toString();
}

function findPlatform(
  url: URL,
  platforms: readonly BlogPlatformRule[]
): BlogPlatformRule | undefined {
  const host = url.hostname.toLowerCase();
  return platforms.find(platform => host === platform.canonicalHost || host === platform.mobileHost);
}

/**
 * Decides which extraction path a URL takes. Unknown hosts are generic articles;
 * only an unparseable URL is an error.
 */
export function classifyUrl(
  input: string,
  platforms: readonly BlogPlatformRule[] = DEFAULT_BLOG_PLATFORMS
): UrlClassification {
  const url = parseHttpUrl(input);

  if (isVideoUrl(url)) {
    return { kind: 'video', url: url.toString() };
  }

  const platform = findPlatform(url, platforms);
  if (platform) {
    return { kind: 'editor-blog', url: normalizePlatformUrl(url, platform), platform };
  }

  return { kind: 'article', url: url.toString() };
}

export function extractVideoId(input: string): string {
  const url = parseHttpUrl(input);
  const host = url.hostname.toLowerCase();
  let candidate: string | null = null;

  if (host === 'youtu.be') {
    candidate = url.pathname.split('/')[1] ?? null;
  } else if (VIDEO_HOSTS.has(host)) {
    candidate = url.searchParams.get('v');
    if (!candidate) {
      const prefix = VIDEO_PATH_PREFIXES.find(p => url.pathname.startsWith(p));
      candidate = prefix ? (url.pathname.slice(prefix.length).split('/')[0] ?? null) : null;
    }
  }

  if (!candidate || !VIDEO_ID_PATTERN.test(candidate)) {
    throw new ClassificationError('unrecognized video ID format', input);
  }
  return candidate;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
