/**
 * Turns an image or link source found in page markup into an absolute http(s) URL.
 * Protocol-relative sources take https, root-relative ones the page origin and
 * everything else is resolved against the page URL. Returns null for data:, javascript:
 * and anything else that does not end up on http(s).
 */
export function absolutizeUrl(src: string, pageUrl: string): string | null {
  const trimmed = src.trim();
  if (!trimmed) return null;

  let candidate: URL;
  try {
    if (trimmed.startsWith('//')) {
      candidate = new URL(`https:${trimmed}`);
    } else {
      candidate = new URL(trimmed, pageUrl);
    }
  } catch {
    return null;
  }

  if (candidate.protocol !== 'http:' && candidate.protocol !== 'https:') {
    return null;
  }
  return candidate.toString();
}

export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/** First value that absolutizes to an http(s) URL, skipping placeholders such as data: URIs. */
export function firstAbsoluteCandidate(
  values: readonly (string | undefined | null)[],
  pageUrl: string
): string | null {
  for (const value of values) {
    const absolute = value ? absolutizeUrl(value, pageUrl) : null;
    if (absolute) return absolute;
  }
  return null;
}
