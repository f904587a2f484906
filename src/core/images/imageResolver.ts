import type pino from 'pino';
import { errorMessage } from '../errors';
import { hostMatches, type SizeRewriteRule } from '../classify/platforms';

/**
 * Maps an absolute image URL to the reference written into the document body.
 * `null` means "keep the remote URL".
 */
export interface ImageResolver {
  resolve(absoluteUrl: string, baseName: string): Promise<string | null>;
}

/** Leaves every image on its remote URL. */
export const remoteImageResolver: ImageResolver = {
  resolve: async () => null,
};

/**
 * Swaps a thumbnail-sized query (`?type=w80_blur`) for the full rendition on hosts
 * that serve both from one path.
 */
export function rewriteSizeParameters(url: string, rules: readonly SizeRewriteRule[]): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  const rule = rules.find(r => r.hostSuffixes.some(suffix => hostMatches(parsed.hostname, suffix)));
  if (!rule || !parsed.searchParams.has(rule.param)) {
    return url;
  }

  parsed.search = `?${rule.param}=${rule.value}`;
  return parsed.toString();
}

type BaseName = string | (() => string);

/**
 * Per-call memo in front of a resolver. A URL met twice (the parts walk and the HTML
 * mirror both see every image) is resolved once and the first answer reused.
 */
export class ImageResolutionSession {
  private readonly memo = new Map<string, string | null>();
  private readonly resolver: ImageResolver;
  private readonly logger: pino.Logger;

  constructor(resolver: ImageResolver, logger: pino.Logger) {
    this.resolver = resolver;
    this.logger = logger;
  }

  get resolvedCount(): number {
    return this.memo.size;
  }

  /** `baseName` may be a thunk; it is only evaluated for URLs not seen before. */
  async resolve(absoluteUrl: string, baseName: BaseName): Promise<string | null> {
    const cached = this.memo.get(absoluteUrl);
    if (cached !== undefined) return cached;

    let ref: string | null = null;
    try {
      const name = typeof baseName === 'function' ? baseName() : baseName;
      ref = await this.resolver.resolve(absoluteUrl, name);
    } catch (error) {
      this.logger.warn(
        { event: 'image_resolve_failed', url: absoluteUrl, error: errorMessage(error) },
        'Image resolution failed, keeping remote URL'
      );
    }

    this.memo.set(absoluteUrl, ref);
    return ref;
  }

  /** Resolved reference, or the remote URL when the resolver declined. */
  async resolveOrKeep(absoluteUrl: string, baseName: BaseName): Promise<string> {
    return (await this.resolve(absoluteUrl, baseName)) ?? absoluteUrl;
  }
}
