import type { BlogPlatformRule } from '../core/classify/platforms';
import { DEFAULT_BLOG_PLATFORMS } from '../core/classify/platforms';
import type { ImageResolver } from '../core/images/imageResolver';
import { remoteImageResolver } from '../core/images/imageResolver';
import type { PageFetcher } from '../core/content/httpContentFetcher';
import { fetchUrl } from '../core/content/httpContentFetcher';
import type { ExtractionDeps } from '../core/content/types/extraction';
import type { CaptionPipeline } from '../core/captions/captionPipeline';
import type { UrlProbe } from '../core/video/videoMetadata';
import { generateCorrelationId } from '../utils/logger';

export interface ExtractOptions {
  /** Where discovered images go; defaults to keeping remote URLs. */
  imageResolver?: ImageResolver;
  fetchPage?: PageFetcher;
  /** Replaces the built-in platform rules. */
  platforms?: readonly BlogPlatformRule[];
  correlationId?: string;
  captionPipeline?: CaptionPipeline;
  probeUrl?: UrlProbe;
}

export function resolveDeps(options: ExtractOptions): ExtractionDeps {
  return {
    fetchPage: options.fetchPage ?? fetchUrl,
    imageResolver: options.imageResolver ?? remoteImageResolver,
    correlationId: options.correlationId ?? generateCorrelationId(),
  };
}

export function resolvePlatforms(options: ExtractOptions): readonly BlogPlatformRule[] {
  return options.platforms ?? DEFAULT_BLOG_PLATFORMS;
}
