export { extractArticle } from './handlers/extractArticle';
export { extractVideo, buildVideoBody, MISSING_CAPTIONS_NOTICE } from './handlers/extractVideo';
export { extractUrl } from './handlers/extractUrl';
export type { ExtractOptions } from './handlers/options';

export { classifyUrl, extractVideoId, type UrlClassification } from './core/classify/urlClassifier';
export {
  NAVER_BLOG,
  DEFAULT_BLOG_PLATFORMS,
  DEFAULT_SIZE_REWRITES,
  type BlogPlatformRule,
  type SizeRewriteRule,
} from './core/classify/platforms';

export type {
  ContentPart,
  ContentType,
  ExtractionMethod,
  ExtractionRequest,
  ExtractionResult,
  VideoDetails,
} from './core/content/types/extraction';
export { renderPart, renderParts } from './core/content/contentParts';
export { parseBlockModel } from './core/content/extractors/blockModelParser';
export { cleanExtractedText, filterNoiseLines, type NoiseFilterOptions } from './core/content/noiseFilter';

export {
  remoteImageResolver,
  rewriteSizeParameters,
  ImageResolutionSession,
  type ImageResolver,
} from './core/images/imageResolver';
export { LocalImageResolver } from './core/images/localImageResolver';

export { CaptionPipeline, createCaptionConfig } from './core/captions/captionPipeline';
export {
  chunkCues,
  parseTimedCaptionDocument,
  renderChunks,
  formatTimestamp,
} from './core/captions/captionChunker';
export type { CaptionChunk, CaptionConfig, CaptionCue, CaptionTier } from './core/captions/types';

export { runStrategies, type Strategy, type StrategyOutcome } from './core/strategy';
export {
  ClipperError,
  ClassificationError,
  ContentNotFoundError,
  InsufficientContentError,
  NoCaptionsAvailableError,
  ResourceFetchError,
  TimeoutError,
  NetworkError,
  ConfigurationError,
  toClipperError,
} from './core/errors';
