import type { ImageResolver } from '../../images/imageResolver';
import type { PageFetcher } from '../httpContentFetcher';

export type HeadingLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/** One unit of extracted content. A sequence of parts is in reading order. */
export type ContentPart =
  | { kind: 'text'; text: string; headingLevel: HeadingLevel; emphasis: boolean }
  | { kind: 'image'; ref: string; alt: string }
  | { kind: 'table'; markup: string }
  | { kind: 'quote'; markup: string }
  | { kind: 'divider' }
  | {
      kind: 'externalLink';
      url: string;
      title: string;
      description: string;
      domain: string;
      thumbnailRef: string | null;
    }
  | { kind: 'raw'; markup: string };

export type ContentPartKind = ContentPart['kind'];

export type ContentType = 'article' | 'video';

export type ExtractionMethod =
  | 'block-model'
  | 'readability'
  | 'dom-walk'
  | 'captions-api'
  | 'downloader'
  | 'browser'
  | 'metadata-only'
  | 'failed';

export interface VideoDetails {
  videoId: string;
  channel: string;
  uploadDate?: string;
  hasTranscript: boolean;
  thumbnailUrl: string;
}

export interface ExtractionResult {
  title: string;
  body: string;
  sourceUrl: string;
  contentType: ContentType;
  auxiliaryHtml?: string;
  extractionMethod: ExtractionMethod;
  note?: string;
  video?: VideoDetails;
}

/** One extraction call; nothing in it outlives the call. */
export interface ExtractionRequest {
  readonly url: string;
  readonly imageResolver: ImageResolver;
}

/** Collaborators shared by the article paths; defaults are filled in by the handlers. */
export interface ExtractionDeps {
  fetchPage: PageFetcher;
  imageResolver: ImageResolver;
  correlationId: string;
}
