import type { ExtractionResult } from '../core/content/types/extraction';
import { extractVideoId, watchUrl } from '../core/classify/urlClassifier';
import { CaptionPipeline } from '../core/captions/captionPipeline';
import { cuesToTranscript } from '../core/captions/captionChunker';
import type { CaptionTrackResult } from '../core/captions/types';
import { ImageResolutionSession } from '../core/images/imageResolver';
import { fetchVideoMetadata, resolveThumbnailUrl, type VideoMetadata } from '../core/video/videoMetadata';
import { errorMessage } from '../core/errors';
import { UNKNOWN_CHANNEL, UNTITLED } from '../config/constants';
import { createChildLogger, withTiming } from '../utils/logger';
import { resolveDeps, type ExtractOptions } from './options';

export const MISSING_CAPTIONS_NOTICE =
  'Captions could not be extracted for this video. A transcript is needed for later summarization.';

export function buildVideoBody(
  thumbnailRef: string,
  transcript: string | null,
  description: string
): string {
  const sections = [`![Thumbnail](${thumbnailRef})`];
  if (transcript) {
    sections.push('## Transcript', transcript);
  } else {
    sections.push('## Notice', MISSING_CAPTIONS_NOTICE);
    if (description.trim()) {
      sections.push('### Description', description.trim());
    }
  }
  return sections.join('\n\n');
}

function preferKnown(primary: string, fallback: string | undefined, placeholder: string): string {
  return primary !== placeholder ? primary : fallback?.trim() || placeholder;
}

/**
 * Extracts a video's transcript, chunked into timestamped paragraphs. When no caption
 * tier succeeds the body carries a notice and the video description instead. Throws
 * only `ClassificationError` for a URL without a recognisable video ID.
 */
export async function extractVideo(url: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
  const videoId = extractVideoId(url);
  const deps = resolveDeps(options);
  const logger = createChildLogger(deps.correlationId);
  const pipeline = options.captionPipeline ?? new CaptionPipeline({ fetchPage: deps.fetchPage });

  return withTiming(
    logger,
    'video_extraction',
    async () => {
      const metadata: VideoMetadata = await fetchVideoMetadata(videoId, deps.fetchPage, logger);
      const thumbnailUrl = await resolveThumbnailUrl(videoId, options.probeUrl);

      let track: CaptionTrackResult | null = null;
      let note: string | undefined;
      try {
        track = await pipeline.acquire(videoId, logger);
      } catch (error) {
        note = errorMessage(error);
      }

      const title = preferKnown(metadata.title, track?.title, UNTITLED);
      const channel = preferKnown(metadata.channel, track?.channel, UNKNOWN_CHANNEL);

      const images = new ImageResolutionSession(deps.imageResolver, logger);
      const thumbnailRef = await images.resolveOrKeep(thumbnailUrl, `${title}_thumbnail`);

      const transcript = track ? cuesToTranscript(track.cues) || null : null;
      logger.info(
        { event: 'video_extracted', videoId, source: track?.source ?? 'none', hasTranscript: transcript !== null },
        'Video extraction finished'
      );

      return {
        title,
        body: buildVideoBody(thumbnailRef, transcript, metadata.description),
        sourceUrl: watchUrl(videoId),
        contentType: 'video',
        extractionMethod: track?.source ?? 'metadata-only',
        note,
        video: {
          videoId,
          channel,
          uploadDate: metadata.uploadDate,
          hasTranscript: transcript !== null,
          thumbnailUrl,
        },
      };
    },
    { videoId }
  );
}
