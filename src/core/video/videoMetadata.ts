import type pino from 'pino';
import type { PageFetcher } from '../content/httpContentFetcher';
import { probeUrl } from '../content/httpContentFetcher';
import { watchUrl } from '../classify/urlClassifier';
import { errorMessage } from '../errors';
import { UNKNOWN_CHANNEL, UNTITLED, VIDEO_DESCRIPTION_MAX_LENGTH } from '../../config/constants';
import { extractPlayerResponse } from './playerResponse';

export interface VideoMetadata {
  title: string;
  channel: string;
  description: string;
  uploadDate?: string;
}

export const DEFAULT_VIDEO_METADATA: VideoMetadata = {
  title: UNTITLED,
  channel: UNKNOWN_CHANNEL,
  description: '',
};

export type UrlProbe = (url: string) => Promise<number>;

/** Title, channel, description and upload date from the watch page. Falls back to defaults, never throws. */
export async function fetchVideoMetadata(
  videoId: string,
  fetchPage: PageFetcher,
  logger: pino.Logger
): Promise<VideoMetadata> {
  try {
    const page = await fetchPage(watchUrl(videoId));
    const player = extractPlayerResponse(page.bodyText);
    if (!player) {
      logger.info({ event: 'video_metadata_missing', videoId }, 'Watch page had no player response');
      return DEFAULT_VIDEO_METADATA;
    }

    const details = player.videoDetails;
    const microformat = player.microformat?.playerMicroformatRenderer;
    return {
      title: details?.title?.trim() || UNTITLED,
      channel: details?.author?.trim() || microformat?.ownerChannelName?.trim() || UNKNOWN_CHANNEL,
      description: (details?.shortDescription ?? '').slice(0, VIDEO_DESCRIPTION_MAX_LENGTH),
      uploadDate: microformat?.uploadDate ?? microformat?.publishDate,
    };
  } catch (error) {
    logger.warn(
      { event: 'video_metadata_failed', videoId, error: errorMessage(error) },
      'Video metadata unavailable'
    );
    return DEFAULT_VIDEO_METADATA;
  }
}

export function thumbnailCandidates(videoId: string): { maxres: string; fallback: string } {
  return {
    maxres: `https://img.youtube.com/vi/${videoId}/maxresdefault.jpg`,
    fallback: `https://img.youtube.com/vi/${videoId}/hqdefault.jpg`,
  };
}

/** Full-resolution thumbnail when it exists; not every video has one. */
export async function resolveThumbnailUrl(videoId: string, probe: UrlProbe = probeUrl): Promise<string> {
  const { maxres, fallback } = thumbnailCandidates(videoId);
  try {
    return (await probe(maxres)) === 200 ? maxres : fallback;
  } catch {
    return fallback;
  }
}
