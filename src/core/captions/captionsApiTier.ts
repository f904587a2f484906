import * as cheerio from 'cheerio';
import type pino from 'pino';
import { fetchUrl, type PageFetcher } from '../content/httpContentFetcher';
import { absolutizeUrl } from '../content/urlResolver';
import { ContentNotFoundError } from '../errors';
import { watchUrl } from '../classify/urlClassifier';
import { captionTracks, extractPlayerResponse, pickCaptionTrack } from '../video/playerResponse';
import { cleanCaptionText } from './captionChunker';
import { readCookieHeader } from './cookies';
import type { CaptionConfig, CaptionCue, CaptionTier, CaptionTrackResult } from './types';

/**
 * Timed-text XML to cues. Handles both the classic `<text start="1.5">` form (seconds)
 * and the `<p t="1500">` form (milliseconds).
 */
export function parseTimedTextXml(xml: string): CaptionCue[] {
  const $ = cheerio.load(xml, { xml: true });
  const cues: CaptionCue[] = [];

  $('text[start], p[t]').each((_, element) => {
    const node = $(element);
    const start = node.attr('start');
    const seconds = start !== undefined ? Number.parseFloat(start) : Number.parseFloat(node.attr('t') ?? '') / 1000;
    if (!Number.isFinite(seconds) || seconds < 0) return;

    const text = cleanCaptionText(node.text().replace(/\s+/g, ' '));
    if (text) cues.push({ startSeconds: Math.floor(seconds), text });
  });

  return cues;
}

export class CaptionsApiTier implements CaptionTier {
  readonly name = 'captions-api' as const;
  private readonly fetchPage: PageFetcher;

  constructor(fetchPage: PageFetcher = fetchUrl) {
    this.fetchPage = fetchPage;
  }

  async fetch(videoId: string, config: CaptionConfig, logger: pino.Logger): Promise<CaptionTrackResult> {
    const pageUrl = watchUrl(videoId);
    const headers: Record<string, string> = config.cookieFile
      ? { cookie: await readCookieHeader(config.cookieFile) }
      : {};

    const page = await this.fetchPage(pageUrl, { timeoutMs: config.timeoutMs, headers });
    const player = extractPlayerResponse(page.bodyText);
    if (!player) {
      throw new ContentNotFoundError('watch page carries no player response', pageUrl);
    }

    const tracks = captionTracks(player);
    const track = pickCaptionTrack(tracks, config.languages);
    const trackUrl = track ? absolutizeUrl(track.baseUrl, pageUrl) : null;
    if (!track || !trackUrl) {
      throw new ContentNotFoundError(
        `no caption track for ${config.languages.join(', ')} (available: ${tracks.length})`,
        pageUrl
      );
    }

    logger.debug(
      { event: 'caption_track_selected', language: track.languageCode, automatic: track.kind === 'asr' },
      'Caption track selected'
    );

    const timedText = await this.fetchPage(trackUrl, { timeoutMs: config.timeoutMs, headers });

    return {
      source: this.name,
      cues: parseTimedTextXml(timedText.bodyText),
      language: track.languageCode,
      title: player.videoDetails?.title,
      channel: player.videoDetails?.author,
    };
  }
}
