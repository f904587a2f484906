import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import type { PageFetcher } from '../content/httpContentFetcher';
import { NoCaptionsAvailableError } from '../errors';
import { describeFailures, runStrategies } from '../strategy';
import { BrowserTier } from './browserTier';
import { CaptionsApiTier } from './captionsApiTier';
import { resolveCookieFile } from './cookies';
import { DownloaderTier } from './downloaderTier';
import type { CaptionConfig, CaptionTier, CaptionTrackResult } from './types';

/**
 * Caption settings from the environment, with explicit overrides. The cookie file is
 * resolved here, once, not per tier.
 */
export function createCaptionConfig(overrides: Partial<CaptionConfig> = {}): CaptionConfig {
  const env = getEnvironment();
  return {
    languages: overrides.languages ?? env.CAPTION_LANGUAGES,
    timeoutMs: overrides.timeoutMs ?? env.REQUEST_TIMEOUT_MS,
    navigationTimeoutMs: overrides.navigationTimeoutMs ?? env.BROWSER_NAV_TIMEOUT_MS,
    cookieFile: 'cookieFile' in overrides ? overrides.cookieFile : resolveCookieFile(env.YOUTUBE_COOKIES_PATH),
    ytDlpPath: overrides.ytDlpPath ?? env.YT_DLP_PATH,
  };
}

export function defaultCaptionTiers(fetchPage?: PageFetcher): CaptionTier[] {
  return [new CaptionsApiTier(fetchPage), new DownloaderTier(), new BrowserTier()];
}

export interface CaptionPipelineOptions {
  config?: CaptionConfig;
  tiers?: CaptionTier[];
  fetchPage?: PageFetcher;
}

/** Tries each caption tier in order and keeps the first one that yields cues. */
export class CaptionPipeline {
  readonly config: CaptionConfig;
  private readonly tiers: readonly CaptionTier[];

  constructor(options: CaptionPipelineOptions = {}) {
    this.config = options.config ?? createCaptionConfig();
    this.tiers = options.tiers ?? defaultCaptionTiers(options.fetchPage);
  }

  async acquire(videoId: string, logger: pino.Logger): Promise<CaptionTrackResult> {
    const outcome = await runStrategies(
      this.tiers.map(tier => ({
        name: tier.name,
        run: () => tier.fetch(videoId, this.config, logger),
      })),
      { logger, event: 'caption_tier', isEmpty: track => track.cues.length === 0 }
    );

    if (!outcome.ok) {
      logger.warn(
        { event: 'captions_unavailable', videoId, failures: describeFailures(outcome.failures) },
        'No caption tier produced cues'
      );
      throw new NoCaptionsAvailableError(
        videoId,
        outcome.failures.map(failure => failure.strategy)
      );
    }

    return outcome.value;
  }
}
