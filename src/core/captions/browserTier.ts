import type { Page } from 'playwright-core';
import type pino from 'pino';
import { USER_AGENT } from '../../config/constants';
import { ContentNotFoundError, errorMessage } from '../errors';
import { watchUrl } from '../classify/urlClassifier';
import { tryParseTimestamp } from './captionChunker';
import type { CaptionConfig, CaptionCue, CaptionTier, CaptionTrackResult } from './types';

export interface BrowserSessionOptions {
  navigationTimeoutMs: number;
  locale?: string;
}

const LAUNCH_ARGS = ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'];

const CHANNEL_SELECTOR = '#upload-info #channel-name a, #owner #channel-name a';
const DESCRIPTION_EXPAND_SELECTOR = '#description-inner #expand, .ytd-video-secondary-info-renderer #more';
const TRANSCRIPT_BUTTON_NAME = /스크립트 표시|Show transcript/i;
const TRANSCRIPT_SEGMENT_SELECTOR = 'ytd-transcript-segment-renderer';

/**
 * Launches headless Chromium, hands one page to `use`, and closes the browser
 * whatever `use` does.
 */
export async function withBrowserPage<T>(
  options: BrowserSessionOptions,
  use: (page: Page) => Promise<T>
): Promise<T> {
  const { chromium } = await import('playwright-core');
  const browser = await chromium.launch({
    headless: true,
    timeout: options.navigationTimeoutMs,
    args: LAUNCH_ARGS,
  });

  try {
    const context = await browser.newContext({
      userAgent: USER_AGENT,
      locale: options.locale ?? 'ko-KR',
    });
    const page = await context.newPage();
    page.setDefaultTimeout(options.navigationTimeoutMs);
    return await use(page);
  } finally {
    await browser.close();
  }
}

export interface BrowserTierOptions {
  /** Pause after navigation for client-side rendering. */
  renderWaitMs?: number;
}

/** Opens the watch page's transcript panel and reads its segments. */
export class BrowserTier implements CaptionTier {
  readonly name = 'browser' as const;
  private readonly renderWaitMs: number;

  constructor(options: BrowserTierOptions = {}) {
    this.renderWaitMs = options.renderWaitMs ?? 3000;
  }

  async fetch(videoId: string, config: CaptionConfig, logger: pino.Logger): Promise<CaptionTrackResult> {
    const url = watchUrl(videoId);

    return withBrowserPage({ navigationTimeoutMs: config.navigationTimeoutMs }, async page => {
      await page.goto(url, { waitUntil: 'networkidle', timeout: config.navigationTimeoutMs });
      await page.waitForTimeout(this.renderWaitMs);

      const title = (await page.title()).replace(/\s*-\s*YouTube$/, '').trim() || undefined;
      const channel = await this.readChannel(page, logger);

      const expand = page.locator(DESCRIPTION_EXPAND_SELECTOR).first();
      if ((await expand.count()) > 0) {
        await expand.click();
        await page.waitForTimeout(1000);
      }

      const button = page.getByRole('button', { name: TRANSCRIPT_BUTTON_NAME });
      if ((await button.count()) === 0) {
        throw new ContentNotFoundError('transcript button not found', url);
      }
      await button.first().click();
      await page.waitForSelector(TRANSCRIPT_SEGMENT_SELECTOR, { timeout: config.timeoutMs });

      const segments = await page.$$eval(TRANSCRIPT_SEGMENT_SELECTOR, elements =>
        elements.map(element => ({
          time: element.querySelector('.segment-timestamp')?.textContent?.trim() ?? '',
          text: element.querySelector('.segment-text')?.textContent?.trim() ?? '',
        }))
      );

      logger.debug({ event: 'transcript_segments', count: segments.length }, 'Transcript panel read');

      return {
        source: this.name,
        cues: segmentsToCues(segments),
        title,
        channel,
      };
    });
  }

  private async readChannel(page: Page, logger: pino.Logger): Promise<string | undefined> {
    try {
      const link = page.locator(CHANNEL_SELECTOR).first();
      if ((await link.count()) === 0) return undefined;
      return (await link.innerText()).trim() || undefined;
    } catch (error) {
      logger.debug({ event: 'channel_read_failed', error: errorMessage(error) }, 'Channel name unavailable');
      return undefined;
    }
  }
}

export function segmentsToCues(segments: ReadonlyArray<{ time: string; text: string }>): CaptionCue[] {
  const cues: CaptionCue[] = [];
  for (const segment of segments) {
    const startSeconds = tryParseTimestamp(segment.time);
    // Segments without a timestamp are chapter headings
    if (startSeconds === null || !segment.text) continue;
    cues.push({ startSeconds, text: segment.text });
  }
  return cues;
}
