import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import type pino from 'pino';
import { READABILITY_STRIP_SELECTORS, FALLBACK_IMAGE_SOURCE_ATTRIBUTES } from './selectors';
import { withTiming } from '../../../utils/logger';
import { ARTICLE_THRESHOLDS } from '../../../config/constants';
import { ContentNotFoundError } from '../../errors';
import { firstAbsoluteCandidate } from '../urlResolver';
import { markdownConverter } from './markdownConverter';

export interface ReadabilityArticle {
  title?: string;
  /** Article HTML as Readability cleaned it. */
  contentHtml: string;
  markdown: string;
  byline?: string;
  lang?: string;
}

export interface ReadabilityOptions {
  pageUrl: string;
  logger: pino.Logger;
}

/**
 * Runs Mozilla Readability with a low character threshold, so short posts are still
 * recognised. Length acceptance is left to the caller.
 */
export async function extractWithReadability(
  html: string,
  options: ReadabilityOptions
): Promise<ReadabilityArticle> {
  const { logger, pageUrl } = options;

  return withTiming(logger, 'readability_extraction', async () => {
    const dom = new JSDOM(html, { url: pageUrl });
    const document = dom.window.document;

    try {
      const lang = document.documentElement.lang || undefined;
      const originalTitle = document.querySelector('title')?.textContent?.trim();

      document.querySelectorAll(READABILITY_STRIP_SELECTORS).forEach(element => element.remove());
      promoteLazyImages(document, pageUrl);

      const reader = new Readability(document, {
        charThreshold: ARTICLE_THRESHOLDS.READABILITY_CHAR_THRESHOLD,
        classesToPreserve: ['caption', 'credits'],
      });
      const article = reader.parse();

      if (!article || !article.content) {
        throw new ContentNotFoundError('readability found no article', pageUrl);
      }

      const markdown = markdownConverter.convertToMarkdown(article.content);

      logger.debug(
        {
          event: 'readability_parsed',
          markdownLength: markdown.length,
          hasTitle: Boolean(article.title || originalTitle),
          hasByline: Boolean(article.byline),
        },
        'Readability extraction completed'
      );

      return {
        title: article.title || originalTitle || undefined,
        contentHtml: article.content,
        markdown,
        byline: article.byline || undefined,
        lang,
      };
    } finally {
      dom.window.close();
    }
  });
}

// Readability keeps `src` only; lazy-loaded images would come out blank
function promoteLazyImages(document: Document, pageUrl: string): void {
  document.querySelectorAll('img').forEach(img => {
    const absolute = firstAbsoluteCandidate(
      FALLBACK_IMAGE_SOURCE_ATTRIBUTES.map(name => img.getAttribute(name)),
      pageUrl
    );
    if (absolute) {
      img.setAttribute('src', absolute);
    } else {
      img.remove();
    }
  });
}
