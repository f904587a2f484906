import type pino from 'pino';
import type { ExtractionDeps, ExtractionMethod, ExtractionResult } from './types/extraction';
import { ImageResolutionSession } from '../images/imageResolver';
import { describeFailures, runStrategies, type Strategy, type StrategyFailure } from '../strategy';
import { InsufficientContentError } from '../errors';
import { ARTICLE_THRESHOLDS, UNTITLED } from '../../config/constants';
import { createChildLogger, withTiming } from '../../utils/logger';
import { extractWithReadability } from './extractors/readabilityExtractor';
import { extractWithDomWalk } from './extractors/domWalkExtractor';
import { prepareHtmlMirror } from './extractors/auxiliaryHtml';
import { FALLBACK_IMAGE_SOURCE_ATTRIBUTES } from './extractors/selectors';
import { cleanExtractedText } from './noiseFilter';
import { renderParts } from './contentParts';
import { hostOf } from './urlResolver';

/** What a successful article strategy hands back before it becomes a result. */
export interface ArticleDraft {
  title: string;
  body: string;
  auxiliaryHtml?: string;
  method: ExtractionMethod;
}

export interface ArticleContext {
  deps: ExtractionDeps;
  images: ImageResolutionSession;
  logger: pino.Logger;
}

const MARKDOWN_IMAGE = /!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;

/** Rewrites every markdown image to the reference the session resolves it to. */
export async function resolveMarkdownImages(
  markdown: string,
  images: ImageResolutionSession,
  nextBaseName: () => string
): Promise<string> {
  let output = '';
  let cursor = 0;
  for (const match of markdown.matchAll(MARKDOWN_IMAGE)) {
    const [whole, alt = '', url = ''] = match;
    const index = match.index ?? cursor;
    const ref = /^https?:\/\//i.test(url) ? await images.resolveOrKeep(url, nextBaseName) : url;
    output += `${markdown.slice(cursor, index)}![${alt}](${ref})`;
    cursor = index + whole.length;
  }
  return output + markdown.slice(cursor);
}

export function isEmptyDraft(draft: ArticleDraft): boolean {
  return draft.body.trim().length === 0;
}

/** Fallback shared by both article paths: refetch and walk the DOM. */
export function domWalkStrategy(
  url: string,
  context: ArticleContext,
  titleSuffixPattern?: RegExp,
  fetchTarget: () => Promise<{ html: string; pageUrl: string }> = async () => ({
    html: (await context.deps.fetchPage(url, { correlationId: context.deps.correlationId })).bodyText,
    pageUrl: url,
  })
): Strategy<ArticleDraft> {
  return {
    name: 'dom-walk',
    run: async () => {
      const { html, pageUrl } = await fetchTarget();
      const walked = await extractWithDomWalk(html, {
        pageUrl,
        images: context.images,
        logger: context.logger,
        titleSuffixPattern,
      });

      let imageCounter = 0;
      const auxiliaryHtml = await prepareHtmlMirror(walked.contentHtml, {
        pageUrl,
        images: context.images,
        shouldResolve: () => true,
        nextImageBaseName: () => `${walked.title}_img_${++imageCounter}`,
        imageSourceAttributes: FALLBACK_IMAGE_SOURCE_ATTRIBUTES,
      });

      return {
        title: walked.title,
        body: cleanExtractedText(renderParts(walked.parts), { siteHost: hostOf(pageUrl) }),
        auxiliaryHtml,
        method: 'dom-walk',
      };
    },
  };
}

function readabilityStrategy(url: string, context: ArticleContext): Strategy<ArticleDraft> {
  return {
    name: 'readability',
    run: async () => {
      const page = await context.deps.fetchPage(url, { correlationId: context.deps.correlationId });
      const article = await extractWithReadability(page.bodyText, { pageUrl: url, logger: context.logger });

      if (article.markdown.length < ARTICLE_THRESHOLDS.MIN_PRIMARY_LENGTH) {
        throw new InsufficientContentError(article.markdown.length, ARTICLE_THRESHOLDS.MIN_PRIMARY_LENGTH);
      }

      const title = article.title || UNTITLED;
      let imageCounter = 0;
      const nextBaseName = (): string => `${title}_img_${++imageCounter}`;

      const markdown = await resolveMarkdownImages(article.markdown, context.images, nextBaseName);
      const auxiliaryHtml = await prepareHtmlMirror(article.contentHtml, {
        pageUrl: url,
        images: context.images,
        shouldResolve: () => true,
        nextImageBaseName: nextBaseName,
        imageSourceAttributes: FALLBACK_IMAGE_SOURCE_ATTRIBUTES,
      });

      return {
        title,
        body: cleanExtractedText(markdown, { siteHost: hostOf(url) }),
        auxiliaryHtml,
        method: 'readability',
      };
    },
  };
}

export function draftToResult(
  url: string,
  draft: ArticleDraft,
  failures: readonly StrategyFailure[]
): ExtractionResult {
  return {
    title: draft.title,
    body: draft.body,
    sourceUrl: url,
    contentType: 'article',
    auxiliaryHtml: draft.auxiliaryHtml,
    extractionMethod: draft.method,
    note: failures.length > 0 ? `Fallback extraction used (${describeFailures(failures)})` : undefined,
  };
}

export function failedArticleResult(url: string, failures: readonly StrategyFailure[]): ExtractionResult {
  return {
    title: UNTITLED,
    body: `Extraction failed: ${describeFailures(failures) || 'no strategy produced content'}`,
    sourceUrl: url,
    contentType: 'article',
    extractionMethod: 'failed',
  };
}

/**
 * Generic web article: Readability first, DOM walk when Readability fails or comes back
 * too short. Never throws; total failure is reported in the body.
 */
export async function extractGenericArticle(url: string, deps: ExtractionDeps): Promise<ExtractionResult> {
  const logger = createChildLogger(deps.correlationId);
  const context: ArticleContext = {
    deps,
    images: new ImageResolutionSession(deps.imageResolver, logger),
    logger,
  };

  return withTiming(logger, 'article_extraction', async () => {
    const outcome = await runStrategies([readabilityStrategy(url, context), domWalkStrategy(url, context)], {
      logger,
      event: 'article_strategy',
      isEmpty: isEmptyDraft,
    });

    if (!outcome.ok) {
      logger.warn({ event: 'article_extraction_failed', url }, 'Every article strategy failed');
      return failedArticleResult(url, outcome.failures);
    }
    return draftToResult(url, outcome.value, outcome.failures);
  }, { url });
}
