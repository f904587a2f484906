import * as cheerio from 'cheerio';
import type { ExtractionDeps, ExtractionResult } from './types/extraction';
import type { BlogPlatformRule } from '../classify/platforms';
import { ImageResolutionSession } from '../images/imageResolver';
import { runStrategies, type Strategy } from '../strategy';
import { createChildLogger, withTiming } from '../../utils/logger';
import { parseBlockModel, findEditorContainer } from './extractors/blockModelParser';
import { cleanExtractedText } from './noiseFilter';
import { renderParts } from './contentParts';
import { absolutizeUrl } from './urlResolver';
import {
  domWalkStrategy,
  draftToResult,
  failedArticleResult,
  isEmptyDraft,
  type ArticleContext,
  type ArticleDraft,
} from './articleExtractor';

export interface PostPage {
  html: string;
  pageUrl: string;
}

/**
 * Fetches a blog post. Platforms that serve posts inside an outer frame page are
 * followed one hop into the frame.
 */
export async function fetchPostPage(
  url: string,
  platform: BlogPlatformRule,
  deps: ExtractionDeps
): Promise<PostPage> {
  const page = await deps.fetchPage(url, { correlationId: deps.correlationId });
  if (!platform.frameSelector) {
    return { html: page.bodyText, pageUrl: url };
  }

  const $ = cheerio.load(page.bodyText);
  if (findEditorContainer($)) {
    return { html: page.bodyText, pageUrl: url };
  }

  const frameSrc = $(platform.frameSelector).first().attr('src');
  const frameUrl = frameSrc ? absolutizeUrl(frameSrc, `https://${platform.canonicalHost}/`) : null;
  if (!frameUrl || frameUrl === url) {
    return { html: page.bodyText, pageUrl: url };
  }

  const framed = await deps.fetchPage(frameUrl, { correlationId: deps.correlationId });
  return { html: framed.bodyText, pageUrl: frameUrl };
}

function blockModelStrategy(
  url: string,
  platform: BlogPlatformRule,
  context: ArticleContext
): Strategy<ArticleDraft> {
  return {
    name: 'block-model',
    run: async () => {
      const { html, pageUrl } = await fetchPostPage(url, platform, context.deps);
      const document = await parseBlockModel(html, {
        pageUrl,
        platform,
        images: context.images,
        logger: context.logger,
      });

      return {
        title: document.title,
        body: cleanExtractedText(renderParts(document.parts), {
          siteHost: platform.canonicalHost,
        }),
        auxiliaryHtml: document.auxiliaryHtml,
        method: 'block-model',
      };
    },
  };
}

/**
 * Post on a structured-editor blog platform: block-model parse, then the DOM walk on
 * the same post. Never throws.
 */
export async function extractEditorBlogPost(
  url: string,
  platform: BlogPlatformRule,
  deps: ExtractionDeps
): Promise<ExtractionResult> {
  const logger = createChildLogger(deps.correlationId);
  const context: ArticleContext = {
    deps,
    images: new ImageResolutionSession(deps.imageResolver, logger),
    logger,
  };

  return withTiming(
    logger,
    'editor_blog_extraction',
    async () => {
      const outcome = await runStrategies(
        [
          blockModelStrategy(url, platform, context),
          domWalkStrategy(url, context, platform.titleSuffixPattern, () =>
            fetchPostPage(url, platform, deps)
          ),
        ],
        { logger, event: 'editor_blog_strategy', isEmpty: isEmptyDraft }
      );

      if (!outcome.ok) {
        logger.warn({ event: 'editor_blog_failed', url }, 'Every blog strategy failed');
        return failedArticleResult(url, outcome.failures);
      }
      return draftToResult(url, outcome.value, outcome.failures);
    },
    { url, platform: platform.name }
  );
}
