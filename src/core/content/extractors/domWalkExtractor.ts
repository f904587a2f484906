import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';
import type pino from 'pino';
import type { ContentPart, HeadingLevel } from '../types/extraction';
import type { ImageResolutionSession } from '../../images/imageResolver';
import { absolutizeUrl } from '../urlResolver';
import { textPart } from '../contentParts';
import { ContentNotFoundError } from '../../errors';
import { ARTICLE_THRESHOLDS, UNTITLED } from '../../../config/constants';
import { withTiming } from '../../../utils/logger';
import {
  CONTENT_CLASS_CANDIDATES,
  CONTENT_CLASS_PATTERN,
  EDITOR_CONTAINER_SELECTORS,
  FALLBACK_IMAGE_SOURCE_ATTRIBUTES,
  FALLBACK_STRIP_SELECTORS,
  PAGE_CHROME_SELECTORS,
  WALK_SELECTORS,
  WALK_TAGS,
} from './selectors';
import { firstAttribute, normalizeText } from './markup';

export interface DomWalkOptions {
  pageUrl: string;
  images: ImageResolutionSession;
  logger: pino.Logger;
  titleSuffixPattern?: RegExp;
}

export interface DomWalkResult {
  title: string;
  parts: ContentPart[];
  /** Container markup after stripping, for the HTML mirror. */
  contentHtml: string;
}

function headingLevelOf(tagName: string): HeadingLevel {
  switch (tagName) {
    case 'h1':
      return 1;
    case 'h2':
      return 2;
    case 'h3':
      return 3;
    case 'h4':
      return 4;
    case 'h5':
      return 5;
    case 'h6':
      return 6;
    default:
      return 0;
  }
}

function findContentContainer($: cheerio.CheerioAPI): {
  container: cheerio.Cheerio<AnyNode>;
  selector: string;
} {
  for (const selector of [...EDITOR_CONTAINER_SELECTORS, 'article', 'main']) {
    const found = $(selector).first();
    if (found.length > 0) return { container: found, selector };
  }

  const byClass = $(CONTENT_CLASS_CANDIDATES)
    .filter(
      (_, element) =>
        CONTENT_CLASS_PATTERN.test($(element).attr('class') ?? '') &&
        $(element).closest(PAGE_CHROME_SELECTORS).length === 0
    )
    .first();
  if (byClass.length > 0) return { container: byClass, selector: 'class-pattern' };

  return { container: $('body').first(), selector: 'body' };
}

function pushTextBlock(parts: ContentPart[], raw: string, headingLevel: HeadingLevel): void {
  const text = normalizeText(raw);
  if (text.length <= ARTICLE_THRESHOLDS.MIN_FALLBACK_BLOCK_LENGTH) return;

  const part = textPart(text, headingLevel);
  if (part) parts.push(part);
}

/**
 * Document-order walk. Innermost blocks become one part each; a wrapper's own text
 * (text nodes and inline elements between its nested blocks) becomes a part per run.
 */
function collectTextBlocks(
  $: cheerio.CheerioAPI,
  parent: cheerio.Cheerio<AnyNode>,
  parts: ContentPart[]
): void {
  let run = '';
  const flush = (): void => {
    pushTextBlock(parts, run, 0);
    run = '';
  };

  for (const node of parent.contents().toArray()) {
    if (isText(node)) {
      run += node.data;
      continue;
    }
    if (!isTag(node)) continue;

    const element = $(node);
    const tagName = node.tagName.toLowerCase();
    if (element.find(WALK_SELECTORS).length > 0) {
      flush();
      collectTextBlocks($, element, parts);
    } else if (WALK_TAGS.includes(tagName)) {
      flush();
      pushTextBlock(parts, element.text(), headingLevelOf(tagName));
    } else {
      run += element.text();
    }
  }
  flush();
}

export function extractPageTitle($: cheerio.CheerioAPI, suffixPattern?: RegExp): string {
  const raw =
    normalizeText($('title').first().text()) ||
    normalizeText($('meta[property="og:title"]').attr('content') ?? '') ||
    normalizeText($('h1').first().text());
  const stripped = suffixPattern ? raw.replace(suffixPattern, '') : raw;
  return stripped.trim() || UNTITLED;
}

/**
 * Manual extraction for pages the primary strategies cannot read: text blocks in
 * document order, then every distinct image of the content container.
 */
export async function extractWithDomWalk(
  html: string,
  options: DomWalkOptions
): Promise<DomWalkResult> {
  const { pageUrl, images, logger } = options;

  return withTiming(logger, 'dom_walk_extraction', async () => {
    const $ = cheerio.load(html);
    const title = extractPageTitle($, options.titleSuffixPattern);

    const { container, selector } = findContentContainer($);
    if (container.length === 0) {
      throw new ContentNotFoundError('page has no body', pageUrl);
    }
    container.find(FALLBACK_STRIP_SELECTORS).remove();

    const parts: ContentPart[] = [];
    collectTextBlocks($, container, parts);

    const imageUrls = new Set<string>();
    container.find('img').each((_, element) => {
      const source = firstAttribute($(element), FALLBACK_IMAGE_SOURCE_ATTRIBUTES);
      const absolute = source ? absolutizeUrl(source, pageUrl) : null;
      if (absolute) imageUrls.add(absolute);
    });

    let imageCounter = 0;
    for (const url of imageUrls) {
      const ref = await images.resolveOrKeep(url, () => `${title}_img_${++imageCounter}`);
      parts.push({ kind: 'image', ref, alt: '' });
    }

    if (parts.length === 0) {
      throw new ContentNotFoundError('no readable blocks', pageUrl);
    }

    logger.debug(
      { event: 'dom_walk_complete', selector, parts: parts.length, images: imageUrls.size },
      'DOM walk finished'
    );

    return { title, parts, contentHtml: $.html(container) };
  });
}
