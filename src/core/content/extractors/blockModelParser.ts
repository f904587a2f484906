import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type pino from 'pino';
import type { ContentPart } from '../types/extraction';
import type { BlogPlatformRule } from '../../classify/platforms';
import { hostMatches } from '../../classify/platforms';
import type { ImageResolutionSession } from '../../images/imageResolver';
import { absolutizeUrl, hostOf } from '../urlResolver';
import { textPart, renderLinkCard } from '../contentParts';
import { ContentNotFoundError, errorMessage } from '../../errors';
import { ARTICLE_THRESHOLDS, UNTITLED } from '../../../config/constants';
import {
  EDITOR_COMPONENT_SELECTOR,
  EDITOR_CONTAINER_SELECTORS,
  EDITOR_HEADING_SECTION_SELECTOR,
  EDITOR_IMAGE_SELECTOR,
  EDITOR_IMAGE_SOURCE_ATTRIBUTES,
  EDITOR_PARAGRAPH_SELECTOR,
  EDITOR_QUOTE_CONTAINER_SELECTOR,
  EDITOR_TITLE_SELECTORS,
  SCRIPT_STYLE_SELECTORS,
} from './selectors';
import { cleanOuterHtml, firstAttribute, normalizeText, toSingleLine } from './markup';
import { buildLinkCard } from './linkCard';
import { prepareHtmlMirror } from './auxiliaryHtml';

type BlockKind = 'title' | 'text' | 'image' | 'table' | 'quote' | 'divider' | 'linkCard' | 'other';

// Matched against the component's class tokens by prefix; first hit wins
const BLOCK_KIND_PREFIXES: ReadonlyArray<readonly [string, BlockKind]> = [
  ['se-documentTitle', 'title'],
  ['se-sectionTitle', 'text'],
  ['se-text', 'text'],
  ['se-image', 'image'],
  ['se-table', 'table'],
  ['se-quot', 'quote'],
  ['se-horizontalLine', 'divider'],
  ['se-oglink', 'linkCard'],
];

export interface BlockModelParseOptions {
  pageUrl: string;
  platform: BlogPlatformRule;
  images: ImageResolutionSession;
  logger: pino.Logger;
}

export interface BlockModelDocument {
  title: string;
  parts: ContentPart[];
  auxiliaryHtml: string;
}

export function findEditorContainer($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> | null {
  for (const selector of EDITOR_CONTAINER_SELECTORS) {
    const container = $(selector).first();
    if (container.length > 0) return container;
  }
  return null;
}

export function extractEditorTitle($: cheerio.CheerioAPI, platform?: BlogPlatformRule): string {
  const candidates = [
    normalizeText($(EDITOR_TITLE_SELECTORS).first().text()),
    normalizeText($('title').first().text()),
  ];
  const raw = candidates.find(candidate => candidate.length > 0) ?? '';
  const stripped = platform?.titleSuffixPattern ? raw.replace(platform.titleSuffixPattern, '') : raw;
  return stripped.trim() || UNTITLED;
}

export function blockKindOf(classAttribute: string | undefined): BlockKind {
  const tokens = (classAttribute ?? '').split(/\s+/).filter(token => token !== 'se-component');
  for (const [prefix, kind] of BLOCK_KIND_PREFIXES) {
    if (tokens.some(token => token.startsWith(prefix))) return kind;
  }
  return 'other';
}

export function isMediaHost(url: string, platform: BlogPlatformRule): boolean {
  const host = hostOf(url);
  return host !== '' && platform.mediaHosts.some(mediaHost => hostMatches(host, mediaHost));
}

/**
 * Walks a structured-editor post into content parts, one block at a time and in
 * reading order. Throws `ContentNotFoundError` when the page has no editor container
 * or the container yields nothing.
 */
export async function parseBlockModel(
  html: string,
  options: BlockModelParseOptions
): Promise<BlockModelDocument> {
  const { pageUrl, platform, images, logger } = options;
  const $ = cheerio.load(html);

  const container = findEditorContainer($);
  if (!container) {
    throw new ContentNotFoundError('no editor container', pageUrl);
  }

  const title = extractEditorTitle($, platform);
  let imageCounter = 0;
  const nextImageBaseName = (): string => `${title}_img_${++imageCounter}`;

  const parts: ContentPart[] = [];
  const linkCards: string[] = [];

  const components = container
    .find(EDITOR_COMPONENT_SELECTOR)
    .filter((_, element) => $(element).parents(EDITOR_COMPONENT_SELECTOR).length === 0)
    .toArray();

  for (const element of components) {
    const component = $(element);
    const kind = blockKindOf(component.attr('class'));

    switch (kind) {
      case 'title':
        break;
      case 'text':
        parts.push(...textBlock($, component));
        break;
      case 'image':
        for (const img of component.find(EDITOR_IMAGE_SELECTOR).toArray()) {
          const source = firstAttribute($(img), EDITOR_IMAGE_SOURCE_ATTRIBUTES);
          const absolute = source ? absolutizeUrl(source, pageUrl) : null;
          if (!absolute) continue;

          const ref = isMediaHost(absolute, platform)
            ? await images.resolveOrKeep(absolute, nextImageBaseName)
            : absolute;
          parts.push({ kind: 'image', ref, alt: normalizeText($(img).attr('alt') ?? '') });
        }
        break;
      case 'table': {
        const table = component.find('table').first();
        if (table.length > 0) {
          parts.push({ kind: 'table', markup: toSingleLine($.html(table)) });
        }
        break;
      }
      case 'quote': {
        const quote = quoteBlock($, component);
        if (quote) parts.push(quote);
        break;
      }
      case 'divider':
        parts.push({ kind: 'divider' });
        break;
      case 'linkCard':
        try {
          const card = await buildLinkCard(component, {
            pageUrl,
            images,
            shouldResolve: url => isMediaHost(url, platform),
            thumbnailBaseName: nextImageBaseName,
          });
          parts.push(card);
          linkCards.push(renderLinkCard(card));
        } catch (error) {
          const markup = cleanOuterHtml($, component);
          logger.debug(
            { event: 'link_card_degraded', error: errorMessage(error) },
            'Link card kept as raw markup'
          );
          parts.push({ kind: 'raw', markup });
          linkCards.push(markup);
        }
        break;
      case 'other': {
        const markup = cleanOuterHtml($, component);
        if (markup.length > ARTICLE_THRESHOLDS.MIN_RAW_BLOCK_LENGTH) {
          parts.push({ kind: 'raw', markup });
        }
        break;
      }
    }
  }

  if (parts.length === 0) {
    throw new ContentNotFoundError('editor container holds no content', pageUrl);
  }

  const auxiliaryHtml = await prepareHtmlMirror($.html(container), {
    pageUrl,
    images,
    shouldResolve: url => isMediaHost(url, platform),
    nextImageBaseName,
    imageSourceAttributes: EDITOR_IMAGE_SOURCE_ATTRIBUTES,
    linkCards,
  });

  logger.debug(
    { event: 'block_model_parsed', components: components.length, parts: parts.length },
    'Editor blocks parsed'
  );

  return { title, parts, auxiliaryHtml };
}

function textBlock($: cheerio.CheerioAPI, component: cheerio.Cheerio<AnyNode>): ContentPart[] {
  const paragraphs = component.find(EDITOR_PARAGRAPH_SELECTOR).toArray();
  if (paragraphs.length === 0) {
    const part = textPart(component.text());
    return part ? [part] : [];
  }

  const parts: ContentPart[] = [];
  for (const element of paragraphs) {
    const paragraph = $(element);
    paragraph.find(SCRIPT_STYLE_SELECTORS).remove();
    const text = normalizeText(paragraph.text());
    if (!text) continue;

    const inHeading = paragraph.closest(EDITOR_HEADING_SECTION_SELECTOR).length > 0;
    const bold = paragraph.find('b, strong');
    const emphasis = !inHeading && bold.length === 1 && normalizeText(bold.text()) === text;

    const part = textPart(text, inHeading ? 3 : 0, emphasis);
    if (part) parts.push(part);
  }
  return parts;
}

function quoteBlock(
  $: cheerio.CheerioAPI,
  component: cheerio.Cheerio<AnyNode>
): ContentPart | null {
  const container = component.find(EDITOR_QUOTE_CONTAINER_SELECTOR).first();
  if (container.length > 0) {
    return { kind: 'quote', markup: cleanOuterHtml($, container) };
  }

  const text = normalizeText(component.text());
  return text ? { kind: 'quote', markup: `> ${text}` } : null;
}
