import type * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { ContentPart } from '../types/extraction';
import { absolutizeUrl, hostOf } from '../urlResolver';
import type { ImageResolutionSession } from '../../images/imageResolver';
import { ContentNotFoundError } from '../../errors';
import {
  LINK_CARD_ANCHOR_SELECTOR,
  LINK_CARD_DESCRIPTION_SELECTOR,
  LINK_CARD_DOMAIN_SELECTOR,
  LINK_CARD_THUMBNAIL_ATTRIBUTES,
  LINK_CARD_THUMBNAIL_SELECTOR,
  LINK_CARD_TITLE_SELECTOR,
} from './selectors';
import { firstAttribute, normalizeText } from './markup';

export type LinkCardPart = Extract<ContentPart, { kind: 'externalLink' }>;

export interface LinkCardContext {
  pageUrl: string;
  images: ImageResolutionSession;
  /** Thumbnails failing this stay remote. */
  shouldResolve: (absoluteUrl: string) => boolean;
  thumbnailBaseName: () => string;
}

/**
 * Reads an external link card (`se-oglink`). Throws when the card carries no usable
 * link target; callers keep the card's markup instead.
 */
export async function buildLinkCard(
  component: cheerio.Cheerio<AnyNode>,
  context: LinkCardContext
): Promise<LinkCardPart> {
  const anchor = component.find(LINK_CARD_ANCHOR_SELECTOR).first();
  const href = anchor.attr('href') ?? component.find('a[href]').first().attr('href');
  const url = href ? absolutizeUrl(href, context.pageUrl) : null;
  if (!url) {
    throw new ContentNotFoundError('link card has no target', context.pageUrl);
  }

  const title = normalizeText(component.find(LINK_CARD_TITLE_SELECTOR).first().text());
  const description = normalizeText(component.find(LINK_CARD_DESCRIPTION_SELECTOR).first().text());
  const domain = normalizeText(component.find(LINK_CARD_DOMAIN_SELECTOR).first().text()) || hostOf(url);

  let thumbnailRef: string | null = null;
  const thumbnail = component.find(LINK_CARD_THUMBNAIL_SELECTOR).first();
  const thumbnailSrc = thumbnail.length > 0 ? firstAttribute(thumbnail, LINK_CARD_THUMBNAIL_ATTRIBUTES) : null;
  const thumbnailUrl = thumbnailSrc ? absolutizeUrl(thumbnailSrc, context.pageUrl) : null;
  if (thumbnailUrl) {
    thumbnailRef = context.shouldResolve(thumbnailUrl)
      ? await context.images.resolveOrKeep(thumbnailUrl, context.thumbnailBaseName)
      : thumbnailUrl;
  }

  return { kind: 'externalLink', url, title: title || url, description, domain, thumbnailRef };
}
