import * as cheerio from 'cheerio';
import type { ImageResolutionSession } from '../../images/imageResolver';
import { absolutizeUrl } from '../urlResolver';
import { LAZY_IMAGE_ATTRIBUTES, LINK_CARD_COMPONENT_SELECTOR, MIRROR_NOISE_SELECTORS } from './selectors';
import { firstAttribute } from './markup';

export interface HtmlMirrorOptions {
  pageUrl: string;
  images: ImageResolutionSession;
  /** Which image URLs go through the resolver; the rest stay remote. */
  shouldResolve: (absoluteUrl: string) => boolean;
  nextImageBaseName: () => string;
  /** Candidate source attributes, highest priority first. */
  imageSourceAttributes: readonly string[];
  /** Renderings of the fragment's link cards, in document order. */
  linkCards?: readonly string[];
}

/**
 * HTML copy of extracted content for consumers that render markup rather than
 * markdown. Images point at resolved references, embeds at absolute URLs.
 */
export async function prepareHtmlMirror(fragment: string, options: HtmlMirrorOptions): Promise<string> {
  const $ = cheerio.load(fragment, null, false);

  $(MIRROR_NOISE_SELECTORS).remove();

  for (const element of $('img').toArray()) {
    const img = $(element);
    const candidate = firstAttribute(img, options.imageSourceAttributes);
    const absolute = candidate ? absolutizeUrl(candidate, options.pageUrl) : null;

    if (!absolute) {
      img.attr('style', 'display:none');
      continue;
    }

    const ref = options.shouldResolve(absolute)
      ? await options.images.resolveOrKeep(absolute, options.nextImageBaseName)
      : absolute;

    img.attr('src', ref);
    img.removeAttr('srcset');
    for (const attribute of LAZY_IMAGE_ATTRIBUTES) {
      img.removeAttr(attribute);
    }
  }

  // Card renderings already carry resolved thumbnails, so they go in after the image pass
  if (options.linkCards && options.linkCards.length > 0) {
    const cards = options.linkCards;
    $(LINK_CARD_COMPONENT_SELECTOR).each((index, element) => {
      const rendering = cards[index];
      if (rendering !== undefined) {
        $(element).replaceWith(rendering);
      }
    });
  }

  $('iframe[src], video[src]').each((_, element) => {
    const embed = $(element);
    const src = embed.attr('src');
    const absolute = src ? absolutizeUrl(src, options.pageUrl) : null;
    if (absolute) embed.attr('src', absolute);
  });

  return $.html().trim();
}
