import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { SCRIPT_STYLE_SELECTORS } from './selectors';

/** Collapses runs of whitespace and trims. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Outer HTML of an element on a single line, with scripts and styles removed.
 * Body lines are deduplicated one by one, so block markup must not span lines.
 */
export function cleanOuterHtml($: cheerio.CheerioAPI, element: cheerio.Cheerio<AnyNode>): string {
  const copy = element.clone();
  copy.find(SCRIPT_STYLE_SELECTORS).remove();
  return toSingleLine($.html(copy));
}

/** Folds line breaks and their indentation into one space; other whitespace is content. */
export function toSingleLine(markup: string): string {
  return markup.replace(/\s*\n\s*/g, ' ').trim();
}

/** First non-empty attribute among `names`, in order. */
export function firstAttribute(
  element: cheerio.Cheerio<AnyNode>,
  names: readonly string[]
): string | null {
  for (const name of names) {
    const value = element.attr(name)?.trim();
    if (value) return value;
  }
  return null;
}

/** Decodes character references; any markup in the input is dropped. */
export function decodeHtmlEntities(text: string): string {
  if (!text.includes('&')) return text;
  return cheerio.load(text, null, false).root().text();
}
