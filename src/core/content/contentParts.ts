import type { ContentPart, HeadingLevel } from './types/extraction';

export function assertNever(value: never): never {
  throw new Error(`Unhandled content part: ${JSON.stringify(value)}`);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Text part, or null when there is nothing but whitespace. */
export function textPart(
  text: string,
  headingLevel: HeadingLevel = 0,
  emphasis = false
): ContentPart | null {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (!normalized) return null;
  return { kind: 'text', text: normalized, headingLevel, emphasis };
}

type LinkCardPart = Extract<ContentPart, { kind: 'externalLink' }>;

/** Single-line HTML card; the thumbnail column is left out when there is none. */
export function renderLinkCard(card: LinkCardPart): string {
  const url = escapeHtml(card.url);
  const title = escapeHtml(card.title || card.url);
  const details = [
    `<div class="link-card-title">${title}</div>`,
    card.description ? `<div class="link-card-description">${escapeHtml(card.description)}</div>` : '',
    card.domain ? `<div class="link-card-domain">${escapeHtml(card.domain)}</div>` : '',
  ].join('');

  const thumbnail = card.thumbnailRef
    ? `<div class="link-card-thumbnail"><img src="${escapeHtml(card.thumbnailRef)}" alt="${title}"></div>`
    : '';
  const cardClass = card.thumbnailRef ? 'link-card' : 'link-card link-card-no-thumbnail';

  return (
    `<div class="${cardClass}"><a href="${url}" target="_blank" rel="noopener noreferrer">` +
    `${thumbnail}<div class="link-card-body">${details}</div></a></div>`
  );
}

export function renderPart(part: ContentPart): string {
  switch (part.kind) {
    case 'text':
      if (part.headingLevel > 0) return `${'#'.repeat(part.headingLevel)} ${part.text}`;
      return part.emphasis ? `**${part.text}**` : part.text;
    case 'image':
      return `![${part.alt}](${part.ref})`;
    case 'table':
    case 'quote':
    case 'raw':
      return part.markup;
    case 'divider':
      return '---';
    case 'externalLink':
      return renderLinkCard(part);
    default:
      return assertNever(part);
  }
}

/** Markdown body with a blank line between parts. */
export function renderParts(parts: readonly ContentPart[]): string {
  return parts
    .map(renderPart)
    .filter(rendered => rendered.trim().length > 0)
    .join('\n\n');
}
