// CSS selectors for locating and cleaning content

// Structured editor (SmartEditor-style block markup)
export const EDITOR_CONTAINER_SELECTOR = '.se-main-container';
export const LEGACY_EDITOR_CONTAINER_SELECTOR = '#postViewArea';
export const EDITOR_CONTAINER_SELECTORS = [
  EDITOR_CONTAINER_SELECTOR,
  LEGACY_EDITOR_CONTAINER_SELECTOR,
] as const;

export const EDITOR_COMPONENT_SELECTOR = '.se-component';

export const EDITOR_TITLE_SELECTORS =
  '.se-title-text, .se-ff-nanumgothic.se-fs-32, #title_1 span, .title_text, .article_header .title_text, h2.tit';

export const EDITOR_PARAGRAPH_SELECTOR = '.se-text-paragraph';
export const EDITOR_HEADING_SECTION_SELECTOR = '.se-section-sectionTitle, .se-sectionTitle';
export const EDITOR_IMAGE_SELECTOR = 'img.se-image-resource';
export const EDITOR_QUOTE_CONTAINER_SELECTOR = '.se-quote-container, .se-quote-module';

export const LINK_CARD_ANCHOR_SELECTOR = 'a.se-oglink-info';
export const LINK_CARD_TITLE_SELECTOR = '.se-oglink-title';
export const LINK_CARD_DESCRIPTION_SELECTOR = '.se-oglink-summary, .se-oglink-desc';
export const LINK_CARD_DOMAIN_SELECTOR = '.se-oglink-url';
export const LINK_CARD_THUMBNAIL_SELECTOR =
  'img.se-oglink-thumbnail-resource, img.se-oglink-thumbnail';
export const LINK_CARD_COMPONENT_SELECTOR = '.se-component.se-oglink';

// Elements dropped from the auxiliary HTML mirror
export const MIRROR_NOISE_SELECTORS =
  'script, style, button, .se-documentTitle, .article_writer, .CommentBox, .ccl';

export const SCRIPT_STYLE_SELECTORS = 'script, style';

// Generic article fallback
export const CONTENT_CLASS_PATTERN = /content|article|post|entry|view/i;

export const FALLBACK_STRIP_SELECTORS =
  'script, style, noscript, nav, header, footer, aside, .advertisement, .ad';

export const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const;

export const WALK_TAGS: readonly string[] = ['p', 'div', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'li', 'blockquote', 'pre'];
export const WALK_SELECTORS = WALK_TAGS.join(', ');

// Elements eligible for the class-name container match, and the chrome they must sit outside of
export const CONTENT_CLASS_CANDIDATES = 'div, section';
export const PAGE_CHROME_SELECTORS = 'nav, header, footer, aside';

// Readability pre-cleaning: keep images and tables, drop what never carries article text
export const READABILITY_STRIP_SELECTORS =
  'script, noscript, style, link[rel="stylesheet"], template, iframe, form, button, input, select, textarea';

// Lazy-load attributes, highest priority first
export const EDITOR_IMAGE_SOURCE_ATTRIBUTES = ['data-lazy-src', 'src', 'data-src', 'data-original'];
export const FALLBACK_IMAGE_SOURCE_ATTRIBUTES = ['src', 'data-src', 'data-lazy-src'];
export const LINK_CARD_THUMBNAIL_ATTRIBUTES = ['src', 'data-src', 'data-lazy-src'];
export const LAZY_IMAGE_ATTRIBUTES = ['data-lazy-src', 'data-src', 'data-original'];
