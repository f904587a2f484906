import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import pino from 'pino';
import {
  blockKindOf,
  isMediaHost,
  parseBlockModel,
} from '../../../../../src/core/content/extractors/blockModelParser';
import { renderLinkCard } from '../../../../../src/core/content/contentParts';
import { ImageResolutionSession } from '../../../../../src/core/images/imageResolver';
import { NAVER_BLOG, type BlogPlatformRule } from '../../../../../src/core/classify/platforms';
import { ContentNotFoundError } from '../../../../../src/core/errors';

const logger = pino({ level: 'silent' });
const platform: BlogPlatformRule = { ...NAVER_BLOG, mediaHosts: ['cdn.example'] };
const pageUrl = 'https://blog.naver.com/someone/1';

function page(components: string): string {
  return (
    '<html><head><title>Trip notes : 네이버 블로그</title></head><body>' +
    `<div class="se-main-container">${components}</div></body></html>`
  );
}

describe('parseBlockModel', () => {
  const resolve = jest.fn(async (_url: string, baseName: string) => `assets/${baseName.replace(/ /g, '_')}.png`);
  let images: ImageResolutionSession;

  beforeEach(() => {
    resolve.mockClear();
    images = new ImageResolutionSession({ resolve }, logger);
  });

  test('emits text, divider and image parts in reading order', async () => {
    const html = page(
      '<div class="se-component se-text"><p class="se-text-paragraph">Hello</p></div>' +
        '<div class="se-component se-horizontalLine"><hr></div>' +
        '<div class="se-component se-image"><img class="se-image-resource" src="https://cdn.example/a.png" alt="photo"></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.title).toBe('Trip notes');
    expect(document.parts).toEqual([
      { kind: 'text', text: 'Hello', headingLevel: 0, emphasis: false },
      { kind: 'divider' },
      { kind: 'image', ref: 'assets/Trip_notes_img_1.png', alt: 'photo' },
    ]);
    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith('https://cdn.example/a.png', 'Trip notes_img_1');
    expect(document.auxiliaryHtml).toContain('src="assets/Trip_notes_img_1.png"');
  });

  test('keeps images outside the media hosts remote', async () => {
    const html = page(
      '<div class="se-component se-image"><img class="se-image-resource" data-lazy-src="//other.example/b.jpg" src="data:image/gif;base64,R0lGOD"></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([{ kind: 'image', ref: 'https://other.example/b.jpg', alt: '' }]);
    expect(resolve).not.toHaveBeenCalled();
  });

  test('marks section titles as headings and lone bold paragraphs as emphasis', async () => {
    const html = page(
      '<div class="se-component se-documentTitle"><div class="se-title-text">Day One</div></div>' +
        '<div class="se-component se-sectionTitle"><p class="se-text-paragraph">Chapter</p></div>' +
        '<div class="se-component se-text">' +
        '<p class="se-text-paragraph"><b>Important</b></p>' +
        '<p class="se-text-paragraph">Mixed <b>bold</b></p>' +
        '<p class="se-text-paragraph">   </p>' +
        '</div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.title).toBe('Day One');
    expect(document.parts).toEqual([
      { kind: 'text', text: 'Chapter', headingLevel: 3, emphasis: false },
      { kind: 'text', text: 'Important', headingLevel: 0, emphasis: true },
      { kind: 'text', text: 'Mixed bold', headingLevel: 0, emphasis: false },
    ]);
  });

  test('leaves paragraphs in ordinary text sections at body level', async () => {
    const html = page(
      '<div class="se-component se-text"><div class="se-section se-section-text">' +
        '<p class="se-text-paragraph">Body copy</p></div></div>' +
        '<div class="se-component se-sectionTitle"><div class="se-section se-section-sectionTitle">' +
        '<p class="se-text-paragraph">Part Two</p></div></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([
      { kind: 'text', text: 'Body copy', headingLevel: 0, emphasis: false },
      { kind: 'text', text: 'Part Two', headingLevel: 3, emphasis: false },
    ]);
  });

  test('keeps tables and quotes as single-line markup', async () => {
    const html = page(
      '<div class="se-component se-table"><table><tbody><tr><td>1</td></tr></tbody></table></div>' +
        '<div class="se-component se-quotation"><div class="se-quote-container">\n  <p>A</p>\n  <p>B</p>\n</div></div>' +
        '<div class="se-component se-quotation"><blockquote><p>Wise words</p></blockquote></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([
      { kind: 'table', markup: '<table><tbody><tr><td>1</td></tr></tbody></table>' },
      { kind: 'quote', markup: '<div class="se-quote-container"> <p>A</p> <p>B</p> </div>' },
      { kind: 'quote', markup: '> Wise words' },
    ]);
  });

  test('turns link cards into external link parts and mirrors their rendering', async () => {
    const html = page(
      '<div class="se-component se-oglink"><a class="se-oglink-info" href="https://ext.example/story">' +
        '<strong class="se-oglink-title">Story</strong><p class="se-oglink-summary">Summary</p>' +
        '<p class="se-oglink-url">ext.example</p></a></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });
    const card = {
      kind: 'externalLink' as const,
      url: 'https://ext.example/story',
      title: 'Story',
      description: 'Summary',
      domain: 'ext.example',
      thumbnailRef: null,
    };

    expect(document.parts).toEqual([card]);
    expect(document.auxiliaryHtml).toContain(renderLinkCard(card));
    expect(document.auxiliaryHtml).not.toContain('se-oglink-info');
  });

  test('keeps whitespace between inline tags in table markup', async () => {
    const html = page(
      '<div class="se-component se-table"><table>\n  <tbody><tr><td><b>Hello</b> <i>world</i></td></tr></tbody>\n</table></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([
      {
        kind: 'table',
        markup: '<table> <tbody><tr><td><b>Hello</b> <i>world</i></td></tr></tbody> </table>',
      },
    ]);
  });

  test('resolves a media-host link card thumbnail once and renders it in the card', async () => {
    const html = page(
      '<div class="se-component se-oglink"><a class="se-oglink-info" href="https://ext.example/story">' +
        '<img class="se-oglink-thumbnail-resource" src="https://cdn.example/thumb.jpg">' +
        '<strong class="se-oglink-title">Story</strong></a></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([
      {
        kind: 'externalLink',
        url: 'https://ext.example/story',
        title: 'Story',
        description: '',
        domain: 'ext.example',
        thumbnailRef: 'assets/Trip_notes_img_1.png',
      },
    ]);
    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith('https://cdn.example/thumb.jpg', 'Trip notes_img_1');
    expect(document.auxiliaryHtml).toContain(
      '<div class="link-card"><a href="https://ext.example/story" target="_blank" rel="noopener noreferrer">' +
        '<div class="link-card-thumbnail"><img src="assets/Trip_notes_img_1.png" alt="Story"></div>' +
        '<div class="link-card-body"><div class="link-card-title">Story</div>' +
        '<div class="link-card-domain">ext.example</div></div></a></div>'
    );
  });

  test('keeps a link card thumbnail from another host remote', async () => {
    const html = page(
      '<div class="se-component se-oglink"><a class="se-oglink-info" href="https://ext.example/story">' +
        '<img class="se-oglink-thumbnail-resource" src="//other.example/t.jpg">' +
        '<strong class="se-oglink-title">Story</strong></a></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([
      {
        kind: 'externalLink',
        url: 'https://ext.example/story',
        title: 'Story',
        description: '',
        domain: 'ext.example',
        thumbnailRef: 'https://other.example/t.jpg',
      },
    ]);
    expect(resolve).not.toHaveBeenCalled();
    expect(document.auxiliaryHtml).toContain(
      '<div class="link-card-thumbnail"><img src="https://other.example/t.jpg" alt="Story"></div>'
    );
  });

  test('keeps a link card without a target as raw markup', async () => {
    const html = page(
      '<div class="se-component se-oglink"><div class="se-oglink-title">Broken</div></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([
      {
        kind: 'raw',
        markup: '<div class="se-component se-oglink"><div class="se-oglink-title">Broken</div></div>',
      },
    ]);
  });

  test('keeps unknown blocks as raw markup without scripts', async () => {
    const html = page(
      '<div class="se-component se-video"><iframe src="https://v.example/embed"></iframe><script>track()</script></div>'
    );

    const document = await parseBlockModel(html, { pageUrl, platform, images, logger });

    expect(document.parts).toEqual([
      { kind: 'raw', markup: '<div class="se-component se-video"><iframe src="https://v.example/embed"></iframe></div>' },
    ]);
  });

  test('throws when the editor container is missing or empty', async () => {
    await expect(
      parseBlockModel('<html><body><p>plain</p></body></html>', { pageUrl, platform, images, logger })
    ).rejects.toThrow(ContentNotFoundError);

    await expect(parseBlockModel(page(''), { pageUrl, platform, images, logger })).rejects.toThrow(
      'Content not found: editor container holds no content'
    );
  });
});

describe('block helpers', () => {
  test('blockKindOf matches class prefixes', () => {
    expect(blockKindOf('se-component se-text se-l-default')).toBe('text');
    expect(blockKindOf('se-component se-imageStrip')).toBe('image');
    expect(blockKindOf('se-component se-sticker')).toBe('other');
    expect(blockKindOf(undefined)).toBe('other');
  });

  test('isMediaHost accepts subdomains of media hosts', () => {
    expect(isMediaHost('https://img.cdn.example/a.png', platform)).toBe(true);
    expect(isMediaHost('https://cdn.example.org/a.png', platform)).toBe(false);
    expect(isMediaHost('not a url', platform)).toBe(false);
  });
});
