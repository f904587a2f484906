import { describe, test, expect } from '@jest/globals';
import pino from 'pino';
import * as cheerio from 'cheerio';
import {
  extractPageTitle,
  extractWithDomWalk,
} from '../../../../../src/core/content/extractors/domWalkExtractor';
import {
  ImageResolutionSession,
  remoteImageResolver,
} from '../../../../../src/core/images/imageResolver';

const logger = pino({ level: 'silent' });
const pageUrl = 'https://news.example/stories/1';

const html =
  '<html><head><title>News Item | Example</title></head><body>' +
  '<nav><p>Menu entries here</p></nav>' +
  '<article><h2>Heading Two</h2><div><p>First paragraph text.</p><p>ok</p></div>' +
  '<ul><li>List item one</li></ul>' +
  '<img src="/img/a.png"><img data-src="/img/a.png"><img src="data:image/png;base64,AAAA">' +
  '</article></body></html>';

describe('extractWithDomWalk', () => {
  test('reads innermost blocks of the content container, then its images', async () => {
    const images = new ImageResolutionSession(remoteImageResolver, logger);

    const result = await extractWithDomWalk(html, { pageUrl, images, logger });

    expect(result.title).toBe('News Item | Example');
    expect(result.parts).toEqual([
      { kind: 'text', text: 'Heading Two', headingLevel: 2, emphasis: false },
      { kind: 'text', text: 'First paragraph text.', headingLevel: 0, emphasis: false },
      { kind: 'text', text: 'List item one', headingLevel: 0, emphasis: false },
      { kind: 'image', ref: 'https://news.example/img/a.png', alt: '' },
    ]);
    expect(result.contentHtml.startsWith('<article>')).toBe(true);
  });

  test('strips the title suffix', async () => {
    const images = new ImageResolutionSession(remoteImageResolver, logger);

    const result = await extractWithDomWalk(html, {
      pageUrl,
      images,
      logger,
      titleSuffixPattern: /\s*\|\s*Example$/,
    });

    expect(result.title).toBe('News Item');
  });

  test('falls back to the body and drops page chrome', async () => {
    const images = new ImageResolutionSession(remoteImageResolver, logger);
    const page =
      '<html><body><header><p>Site header text</p></header><p>Only paragraph here</p>' +
      '<footer><p>Footer links here</p></footer></body></html>';

    const result = await extractWithDomWalk(page, { pageUrl, images, logger });

    expect(result.title).toBe('Untitled');
    expect(result.parts).toEqual([
      { kind: 'text', text: 'Only paragraph here', headingLevel: 0, emphasis: false },
    ]);
  });

  test('matches content classes only on div and section outside page chrome', async () => {
    const images = new ImageResolutionSession(remoteImageResolver, logger);
    const page =
      '<html><body><a class="skip-to-content">Skip</a>' +
      '<header><div class="post-header"><p>Site name here</p></div></header>' +
      '<div class="entry"><p>Real article paragraph one</p></div></body></html>';

    const result = await extractWithDomWalk(page, { pageUrl, images, logger });

    expect(result.parts).toEqual([
      { kind: 'text', text: 'Real article paragraph one', headingLevel: 0, emphasis: false },
    ]);
    expect(result.contentHtml).toBe('<div class="entry"><p>Real article paragraph one</p></div>');
  });

  test('keeps the text a wrapper holds beside its nested blocks, in reading order', async () => {
    const images = new ImageResolutionSession(remoteImageResolver, logger);
    const page =
      '<html><body><article><div>Lead paragraph of the <b>story</b><div><img src="/x.png"></div>' +
      'Closing line of the story<p>Nested paragraph</p></div></article></body></html>';

    const result = await extractWithDomWalk(page, { pageUrl, images, logger });

    expect(result.parts).toEqual([
      { kind: 'text', text: 'Lead paragraph of the story', headingLevel: 0, emphasis: false },
      { kind: 'text', text: 'Closing line of the story', headingLevel: 0, emphasis: false },
      { kind: 'text', text: 'Nested paragraph', headingLevel: 0, emphasis: false },
      { kind: 'image', ref: 'https://news.example/x.png', alt: '' },
    ]);
  });

  test('throws when nothing readable is left', async () => {
    const images = new ImageResolutionSession(remoteImageResolver, logger);

    await expect(
      extractWithDomWalk('<html><body><p>hi</p></body></html>', { pageUrl, images, logger })
    ).rejects.toThrow('Content not found: no readable blocks');
  });
});

describe('extractPageTitle', () => {
  test('prefers <title>, then og:title, then the first h1', () => {
    expect(
      extractPageTitle(cheerio.load('<head><meta property="og:title" content="OG Title"></head><h1>H</h1>'))
    ).toBe('OG Title');
    expect(extractPageTitle(cheerio.load('<h1> Main  heading </h1>'))).toBe('Main heading');
  });
});
