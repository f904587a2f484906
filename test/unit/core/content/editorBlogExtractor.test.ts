import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import {
  extractEditorBlogPost,
  fetchPostPage,
} from '../../../../src/core/content/editorBlogExtractor';
import type { ExtractionDeps } from '../../../../src/core/content/types/extraction';
import type { FetchOptions, FetchResult } from '../../../../src/core/content/httpContentFetcher';
import { remoteImageResolver } from '../../../../src/core/images/imageResolver';
import { NAVER_BLOG, type BlogPlatformRule } from '../../../../src/core/classify/platforms';

const postUrl = 'https://blog.naver.com/someone/1';
const frameUrl = 'https://blog.naver.com/PostView.naver?blogId=someone&logNo=1';

const shellHtml =
  '<html><body><iframe id="mainFrame" src="/PostView.naver?blogId=someone&amp;logNo=1"></iframe></body></html>';
const postHtml =
  '<html><head><title>Trip notes : 네이버 블로그</title></head><body><div class="se-main-container">' +
  '<div class="se-component se-text"><p class="se-text-paragraph">Hello there</p></div>' +
  '<div class="se-component se-horizontalLine"><hr></div>' +
  '</div></body></html>';

function page(bodyText: string): FetchResult {
  return { statusCode: 200, bodyText, contentType: 'text/html' };
}

describe('editorBlogExtractor', () => {
  const fetchPage = jest.fn<(url: string, options?: FetchOptions) => Promise<FetchResult>>();
  let deps: ExtractionDeps;

  beforeEach(() => {
    fetchPage.mockReset();
    deps = { fetchPage, imageResolver: remoteImageResolver, correlationId: 'test-correlation' };
  });

  test('follows the post frame one hop', async () => {
    fetchPage.mockImplementation(async url => page(url === frameUrl ? postHtml : shellHtml));

    await expect(fetchPostPage(postUrl, NAVER_BLOG, deps)).resolves.toEqual({
      html: postHtml,
      pageUrl: frameUrl,
    });
    expect(fetchPage.mock.calls.map(call => call[0])).toEqual([postUrl, frameUrl]);
  });

  test('does not follow a frame when the page already holds the editor', async () => {
    fetchPage.mockResolvedValue(page(postHtml));

    await expect(fetchPostPage(postUrl, NAVER_BLOG, deps)).resolves.toEqual({
      html: postHtml,
      pageUrl: postUrl,
    });
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  test('parses the block model of the framed post', async () => {
    fetchPage.mockImplementation(async url => page(url === frameUrl ? postHtml : shellHtml));

    const result = await extractEditorBlogPost(postUrl, NAVER_BLOG, deps);

    expect(result.extractionMethod).toBe('block-model');
    expect(result.title).toBe('Trip notes');
    expect(result.body).toBe('Hello there\n\n---');
    expect(result.sourceUrl).toBe(postUrl);
    expect(result.note).toBeUndefined();
    expect(result.auxiliaryHtml).toContain('<p class="se-text-paragraph">Hello there</p>');
  });

  test('falls back to the DOM walk for posts without editor markup', async () => {
    const platform: BlogPlatformRule = { ...NAVER_BLOG, frameSelector: undefined };
    const url = 'https://blog.naver.com/someone/2';
    fetchPage.mockResolvedValue(
      page(
        '<html><head><title>Plain : 네이버 블로그</title></head><body><article><p>Old style post body</p></article></body></html>'
      )
    );

    const result = await extractEditorBlogPost(url, platform, deps);

    expect(result.extractionMethod).toBe('dom-walk');
    expect(result.title).toBe('Plain');
    expect(result.body).toBe('Old style post body');
    expect(result.note).toBe(
      `Fallback extraction used (block-model: Content not found: no editor container for URL: ${url})`
    );
  });
});
