import { describe, test, expect } from '@jest/globals';
import {
  escapeHtml,
  renderLinkCard,
  renderPart,
  renderParts,
  textPart,
} from '../../../../src/core/content/contentParts';

describe('contentParts', () => {
  test('textPart collapses whitespace and rejects blank text', () => {
    expect(textPart('  Hello \n  world ')).toEqual({
      kind: 'text',
      text: 'Hello world',
      headingLevel: 0,
      emphasis: false,
    });
    expect(textPart(' \n ')).toBeNull();
  });

  test('renders each part kind', () => {
    expect(renderPart({ kind: 'text', text: 'Intro', headingLevel: 2, emphasis: false })).toBe(
      '## Intro'
    );
    expect(renderPart({ kind: 'text', text: 'Key', headingLevel: 0, emphasis: true })).toBe(
      '**Key**'
    );
    expect(renderPart({ kind: 'image', ref: 'assets/a.png', alt: 'photo' })).toBe(
      '![photo](assets/a.png)'
    );
    expect(renderPart({ kind: 'table', markup: '<table><tr><td>1</td></tr></table>' })).toBe(
      '<table><tr><td>1</td></tr></table>'
    );
    expect(renderPart({ kind: 'divider' })).toBe('---');
  });

  test('renders a link card without a thumbnail on one line', () => {
    expect(
      renderLinkCard({
        kind: 'externalLink',
        url: 'https://ex.com/a?b=1&c=2',
        title: 'Ex',
        description: '',
        domain: 'ex.com',
        thumbnailRef: null,
      })
    ).toBe(
      '<div class="link-card link-card-no-thumbnail"><a href="https://ex.com/a?b=1&amp;c=2" target="_blank" rel="noopener noreferrer">' +
        '<div class="link-card-body"><div class="link-card-title">Ex</div><div class="link-card-domain">ex.com</div></div></a></div>'
    );
  });

  test('renders a link card thumbnail before the body', () => {
    const html = renderLinkCard({
      kind: 'externalLink',
      url: 'https://ex.com/',
      title: '',
      description: 'About <things>',
      domain: '',
      thumbnailRef: 'assets/card.jpg',
    });
    expect(html).toBe(
      '<div class="link-card"><a href="https://ex.com/" target="_blank" rel="noopener noreferrer">' +
        '<div class="link-card-thumbnail"><img src="assets/card.jpg" alt="https://ex.com/"></div>' +
        '<div class="link-card-body"><div class="link-card-title">https://ex.com/</div>' +
        '<div class="link-card-description">About &lt;things&gt;</div></div></a></div>'
    );
  });

  test('renderParts separates parts by a blank line and skips empty markup', () => {
    expect(
      renderParts([
        { kind: 'text', text: 'Hello', headingLevel: 0, emphasis: false },
        { kind: 'raw', markup: '  ' },
        { kind: 'divider' },
      ])
    ).toBe('Hello\n\n---');
  });

  test('escapeHtml escapes quotes and ampersands', () => {
    expect(escapeHtml(`"a" & 'b'`)).toBe('&quot;a&quot; &amp; &#39;b&#39;');
  });
});
