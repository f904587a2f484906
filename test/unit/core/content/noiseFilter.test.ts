import { describe, test, expect } from '@jest/globals';
import {
  cleanExtractedText,
  filterNoiseLines,
  jaccardSimilarity,
} from '../../../../src/core/content/noiseFilter';

describe('jaccardSimilarity', () => {
  test('compares character sets ignoring whitespace', () => {
    expect(jaccardSimilarity('ab c', 'cba')).toBe(1);
    expect(jaccardSimilarity('ab', 'cd')).toBe(0);
    expect(jaccardSimilarity('abc', 'abd')).toBe(0.5);
  });

  test('treats two blank lines as identical', () => {
    expect(jaccardSimilarity('  ', '')).toBe(1);
  });
});

describe('filterNoiseLines', () => {
  test('drops a repeated boilerplate line entirely', () => {
    expect(cleanExtractedText('Copyright notice XYZ\nCopyright notice XYZ')).toBe('');
  });

  test('drops exact duplicates anywhere in the text', () => {
    expect(filterNoiseLines(['alpha', 'beta', 'alpha'])).toEqual(['alpha', 'beta']);
  });

  test('collapses blank runs and trims blank edges', () => {
    expect(filterNoiseLines(['', 'a', '', '', 'b', '   ', 'c', ''])).toEqual([
      'a',
      '',
      'b',
      '',
      'c',
    ]);
  });

  test('removes pipe-only table rows', () => {
    expect(filterNoiseLines(['| | |', 'kept'])).toEqual(['kept']);
  });

  test('removes bare site-domain lines', () => {
    const lines = ['blog.example.com', 'Visit example.com...', 'Read about example.com today'];
    expect(filterNoiseLines(lines, { siteHost: 'example.com' })).toEqual([
      'Read about example.com today',
    ]);
  });

  test('removes platform notices', () => {
    expect(filterNoiseLines(['본문 바로가기', '여행 첫째 날'])).toEqual(['여행 첫째 날']);
  });

  test('drops near-duplicates of recent lines', () => {
    const lines = [
      'The quick brown fox jumps over the lazy dog',
      'The quick brown fox jumps over the lazy dog!',
    ];
    expect(filterNoiseLines(lines)).toEqual(['The quick brown fox jumps over the lazy dog']);
    expect(filterNoiseLines(lines, { nearDuplicateThreshold: 0.99 })).toEqual(lines);
  });

  test('never compares short lines', () => {
    expect(filterNoiseLines(['abc', 'acb'])).toEqual(['abc', 'acb']);
  });

  test('keeps image lines whose URLs differ slightly', () => {
    const lines = [
      '![photo](https://cdn.example/posts/img_1.png)',
      '![photo](https://cdn.example/posts/img_2.png)',
    ];
    expect(filterNoiseLines(lines)).toEqual(lines);
  });

  test('is idempotent and leaves no adjacent duplicates', () => {
    const input = [
      '  Title  ',
      '',
      'First paragraph with enough words to compare',
      'First paragraph with enough words to compare.',
      '',
      '',
      'Title',
      '| |',
      'Second paragraph',
      'Second paragraph',
    ];
    const once = filterNoiseLines(input);
    expect(once).toEqual([
      '  Title',
      '',
      'First paragraph with enough words to compare',
      '',
      'Second paragraph',
    ]);
    expect(filterNoiseLines(once)).toEqual(once);
    once.forEach((line, i) => {
      if (i > 0 && line !== '') expect(line).not.toBe(once[i - 1]);
    });
  });
});
