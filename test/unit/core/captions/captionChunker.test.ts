import { describe, test, expect } from '@jest/globals';
import {
  chunkCues,
  cleanCaptionText,
  cuesToTranscript,
  formatTimestamp,
  parseTimedCaptionDocument,
  parseTimestamp,
  tryParseTimestamp,
} from '../../../../src/core/captions/captionChunker';
import type { CaptionCue } from '../../../../src/core/captions/types';

function cue(startSeconds: number, text: string): CaptionCue {
  return { startSeconds, text };
}

describe('timestamps', () => {
  test('parses clock forms to whole seconds', () => {
    expect(parseTimestamp('1:02:03')).toBe(3723);
    expect(parseTimestamp('12:34')).toBe(754);
    expect(parseTimestamp('00:00:07.900')).toBe(7);
  });

  test('rejects unreadable timestamps', () => {
    expect(tryParseTimestamp('12.5')).toBeNull();
    expect(tryParseTimestamp('ab:cd')).toBeNull();
    expect(() => parseTimestamp('')).toThrow('Invalid timestamp: ');
  });

  test('formats seconds as HH:MM:SS', () => {
    expect(formatTimestamp(3723)).toBe('01:02:03');
    expect(formatTimestamp(59.9)).toBe('00:00:59');
    expect(formatTimestamp(-5)).toBe('00:00:00');
  });
});

describe('chunkCues', () => {
  test('closes paragraphs at sentence ends once the minimum window is reached', () => {
    const sentenceEnds = new Set([25, 50, 75]);
    const cues: CaptionCue[] = [];
    for (let t = 0; t <= 95; t += 5) {
      cues.push(cue(t, `Line ${t}${sentenceEnds.has(t) ? '.' : ''}`));
    }

    const chunks = chunkCues(cues);

    expect(chunks.map(chunk => chunk.startLabel)).toEqual([
      '00:00:00',
      '00:00:30',
      '00:00:55',
      '00:01:20',
    ]);
    expect(chunks[0]?.text).toBe('Line 0 Line 5 Line 10 Line 15 Line 20 Line 25.');
    expect(chunks[3]?.text).toBe('Line 80 Line 85 Line 90 Line 95');
  });

  test('ignores sentence ends before the minimum window', () => {
    const chunks = chunkCues([cue(0, 'Hi.'), cue(5, 'There.'), cue(21, 'Done.'), cue(25, 'Next')]);
    expect(chunks.map(chunk => chunk.text)).toEqual(['Hi. There. Done.', 'Next']);
  });

  test('closes at the maximum window without a sentence end', () => {
    const cues = [0, 10, 20, 30, 40, 50].map(t => cue(t, `word${t}`));
    expect(chunkCues(cues).map(chunk => chunk.startSeconds)).toEqual([0, 50]);
  });

  test('starts a new paragraph across a long gap', () => {
    const chunks = chunkCues([cue(0, 'a'), cue(10, 'b'), cue(55, 'c')]);
    expect(chunks).toEqual([
      { startLabel: '00:00:00', startSeconds: 0, text: 'a b' },
      { startLabel: '00:00:55', startSeconds: 55, text: 'c' },
    ]);
  });

  test('keeps repeated cue text once', () => {
    expect(chunkCues([cue(0, 'same'), cue(2, ' same '), cue(4, 'new')])).toEqual([
      { startLabel: '00:00:00', startSeconds: 0, text: 'same new' },
    ]);
  });

  test('renders labelled paragraphs separated by blank lines', () => {
    expect(cuesToTranscript([cue(0, 'a'), cue(45, 'b')])).toBe('[00:00:00] a\n\n[00:00:45] b');
    expect(cuesToTranscript([])).toBe('');
  });
});

describe('parseTimedCaptionDocument', () => {
  test('reads WebVTT cues and cleans markup', () => {
    const vtt = [
      'WEBVTT',
      'Kind: captions',
      'Language: en',
      '',
      '00:00:01.000 --> 00:00:04.000 align:start position:0%',
      'Hello &amp; <c>welcome</c>',
      '',
      '00:01:02.500 --> 00:01:05.000',
      '- Second line',
    ].join('\n');

    expect(parseTimedCaptionDocument(vtt)).toEqual([
      cue(1, 'Hello & welcome'),
      cue(62, 'Second line'),
    ]);
  });

  test('reads SRT cues and skips sequence numbers', () => {
    const srt = '1\r\n00:00:03,000 --> 00:00:05,000\r\nFirst\r\n\r\n2\r\n01:00:00,000 --> 01:00:02,000\r\nLater\r\n';
    expect(parseTimedCaptionDocument(srt)).toEqual([cue(3, 'First'), cue(3600, 'Later')]);
  });

  test('cleanCaptionText strips speaker markers', () => {
    expect(cleanCaptionText('>> <i>Welcome</i> back')).toBe('Welcome back');
  });
});
