import { CAPTION_WINDOW } from '../../config/constants';
import { decodeHtmlEntities } from '../content/extractors/markup';
import type { CaptionChunk, CaptionCue } from './types';

export interface ChunkWindow {
  minSeconds: number;
  maxSeconds: number;
}

const DEFAULT_WINDOW: ChunkWindow = {
  minSeconds: CAPTION_WINDOW.MIN_SECONDS,
  maxSeconds: CAPTION_WINDOW.MAX_SECONDS,
};

const TIMING_LINE = /((?:\d{1,2}:)?\d{1,2}:\d{2})(?:[.,]\d{1,3})?\s*-->/;
const SEQUENCE_NUMBER = /^\d+$/;
const SENTENCE_END = /[.?!]$/;

/** `HH:MM:SS`, `MM:SS` and their fractional forms, truncated to whole seconds. Null if unreadable. */
export function tryParseTimestamp(value: string): number | null {
  const [clock = ''] = value.trim().split(/[.,]/);
  const fields = clock.split(':');
  if (fields.length < 2 || fields.length > 3 || fields.some(field => !/^\d+$/.test(field))) {
    return null;
  }
  return fields.reduce((total, field) => total * 60 + Number.parseInt(field, 10), 0);
}

export function parseTimestamp(value: string): number {
  const seconds = tryParseTimestamp(value);
  if (seconds === null) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return seconds;
}

export function formatTimestamp(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  return [h, m, s].map(part => String(part).padStart(2, '0')).join(':');
}

export function cleanCaptionText(line: string): string {
  const withoutTags = line.replace(/<[^>]+>/g, '');
  return decodeHtmlEntities(withoutTags)
    .replace(/^[>\s-]+/, '')
    .trim();
}

/**
 * Reads a WebVTT or SRT document into cues. Every text line becomes a cue at the start
 * time of the timing line above it; header lines before the first timing line are skipped.
 */
export function parseTimedCaptionDocument(document: string): CaptionCue[] {
  const cues: CaptionCue[] = [];
  let currentStart: number | null = null;

  for (const rawLine of document.split(/\r?\n/)) {
    const line = rawLine.trim();
    const timing = TIMING_LINE.exec(line);
    if (timing?.[1]) {
      currentStart = parseTimestamp(timing[1]);
      continue;
    }
    if (currentStart === null || !line || SEQUENCE_NUMBER.test(line)) continue;

    const text = cleanCaptionText(line);
    if (text) cues.push({ startSeconds: currentStart, text });
  }

  return cues;
}

/**
 * Groups cues into paragraphs of 20 to 40 seconds. A paragraph closes at the first
 * sentence end once it spans the minimum, and always at the maximum. A cue that would
 * stretch the open paragraph past the maximum starts a new one. Repeated cue text
 * (rolling auto-captions) is kept once.
 */
export function chunkCues(cues: readonly CaptionCue[], window: ChunkWindow = DEFAULT_WINDOW): CaptionChunk[] {
  const chunks: CaptionChunk[] = [];
  const seen = new Set<string>();
  let open: { start: number; texts: string[] } | null = null;

  const close = (): void => {
    if (open && open.texts.length > 0) {
      chunks.push({
        startLabel: formatTimestamp(open.start),
        startSeconds: open.start,
        text: open.texts.join(' '),
      });
    }
    open = null;
  };

  for (const cue of cues) {
    const text = cue.text.trim();
    if (!text || seen.has(text)) continue;
    seen.add(text);

    if (open !== null && cue.startSeconds - open.start > window.maxSeconds) {
      close();
    }
    if (open === null) {
      open = { start: cue.startSeconds, texts: [] };
    }
    open.texts.push(text);

    const span = cue.startSeconds - open.start;
    if ((span >= window.minSeconds && SENTENCE_END.test(text)) || span >= window.maxSeconds) {
      close();
    }
  }
  close();

  return chunks;
}

export function renderChunks(chunks: readonly CaptionChunk[]): string {
  return chunks.map(chunk => `[${chunk.startLabel}] ${chunk.text}`).join('\n\n');
}

/** Cues to the transcript body in one step. */
export function cuesToTranscript(cues: readonly CaptionCue[], window?: ChunkWindow): string {
  return renderChunks(chunkCues(cues, window));
}
