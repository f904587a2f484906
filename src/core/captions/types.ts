import type pino from 'pino';

export interface CaptionCue {
  /** Whole seconds from the start of the video. */
  startSeconds: number;
  text: string;
}

export interface CaptionChunk {
  /** `HH:MM:SS` */
  startLabel: string;
  startSeconds: number;
  text: string;
}

export type CaptionSource = 'captions-api' | 'downloader' | 'browser';

export interface CaptionTrackResult {
  source: CaptionSource;
  cues: CaptionCue[];
  language?: string;
  /** Page metadata some tiers see along the way. */
  title?: string;
  channel?: string;
}

/** Built once per pipeline; every tier reads the same values. */
export interface CaptionConfig {
  languages: readonly string[];
  timeoutMs: number;
  navigationTimeoutMs: number;
  cookieFile?: string;
  ytDlpPath: string;
}

export interface CaptionTier {
  readonly name: CaptionSource;
  fetch(videoId: string, config: CaptionConfig, logger: pino.Logger): Promise<CaptionTrackResult>;
}
