import { z } from 'zod';

const CaptionTrackSchema = z.object({
  baseUrl: z.string(),
  languageCode: z.string().default(''),
  /** `asr` marks automatic speech recognition tracks. */
  kind: z.string().optional(),
});

const PlayerResponseSchema = z.object({
  videoDetails: z
    .object({
      videoId: z.string().optional(),
      title: z.string().optional(),
      author: z.string().optional(),
      shortDescription: z.string().optional(),
    })
    .optional(),
  microformat: z
    .object({
      playerMicroformatRenderer: z
        .object({
          uploadDate: z.string().optional(),
          publishDate: z.string().optional(),
          ownerChannelName: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
  captions: z
    .object({
      playerCaptionsTracklistRenderer: z
        .object({ captionTracks: z.array(CaptionTrackSchema).optional() })
        .optional(),
    })
    .optional(),
});

export type CaptionTrack = z.infer<typeof CaptionTrackSchema>;
export type PlayerResponse = z.infer<typeof PlayerResponseSchema>;

const MARKER = /ytInitialPlayerResponse\s*=\s*\{/;

/** Index just past the brace that closes the object opening at `start`, or -1. */
function matchingBraceEnd(source: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/** Reads the player response object embedded in a watch page, or null when absent or malformed. */
export function extractPlayerResponse(html: string): PlayerResponse | null {
  const match = MARKER.exec(html);
  if (!match) return null;

  const jsonStart = match.index + match[0].length - 1;
  const end = matchingBraceEnd(html, jsonStart);
  if (end === -1) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(html.slice(jsonStart, end));
  } catch {
    return null;
  }

  const parsed = PlayerResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function captionTracks(player: PlayerResponse): CaptionTrack[] {
  return player.captions?.playerCaptionsTracklistRenderer?.captionTracks ?? [];
}

function languageMatches(track: CaptionTrack, language: string): boolean {
  const code = track.languageCode.toLowerCase();
  const wanted = language.toLowerCase();
  return code === wanted || code.startsWith(`${wanted}-`);
}

/**
 * Picks the track for the first preferred language that has one. Within a language a
 * manually authored track beats an automatic one.
 */
export function pickCaptionTrack(
  tracks: readonly CaptionTrack[],
  languages: readonly string[]
): CaptionTrack | null {
  for (const language of languages) {
    const candidates = tracks.filter(track => languageMatches(track, language));
    const manual = candidates.find(track => track.kind !== 'asr');
    const chosen = manual ?? candidates[0];
    if (chosen) return chosen;
  }
  return null;
}
