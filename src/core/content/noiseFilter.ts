import { lineHash } from '../../utils/contentHash';
import { NOISE_FILTER_DEFAULTS } from '../../config/constants';
import { DEFAULT_BOILERPLATE_PATTERNS } from '../classify/platforms';

export interface NoiseFilterOptions {
  /** Host of the page; bare domain lines for it are dropped. */
  siteHost?: string;
  boilerplatePatterns?: readonly RegExp[];
  nearDuplicateThreshold?: number;
  nearDuplicateWindow?: number;
  nearDuplicateMinLength?: number;
}

const PIPE_ONLY_ROW = /^\|[\s|]*$/;

// Image and HTML lines differ mostly in URLs, which share a character set.
const MARKUP_LINE = /^(!\[|<)/;

/** Jaccard similarity of the two lines' character sets, whitespace ignored. */
export function jaccardSimilarity(a: string, b: string): number {
  const setA = new Set(a.replace(/\s+/g, ''));
  const setB = new Set(b.replace(/\s+/g, ''));
  if (setA.size === 0 && setB.size === 0) return 1;

  let intersection = 0;
  for (const ch of setA) {
    if (setB.has(ch)) intersection += 1;
  }
  const union = setA.size + setB.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

function collapseBlankRuns(lines: string[]): string[] {
  const out: string[] = [];
  for (const line of lines) {
    if (line === '' && out.length > 0 && out[out.length - 1] === '') continue;
    out.push(line);
  }
  return out;
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start] === '') start += 1;
  while (end > start && lines[end - 1] === '') end -= 1;
  return lines.slice(start, end);
}

function isSiteDomainLine(trimmed: string, siteHost: string | undefined): boolean {
  if (!siteHost || trimmed.length >= NOISE_FILTER_DEFAULTS.SITE_DOMAIN_LINE_MAX_LENGTH) {
    return false;
  }
  const lower = trimmed.toLowerCase();
  const host = siteHost.toLowerCase();
  return lower.includes(host) && (lower.endsWith(host) || lower.includes('...'));
}

/**
 * Line-level cleanup shared by every extraction path. Running it on its own output
 * returns that output unchanged.
 */
export function filterNoiseLines(
  input: readonly string[],
  options: NoiseFilterOptions = {}
): string[] {
  const patterns = options.boilerplatePatterns ?? DEFAULT_BOILERPLATE_PATTERNS;
  const threshold = options.nearDuplicateThreshold ?? NOISE_FILTER_DEFAULTS.NEAR_DUPLICATE_THRESHOLD;
  const windowSize = options.nearDuplicateWindow ?? NOISE_FILTER_DEFAULTS.NEAR_DUPLICATE_WINDOW;
  const minLength = options.nearDuplicateMinLength ?? NOISE_FILTER_DEFAULTS.NEAR_DUPLICATE_MIN_LENGTH;

  const normalized = input.map(line => {
    const trimmedEnd = line.trimEnd();
    return trimmedEnd.trim() === '' ? '' : trimmedEnd;
  });

  let lines = collapseBlankRuns(normalized);

  const seen = new Set<string>();
  lines = lines.filter(line => {
    if (line === '') return true;
    const hash = lineHash(line);
    if (seen.has(hash)) return false;
    seen.add(hash);
    return true;
  });

  lines = lines.filter(line => {
    if (line === '') return true;
    const trimmed = line.trim();
    if (PIPE_ONLY_ROW.test(trimmed)) return false;
    if (isSiteDomainLine(trimmed, options.siteHost)) return false;
    return !patterns.some(pattern => pattern.test(trimmed));
  });

  const consecutive: string[] = [];
  let previousText: string | null = null;
  for (const line of lines) {
    if (line === '') {
      if (consecutive.length > 0 && consecutive[consecutive.length - 1] === '') continue;
      consecutive.push(line);
      continue;
    }
    const trimmed = line.trim();
    if (trimmed === previousText) continue;
    previousText = trimmed;
    consecutive.push(line);
  }

  const kept: string[] = [];
  const recent: string[] = [];
  for (const line of consecutive) {
    if (line === '') {
      kept.push(line);
      continue;
    }
    const trimmed = line.trim();
    if (
      trimmed.length > minLength &&
      !MARKUP_LINE.test(trimmed) &&
      recent.some(previous => jaccardSimilarity(trimmed, previous) > threshold)
    ) {
      continue;
    }
    kept.push(line);
    recent.push(trimmed);
    if (recent.length > windowSize) recent.shift();
  }

  return trimBlankEdges(collapseBlankRuns(kept));
}

export function cleanExtractedText(text: string, options: NoiseFilterOptions = {}): string {
  return filterNoiseLines(text.split(/\r?\n/), options).join('\n');
}
