import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'page-clipper';
export const APP_VERSION = PACKAGE_VERSION;

// Pages and media hosts serve reduced markup to unknown agents, so a desktop browser is announced.
export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const MAX_REDIRECTIONS = 3;

export const ARTICLE_THRESHOLDS = {
  MIN_PRIMARY_LENGTH: 100,
  READABILITY_CHAR_THRESHOLD: 100,
  MIN_FALLBACK_BLOCK_LENGTH: 3,
  MIN_RAW_BLOCK_LENGTH: 10,
} as const;

export const NOISE_FILTER_DEFAULTS = {
  NEAR_DUPLICATE_THRESHOLD: 0.9,
  NEAR_DUPLICATE_WINDOW: 5,
  NEAR_DUPLICATE_MIN_LENGTH: 20,
  SITE_DOMAIN_LINE_MAX_LENGTH: 100,
} as const;

export const CAPTION_WINDOW = {
  MIN_SECONDS: 20,
  MAX_SECONDS: 40,
} as const;

export const VIDEO_DESCRIPTION_MAX_LENGTH = 500;

export const UNTITLED = 'Untitled';
export const UNKNOWN_CHANNEL = 'Unknown';
