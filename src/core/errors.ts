export type ClipperErrorCode =
  | 'CLASSIFICATION'
  | 'CONTENT_NOT_FOUND'
  | 'INSUFFICIENT_CONTENT'
  | 'NO_CAPTIONS'
  | 'RESOURCE_FETCH'
  | 'TIMEOUT'
  | 'NETWORK'
  | 'CONFIGURATION'
  | 'INTERNAL';

export class ClipperError extends Error {
  readonly code: ClipperErrorCode;

  constructor(code: ClipperErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The input is not an http(s) URL, or a video URL carries no recognizable video ID. */
export class ClassificationError extends ClipperError {
  constructor(message: string, url?: string) {
    const urlInfo = url !== undefined ? ` (url: ${url})` : '';
    super('CLASSIFICATION', `Classification error: ${message}${urlInfo}`);
  }
}

export class ContentNotFoundError extends ClipperError {
  constructor(message: string, url?: string) {
    const urlInfo = url ? ` for URL: ${url}` : '';
    super('CONTENT_NOT_FOUND', `Content not found: ${message}${urlInfo}`);
  }
}

export class InsufficientContentError extends ClipperError {
  constructor(length: number, minimum: number) {
    super(
      'INSUFFICIENT_CONTENT',
      `Insufficient content: extracted ${length} characters, at least ${minimum} required`
    );
  }
}

export class NoCaptionsAvailableError extends ClipperError {
  constructor(videoId: string, attempts: string[] = []) {
    const tried = attempts.length > 0 ? ` (tried: ${attempts.join(', ')})` : '';
    super('NO_CAPTIONS', `No captions available for video ${videoId}${tried}`);
  }
}

export class ResourceFetchError extends ClipperError {
  constructor(message: string, code: ClipperErrorCode = 'RESOURCE_FETCH') {
    super(code, message);
  }
}

export class TimeoutError extends ResourceFetchError {
  constructor(message: string, timeoutMs: number) {
    super(`${message} (timeout: ${timeoutMs}ms)`, 'TIMEOUT');
  }
}

export class NetworkError extends ResourceFetchError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super(`Network error: ${message}${statusInfo}`, 'NETWORK');
    this.statusCode = statusCode;
  }
}

export class ConfigurationError extends ClipperError {
  constructor(message: string) {
    super('CONFIGURATION', `Configuration error: ${message}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function toClipperError(error: unknown, context?: string): ClipperError {
  if (error instanceof ClipperError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return new ClipperError('INTERNAL', `${prefix}${error.message}`);
  }

  return new ClipperError('INTERNAL', `${prefix}Unknown error occurred`);
}
