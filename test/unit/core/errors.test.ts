import { describe, test, expect } from '@jest/globals';
import {
  ClassificationError,
  ClipperError,
  ContentNotFoundError,
  InsufficientContentError,
  NetworkError,
  NoCaptionsAvailableError,
  ResourceFetchError,
  TimeoutError,
  errorMessage,
  toClipperError,
} from '../../../src/core/errors';

describe('errors', () => {
  test('ClassificationError names the offending URL', () => {
    const error = new ClassificationError('not a valid URL', 'nope');
    expect(error.message).toBe('Classification error: not a valid URL (url: nope)');
    expect(error.code).toBe('CLASSIFICATION');
    expect(error.name).toBe('ClassificationError');
    expect(error).toBeInstanceOf(ClipperError);
  });

  test('ContentNotFoundError appends the URL when given', () => {
    expect(new ContentNotFoundError('no editor container', 'https://example.com/a').message).toBe(
      'Content not found: no editor container for URL: https://example.com/a'
    );
    expect(new ContentNotFoundError('empty').message).toBe('Content not found: empty');
  });

  test('InsufficientContentError reports length and minimum', () => {
    expect(new InsufficientContentError(50, 100).message).toBe(
      'Insufficient content: extracted 50 characters, at least 100 required'
    );
  });

  test('NoCaptionsAvailableError lists the tiers tried', () => {
    const error = new NoCaptionsAvailableError('abcdefghijk', ['captions-api', 'downloader']);
    expect(error.message).toBe(
      'No captions available for video abcdefghijk (tried: captions-api, downloader)'
    );
    expect(error.code).toBe('NO_CAPTIONS');
  });

  test('fetch errors share the ResourceFetchError base', () => {
    const timeout = new TimeoutError('Request timed out', 500);
    const network = new NetworkError('HTTP error', 503);

    expect(timeout.message).toBe('Request timed out (timeout: 500ms)');
    expect(timeout.code).toBe('TIMEOUT');
    expect(timeout).toBeInstanceOf(ResourceFetchError);
    expect(network.message).toBe('Network error: HTTP error (status: 503)');
    expect(network.statusCode).toBe(503);
    expect(network).toBeInstanceOf(ResourceFetchError);
  });

  test('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('boom')).toBe('Unknown error');
  });

  test('toClipperError keeps clipper errors and wraps the rest', () => {
    const original = new ContentNotFoundError('x');
    expect(toClipperError(original)).toBe(original);

    const wrapped = toClipperError(new Error('boom'), 'extract');
    expect(wrapped.code).toBe('INTERNAL');
    expect(wrapped.message).toBe('extract: boom');
    expect(toClipperError(42).message).toBe('Unknown error occurred');
  });
});
