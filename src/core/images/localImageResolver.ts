import { promises as fs } from 'fs';
import { basename, extname, join } from 'path';
import { fetchBuffer, type BinaryFetchResult, type FetchOptions } from '../content/httpContentFetcher';
import { DEFAULT_SIZE_REWRITES, type SizeRewriteRule } from '../classify/platforms';
import { rewriteSizeParameters, type ImageResolver } from './imageResolver';
import { sanitizeFilename } from '../../utils/filename';
import { sha256Hex } from '../../utils/contentHash';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { errorMessage } from '../errors';

type BufferFetcher = (url: string, options?: FetchOptions) => Promise<BinaryFetchResult>;

export interface LocalImageResolverOptions {
  assetsDir: string;
  sizeRewrites?: readonly SizeRewriteRule[];
  fetchImage?: BufferFetcher;
  correlationId?: string;
}

const KNOWN_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif', '.webp', '.svg', '.avif', '.bmp']);

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/svg+xml': '.svg',
  'image/avif': '.avif',
  'image/bmp': '.bmp',
};

export function imageExtension(url: string, contentType?: string): string {
  try {
    const ext = extname(new URL(url).pathname).toLowerCase();
    if (KNOWN_EXTENSIONS.has(ext)) return ext;
  } catch {
    // fall through to the content type
  }
  const mime = contentType?.split(';')[0]?.trim().toLowerCase();
  return (mime && CONTENT_TYPE_EXTENSIONS[mime]) || '.jpg';
}

async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Downloads images into an assets directory and answers with a path relative to the
 * directory's parent (`assets/<name>.jpg`), so a document written beside the assets
 * directory links them directly. Any failure answers `null`.
 */
export class LocalImageResolver implements ImageResolver {
  private readonly assetsDir: string;
  private readonly sizeRewrites: readonly SizeRewriteRule[];
  private readonly fetchImage: BufferFetcher;
  private readonly correlationId: string;

  constructor(options: LocalImageResolverOptions) {
    this.assetsDir = options.assetsDir;
    this.sizeRewrites = options.sizeRewrites ?? DEFAULT_SIZE_REWRITES;
    this.fetchImage = options.fetchImage ?? fetchBuffer;
    this.correlationId = options.correlationId ?? generateCorrelationId();
  }

  async resolve(absoluteUrl: string, baseName: string): Promise<string | null> {
    const log = createChildLogger(this.correlationId);
    const downloadUrl = rewriteSizeParameters(absoluteUrl, this.sizeRewrites);

    try {
      const response = await this.fetchImage(downloadUrl, { correlationId: this.correlationId });
      if (response.body.length === 0) {
        log.warn({ event: 'image_empty', url: downloadUrl }, 'Image download returned no bytes');
        return null;
      }

      await fs.mkdir(this.assetsDir, { recursive: true });

      const stem = sanitizeFilename(baseName) || sha256Hex(absoluteUrl).slice(0, 8);
      const ext = imageExtension(downloadUrl, response.contentType);
      const fileName = await this.availableName(stem, ext);

      await fs.writeFile(join(this.assetsDir, fileName), response.body);
      log.debug(
        { event: 'image_saved', url: downloadUrl, fileName, bytes: response.body.length },
        'Image stored'
      );

      return `${basename(this.assetsDir)}/${fileName}`;
    } catch (error) {
      log.warn(
        { event: 'image_download_failed', url: downloadUrl, error: errorMessage(error) },
        'Image download failed'
      );
      return null;
    }
  }

  private async availableName(stem: string, ext: string): Promise<string> {
    let candidate = `${stem}${ext}`;
    let counter = 1;
    while (await exists(join(this.assetsDir, candidate))) {
      candidate = `${stem}_${counter}${ext}`;
      counter += 1;
    }
    return candidate;
  }
}
