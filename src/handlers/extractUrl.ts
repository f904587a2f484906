import type { ExtractionRequest, ExtractionResult } from '../core/content/types/extraction';
import { classifyUrl } from '../core/classify/urlClassifier';
import { extractArticle } from './extractArticle';
import { extractVideo } from './extractVideo';
import { resolvePlatforms, type ExtractOptions } from './options';

/**
 * Routes a URL to the video or article path by its classification. A request object
 * carries its own image resolver, which takes precedence over `options.imageResolver`.
 */
export async function extractUrl(
  request: string | ExtractionRequest,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const url = typeof request === 'string' ? request : request.url;
  const resolved: ExtractOptions =
    typeof request === 'string' ? options : { ...options, imageResolver: request.imageResolver };

  const classification = classifyUrl(url, resolvePlatforms(resolved));
  if (classification.kind === 'video') {
    return extractVideo(classification.url, resolved);
  }
  return extractArticle(classification.url, resolved);
}
