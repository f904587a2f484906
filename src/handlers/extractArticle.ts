import type { ExtractionResult } from '../core/content/types/extraction';
import { classifyUrl } from '../core/classify/urlClassifier';
import { extractEditorBlogPost } from '../core/content/editorBlogExtractor';
import { extractGenericArticle } from '../core/content/articleExtractor';
import { createChildLogger } from '../utils/logger';
import { resolveDeps, resolvePlatforms, type ExtractOptions } from './options';

/**
 * Extracts a web article or blog post. Throws only `ClassificationError` for input that
 * is not an http(s) URL; every other failure comes back as a result with an explanatory body.
 */
export async function extractArticle(url: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
  const classification = classifyUrl(url, resolvePlatforms(options));
  const deps = resolveDeps(options);
  const logger = createChildLogger(deps.correlationId);

  logger.info(
    { event: 'extract_article', url: classification.url, kind: classification.kind },
    'Extracting article'
  );

  if (classification.kind === 'editor-blog') {
    return extractEditorBlogPost(classification.url, classification.platform, deps);
  }
  return extractGenericArticle(classification.url, deps);
}
