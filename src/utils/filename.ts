const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Turns a document title into a file-system safe base name.
 * Bracketed tags such as `[NOTICE]` are dropped and spaces become underscores.
 */
export function sanitizeFilename(title: string, maxLength = 150): string {
  const sanitized = title
    .replace(/\[.*?\]/g, '')
    .trim()
    .replace(INVALID_FILENAME_CHARS, '_')
    .replace(/ /g, '_');

  return sanitized.length > maxLength ? sanitized.slice(0, maxLength) : sanitized;
}
