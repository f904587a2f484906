import { existsSync, promises as fs } from 'fs';
import { resolve } from 'path';
import { hostMatches } from '../classify/platforms';

export const DEFAULT_COOKIE_FILE = 'cookies.txt';

const HTTP_ONLY_PREFIX = '#HttpOnly_';

/**
 * Explicit path first, then `cookies.txt` in the working directory when present.
 */
export function resolveCookieFile(explicit?: string, cwd: string = process.cwd()): string | undefined {
  if (explicit) return resolve(cwd, explicit);
  const fallback = resolve(cwd, DEFAULT_COOKIE_FILE);
  return existsSync(fallback) ? fallback : undefined;
}

/**
 * `Cookie` header value for `host` from a Netscape-format cookie jar. Expired cookies
 * are skipped; a zero expiry is a session cookie and kept.
 */
export function buildCookieHeader(
  jar: string,
  host = 'www.youtube.com',
  nowSeconds: number = Math.floor(Date.now() / 1000)
): string {
  const pairs: string[] = [];

  for (const rawLine of jar.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line.startsWith(HTTP_ONLY_PREFIX)) line = line.slice(HTTP_ONLY_PREFIX.length);
    else if (!line || line.startsWith('#')) continue;

    const fields = line.split('\t');
    if (fields.length < 7) continue;

    const [domain = '', , , , expires = '0', name = '', value = ''] = fields;
    const expiry = Number.parseInt(expires, 10);
    if (expiry > 0 && expiry < nowSeconds) continue;
    if (!name || !hostMatches(host, domain.replace(/^\./, '').toLowerCase())) continue;

    pairs.push(`${name}=${value}`);
  }

  return pairs.join('; ');
}

export async function readCookieHeader(cookieFile: string, host?: string): Promise<string> {
  const jar = await fs.readFile(cookieFile, 'utf8');
  return buildCookieHeader(jar, host);
}
