import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { promisify } from 'util';
import type pino from 'pino';
import { ContentNotFoundError, ResourceFetchError, errorMessage } from '../errors';
import { watchUrl } from '../classify/urlClassifier';
import { parseTimedCaptionDocument } from './captionChunker';
import type { CaptionConfig, CaptionTier, CaptionTrackResult } from './types';

export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: { timeout: number }
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const defaultExec: ExecFileFn = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], { timeout: options.timeout });
  return { stdout, stderr };
};

export function buildDownloaderArgs(videoId: string, outputDir: string, config: CaptionConfig): string[] {
  const args = [
    '--skip-download',
    '--write-sub',
    '--write-auto-sub',
    '--sub-lang',
    config.languages.join(','),
    '--sub-format',
    'vtt',
    '--no-progress',
    '-o',
    join(outputDir, '%(id)s.%(ext)s'),
  ];
  if (config.cookieFile) {
    args.push('--cookies', config.cookieFile);
  }
  args.push(watchUrl(videoId));
  return args;
}

/** Subtitle file for the most preferred language, else the first one written. */
export function pickSubtitleFile(
  files: readonly string[],
  languages: readonly string[]
): { file: string; language?: string } | null {
  const subtitles = files.filter(file => file.endsWith('.vtt')).sort();
  for (const language of languages) {
    const match = subtitles.find(
      file => file.endsWith(`.${language}.vtt`) || file.includes(`.${language}-`)
    );
    if (match) return { file: match, language };
  }
  const [first] = subtitles;
  return first ? { file: first } : null;
}

/** Runs the yt-dlp command line tool into a scratch directory and reads its WebVTT output. */
export class DownloaderTier implements CaptionTier {
  readonly name = 'downloader' as const;
  private readonly exec: ExecFileFn;

  constructor(exec: ExecFileFn = defaultExec) {
    this.exec = exec;
  }

  async fetch(videoId: string, config: CaptionConfig, logger: pino.Logger): Promise<CaptionTrackResult> {
    const workDir = await fs.mkdtemp(join(tmpdir(), 'page-clipper-subs-'));

    try {
      try {
        await this.exec(config.ytDlpPath, buildDownloaderArgs(videoId, workDir, config), {
          timeout: config.navigationTimeoutMs,
        });
      } catch (error) {
        throw new ResourceFetchError(`${config.ytDlpPath} failed: ${errorMessage(error)}`);
      }

      const picked = pickSubtitleFile(await fs.readdir(workDir), config.languages);
      if (!picked) {
        throw new ContentNotFoundError('downloader wrote no subtitle file', watchUrl(videoId));
      }

      logger.debug(
        { event: 'subtitle_file_read', file: picked.file, language: picked.language },
        'Reading downloaded subtitles'
      );

      const document = await fs.readFile(join(workDir, picked.file), 'utf8');
      return {
        source: this.name,
        cues: parseTimedCaptionDocument(document),
        language: picked.language,
      };
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}
