#!/usr/bin/env node

import { parseArgs } from 'util';
import { APP_NAME, APP_VERSION } from './config/constants';
import { getAssetsDirectory, getEnvironment } from './config/environment';
import { logger } from './utils/logger';
import { extractUrl } from './handlers/extractUrl';
import { LocalImageResolver } from './core/images/localImageResolver';
import { remoteImageResolver, type ImageResolver } from './core/images/imageResolver';
import { createCaptionConfig } from './core/captions/captionPipeline';
import { ClassificationError, errorMessage, toClipperError } from './core/errors';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Extracts the readable content of a web article, blog post or video transcript.

Usage: page-clipper <url> [options]
       page-clipper health

Commands:
  <url>          Extract the page and print its body (default)
  health         Check configuration and external tools
  version        Show version information
  help           Show this help message

Options:
  --json             Print the full extraction result as JSON
  --assets <dir>     Download images into <dir> (default: ASSETS_DIR)
  --no-images        Keep images on their remote URLs
  --help, -h         Show help
  --version          Show version

Examples:
  page-clipper https://blog.naver.com/someone/223000000000
  page-clipper "https://www.youtube.com/watch?v=abcdefghijk" --json
  page-clipper https://example.com/post --assets ./assets
`;

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleIo: CliIo = {
  out: text => console.log(text),
  err: text => console.error(text),
};

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean' },
      json: { type: 'boolean' },
      assets: { type: 'string' },
      'no-images': { type: 'boolean' },
    },
    allowPositionals: true,
  });
}

function healthCheck(io: CliIo): number {
  io.out('🔍 Health Check:');
  try {
    const env = getEnvironment();
    io.out('  ✅ Environment variables validated');
    io.out(`  📂 Assets directory: ${getAssetsDirectory()}`);
    const captions = createCaptionConfig();
    io.out(`  🗣️  Caption languages: ${captions.languages.join(', ')}`);
    io.out(`  🍪 Cookie file: ${captions.cookieFile ?? 'none'}`);
    io.out(`  ⬇️  Subtitle downloader: ${env.YT_DLP_PATH}`);
    io.out('🚀 Ready');
    return 0;
  } catch (error) {
    io.err(`❌ Health check failed: ${errorMessage(error)}`);
    return 1;
  }
}

/** Runs the command line; resolves to the process exit code. */
export async function runCli(argv: string[], io: CliIo = consoleIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Invalid command line arguments');
    io.err('Error parsing arguments. Use --help for usage information.');
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    io.out(HELP_TEXT);
    return 0;
  }
  if (values.version) {
    io.out(`${APP_NAME} v${APP_VERSION}`);
    return 0;
  }

  const target = positionals[0];
  switch (target) {
    case undefined:
    case 'help':
      io.out(HELP_TEXT);
      return target === undefined ? 1 : 0;
    case 'version':
      io.out(`${APP_NAME} v${APP_VERSION}`);
      return 0;
    case 'health':
      return healthCheck(io);
    default:
      break;
  }

  const imageResolver: ImageResolver = values['no-images']
    ? remoteImageResolver
    : new LocalImageResolver({ assetsDir: values.assets ?? getAssetsDirectory() });

  try {
    const result = await extractUrl(target, { imageResolver });
    io.out(values.json ? JSON.stringify(result, null, 2) : `# ${result.title}\n\n${result.body}`);
    return result.extractionMethod === 'failed' ? 2 : 0;
  } catch (error) {
    if (error instanceof ClassificationError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      const failure = toClipperError(error, 'page-clipper');
      logger.error({ code: failure.code, error: failure.message }, 'CLI execution failed');
      console.error(`Fatal error: ${failure.message}`);
      process.exitCode = 1;
    });
}
