import { z } from 'zod';
import envPaths from 'env-paths';
import { join } from 'path';
import fs from 'fs';
import { APP_NAME } from './constants';
import { ConfigurationError } from '../core/errors';

const languageList = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(lang => lang.trim())
      .filter(lang => lang.length > 0)
  )
  .pipe(z.array(z.string()).min(1, 'At least one caption language is required'));

const EnvironmentSchema = z.object({
  // Network
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  BROWSER_NAV_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  // Captions
  CAPTION_LANGUAGES: languageList.default('ko,en'),
  YOUTUBE_COOKIES_PATH: z.string().min(1).optional(),
  YT_DLP_PATH: z.string().min(1).default('yt-dlp'),

  // Image storage for the default resolver
  ASSETS_DIR: z.string().optional(),

  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);

    // Set ASSETS_DIR default using env-paths if not provided
    if (!env.ASSETS_DIR) {
      const paths = envPaths(APP_NAME);
      env.ASSETS_DIR = join(paths.data, 'assets');
    }

    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

// Check if running in Docker container
export function isRunningInDocker(): boolean {
  try {
    fs.accessSync('/.dockerenv');
    return true;
  } catch {
    // Not a Docker container by marker file
  }

  if (process.env.DOCKER_CONTAINER) {
    return true;
  }

  try {
    const cgroup = fs.readFileSync('/proc/1/cgroup', 'utf8');
    return cgroup.includes('docker') || cgroup.includes('containerd');
  } catch {
    // Not on Linux or /proc not available
  }

  return false;
}

export function validateEnvironment(): void {
  getEnvironment(); // This will throw if validation fails
}

export function getAssetsDirectory(): string {
  const { ASSETS_DIR } = getEnvironment();
  return ASSETS_DIR ?? join(envPaths(APP_NAME).data, 'assets');
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
