import pino from 'pino';
import { getEnvironment } from '../config/environment';
import { APP_NAME } from '../config/constants';
import { getTransport } from './getTransport';

// Sensitive keys to redact from logs
const SENSITIVE_KEYS = ['cookie', 'cookies', 'cookieHeader', 'password', 'token', 'secret', 'authorization'];

function createRedactor(): (obj: Record<string, unknown>) => Record<string, unknown> {
  return (obj: Record<string, unknown>) => {
    const redacted = { ...obj };

    Object.keys(redacted).forEach(key => {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive.toLowerCase()))) {
        redacted[key] = '[REDACTED]';
      }
    });

    return redacted;
  };
}

function createLogger(): pino.Logger {
  const env = getEnvironment();

  if (env.NODE_ENV === 'test') {
    return pino({ name: APP_NAME, level: 'silent' });
  }

  return pino({
    name: APP_NAME,
    level: env.NODE_ENV === 'development' ? 'debug' : 'info',
    transport: getTransport(),
    redact: {
      paths: SENSITIVE_KEYS,
      censor: '[REDACTED]',
    },
    formatters: {
      log: createRedactor(),
    },
  });
}

let cachedLogger: pino.Logger | null = null;
export function getLogger(): pino.Logger {
  if (!cachedLogger) cachedLogger = createLogger();
  return cachedLogger;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMethod = (objOrMsg: object | string, msg?: string) => void;

function forward(level: LogLevel): LogMethod {
  return (objOrMsg, msg) => {
    const log = getLogger();
    if (typeof objOrMsg === 'string') {
      log[level](objOrMsg);
    } else {
      log[level](objOrMsg, msg);
    }
  };
}

// Resolves the root logger lazily so importing modules never reads the environment early
export const logger: Record<LogLevel, LogMethod> = {
  debug: forward('debug'),
  info: forward('info'),
  warn: forward('warn'),
  error: forward('error'),
};

// Helper function to create child loggers with correlation IDs
export function createChildLogger(correlationId: string): pino.Logger {
  return getLogger().child({ correlationId });
}

// Helper function to generate correlation IDs
export function generateCorrelationId(): string {
  return `clip-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

export async function withTiming<T>(
  log: pino.Logger,
  event: string,
  fn: () => Promise<T>,
  fields?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.info({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.error({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}
