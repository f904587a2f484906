import type pino from 'pino';
import { getEnvironment, isRunningInDocker } from '../config/environment';
const STDERR_DESTINATION = 2;

export function getTransport(): pino.TransportSingleOptions {
  const env = getEnvironment();
  const isDevelopment = env.NODE_ENV === 'development';
  let pinoPrettyResolved: boolean;
  try {
    // Only use pino-pretty in development when it's actually installed
    require.resolve('pino-pretty');
    pinoPrettyResolved = true;
  } catch {
    pinoPrettyResolved = false;
  }

  if (pinoPrettyResolved && isDevelopment && !isRunningInDocker()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION, // stdout carries the CLI output
      },
    };
  }
  return { target: 'pino/file', options: { destination: STDERR_DESTINATION } };
}
