import type pino from 'pino';
import { errorMessage } from './errors';

/**
 * One way of producing a value. Throwing, or resolving to a value that
 * `isEmpty` rejects, counts as a failure and hands over to the next strategy.
 */
export interface Strategy<T> {
  name: string;
  run: () => Promise<T>;
}

export interface StrategyFailure {
  strategy: string;
  error: string;
}

export type StrategyOutcome<T> =
  | { ok: true; value: T; strategy: string; failures: StrategyFailure[] }
  | { ok: false; failures: StrategyFailure[] };

export interface RunStrategiesOptions<T> {
  logger: pino.Logger;
  event: string;
  isEmpty?: (value: T) => boolean;
}

export async function runStrategies<T>(
  strategies: readonly Strategy<T>[],
  options: RunStrategiesOptions<T>
): Promise<StrategyOutcome<T>> {
  const { logger, event, isEmpty } = options;
  const failures: StrategyFailure[] = [];

  for (const strategy of strategies) {
    logger.debug({ event: `${event}_attempt`, strategy: strategy.name }, 'Trying strategy');

    try {
      const value = await strategy.run();

      if (isEmpty?.(value)) {
        failures.push({ strategy: strategy.name, error: 'empty result' });
        logger.info(
          { event: `${event}_empty`, strategy: strategy.name },
          'Strategy returned an empty result'
        );
        continue;
      }

      logger.info({ event: `${event}_success`, strategy: strategy.name }, 'Strategy succeeded');
      return { ok: true, value, strategy: strategy.name, failures };
    } catch (error) {
      failures.push({ strategy: strategy.name, error: errorMessage(error) });
      logger.warn(
        { event: `${event}_failed`, strategy: strategy.name, error: errorMessage(error) },
        'Strategy failed, moving on'
      );
    }
  }

  return { ok: false, failures };
}

export function describeFailures(failures: readonly StrategyFailure[]): string {
  return failures.map(failure => `${failure.strategy}: ${failure.error}`).join('; ');
}
