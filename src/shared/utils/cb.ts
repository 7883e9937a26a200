import CircuitBreaker from 'opossum';
import { logger } from '../../config/logger';

/**
 * Wraps `fn` in a breaker that logs its state changes under `name`.
 */
export function createCircuitBreaker<Args extends unknown[], ReturnType>(
  name: string,
  fn: (...args: Args) => Promise<ReturnType>,
  options: CircuitBreaker.Options,
): CircuitBreaker<Args, ReturnType> {
  const breaker = new CircuitBreaker(fn, options);

  breaker.on('open', () => logger.warn({ breaker: name }, 'Circuit Breaker: OPEN'));
  breaker.on('halfOpen', () =>
    logger.info({ breaker: name }, 'Circuit Breaker: HALF-OPEN'),
  );
  breaker.on('close', () => logger.info({ breaker: name }, 'Circuit Breaker: CLOSED'));

  return breaker;
}
