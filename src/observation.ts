import { errorMessage } from './util';

export interface ObservationError {
  /** Constructor name of the raised error, e.g. "TypeError". */
  type: string;
  message: string;
  cause: unknown;
}

interface SuccessfulObservation<V> {
  name: string;
  value: V;
  durationNanos: number;
  error?: undefined;
}

interface FailedObservation {
  name: string;
  value?: undefined;
  durationNanos: number;
  error: ObservationError;
}

/** The outcome of one execution: a value, or the error the behaviour raised. */
export type Observation<V> = SuccessfulObservation<V> | FailedObservation;

export function toObservationError(error: unknown): ObservationError {
  return {
    type: error instanceof Error ? error.constructor.name : typeof error,
    message: errorMessage(error),
    cause: error,
  };
}

function elapsedNanos(start: bigint): number {
  return Number(process.hrtime.bigint() - start);
}

export function observe<T>(name: string, behavior: () => T): Observation<T> {
  const start = process.hrtime.bigint();
  try {
    const value = behavior();
    return { name, value, durationNanos: elapsedNanos(start) };
  } catch (error) {
    return { name, durationNanos: elapsedNanos(start), error: toObservationError(error) };
  }
}

export async function observeAsync<T>(
  name: string,
  behavior: () => Promise<T>,
): Promise<Observation<T>> {
  const start = process.hrtime.bigint();
  try {
    const value = await behavior();
    return { name, value, durationNanos: elapsedNanos(start) };
  } catch (error) {
    return { name, durationNanos: elapsedNanos(start), error: toObservationError(error) };
  }
}

/**
 * Returns the observed value, or rethrows the original error unchanged.
 */
export function unwrap<T>(observation: Observation<T>): T {
  if (observation.error !== undefined) {
    throw observation.error.cause;
  }
  return observation.value;
}
