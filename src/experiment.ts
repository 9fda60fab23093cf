import { logger, loggerPrefix } from './application-logger';
import { Comparator, ComparisonResult, defaultComparator } from './comparison-result';
import { CONTROL_NAME } from './constants';
import { Observation, observe, observeAsync, unwrap } from './observation';
import { IResultSink, publishSafely } from './result-sink';
import { Contexts } from './types';

export interface NamedBehavior<F> {
  name: string;
  behavior: F;
}

export interface ExperimentOptions<T> {
  sink: IResultSink;
  comparator?: Comparator<T>;
  /** Applied to every observed value before it reaches the sink, e.g. to redact fields. */
  clean?: (value: T) => unknown;
  contexts?: Contexts;
}

const ABORTED = Symbol('aborted');

/**
 * Runs a control and one or more candidates, compares them and publishes the comparison.
 * The caller always gets the control's value, or the control's own error.
 */
export class Experiment<T> {
  private readonly comparator: Comparator<T>;

  constructor(
    readonly name: string,
    private readonly options: ExperimentOptions<T>,
  ) {
    this.comparator = options.comparator ?? defaultComparator;
  }

  run(control: () => T, candidates: NamedBehavior<() => T>[]): T {
    const controlObservation = observe(CONTROL_NAME, control);
    const candidateObservations = candidates.map(({ name, behavior }) => observe(name, behavior));
    this.report(controlObservation, candidateObservations);
    return unwrap(controlObservation);
  }

  /**
   * Control and candidates start together. If `signal` aborts before the candidates
   * settle they are abandoned and nothing is published.
   */
  async runAsync(
    control: () => Promise<T>,
    candidates: NamedBehavior<() => Promise<T>>[],
    signal?: AbortSignal,
  ): Promise<T> {
    const controlPromise = observeAsync(CONTROL_NAME, control);
    const candidatesPromise = signal?.aborted
      ? null
      : Promise.all(candidates.map(({ name, behavior }) => observeAsync(name, behavior)));

    const controlObservation = await controlPromise;
    const candidateObservations = candidatesPromise
      ? await unlessAborted(candidatesPromise, signal)
      : ABORTED;

    if (candidateObservations === ABORTED) {
      logger.debug(`${loggerPrefix} Abandoned candidates of ${this.name} after cancellation`);
    } else {
      this.report(controlObservation, candidateObservations);
    }
    return unwrap(controlObservation);
  }

  private report(control: Observation<T>, candidates: Observation<T>[]) {
    candidates
      .filter((candidate) => candidate.error !== undefined)
      .forEach((candidate) =>
        logger.debug(
          { experiment: this.name, candidate: candidate.name, error: candidate.error?.message },
          `${loggerPrefix} Candidate raised an error`,
        ),
      );

    let result: ComparisonResult;
    try {
      result = this.buildResult(control, candidates);
    } catch (error) {
      // a faulty comparator or clean transform must not reach the caller
      logger.error(
        { err: error, experiment: this.name },
        `${loggerPrefix} Error building comparison result`,
      );
      return;
    }
    publishSafely(this.options.sink, result);
  }

  private buildResult(control: Observation<T>, candidates: Observation<T>[]): ComparisonResult {
    return {
      experimentName: this.name,
      control: this.clean(control),
      candidates: candidates.map((candidate) => this.clean(candidate)),
      matched: candidates.every((candidate) => this.comparator(control, candidate)),
      contexts: {
        ...this.options.contexts,
        timestamp: new Date().toISOString(),
      },
    };
  }

  private clean(observation: Observation<T>): Observation<unknown> {
    const clean = this.options.clean;
    if (!clean || observation.error !== undefined) {
      return observation;
    }
    return { ...observation, value: clean(observation.value) };
  }
}

function unlessAborted<V>(promise: Promise<V>, signal?: AbortSignal): Promise<V | typeof ABORTED> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.resolve(ABORTED);
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then((value) => {
      signal.removeEventListener('abort', onAbort);
      resolve(value);
    }, reject);
  });
}
