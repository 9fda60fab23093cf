import { logger, loggerPrefix } from './application-logger';
import { Bucketer, inBucket } from './bucketing';
import { Comparator } from './comparison-result';
import { CANDIDATE_NAME, DEFAULT_EXPERIMENT_TYPE } from './constants';
import { Experiment, NamedBehavior } from './experiment';
import { IResultSink } from './result-sink';
import { RolloutSettings } from './rollout-settings';
import { ConsoleResultSink } from './sinks/console-result-sink';
import { NoOpResultSink } from './sinks/noop-result-sink';
import { Contexts } from './types';

export interface ConditionalRunOptions<T> {
  /** Suffix of the published experiment name, e.g. "A" or "B". */
  experimentType?: string;
  context?: Contexts;
  comparator?: Comparator<T>;
  clean?: (value: T) => unknown;
}

export interface AsyncConditionalRunOptions<T> extends ConditionalRunOptions<T> {
  signal?: AbortSignal;
}

export interface ConditionalRunnerOptions {
  sink?: IResultSink;
  /** When given, comparisons are only published while publishing is enabled. */
  rolloutSettings?: RolloutSettings;
  bucketer?: Bucketer;
}

/**
 * A/B comparison where a predicate picks the control: the implementation matching the
 * condition serves the caller and the other one runs in shadow. Both always run.
 */
export class ConditionalRunner {
  private sink: IResultSink;
  private readonly rolloutSettings?: RolloutSettings;
  private readonly bucketer?: Bucketer;
  private readonly noOpSink = new NoOpResultSink();

  constructor(options: ConditionalRunnerOptions = {}) {
    this.sink = options.sink ?? new ConsoleResultSink();
    this.rolloutSettings = options.rolloutSettings;
    this.bucketer = options.bucketer;
  }

  public setSink(sink: IResultSink) {
    this.sink = sink;
  }

  public runConditional<T>(
    name: string,
    whenTrue: () => T,
    whenFalse: () => T,
    condition: boolean,
    options: ConditionalRunOptions<T> = {},
  ): T {
    const [control, candidate] = assignRoles(whenTrue, whenFalse, condition);
    return this.experiment(name, condition, options).run(control, [candidate]);
  }

  public runConditionalAsync<T>(
    name: string,
    whenTrue: () => Promise<T>,
    whenFalse: () => Promise<T>,
    condition: boolean,
    options: AsyncConditionalRunOptions<T> = {},
  ): Promise<T> {
    const [control, candidate] = assignRoles(whenTrue, whenFalse, condition);
    return this.experiment(name, condition, options).runAsync(
      control,
      [candidate],
      options.signal,
    );
  }

  /**
   * Subjects inside the percentage are served by the new implementation, with the old one
   * in shadow; everyone else the other way round.
   */
  public runRollout<T>(
    name: string,
    newImplementation: () => T,
    oldImplementation: () => T,
    percentage: number,
    subjectId: number,
    options: ConditionalRunOptions<T> = {},
  ): T {
    const inRollout = inBucket(subjectId, percentage, this.bucketer);
    return this.runConditional(
      name,
      newImplementation,
      oldImplementation,
      inRollout,
      withRolloutContext(options, percentage, subjectId, inRollout),
    );
  }

  public runRolloutAsync<T>(
    name: string,
    newImplementation: () => Promise<T>,
    oldImplementation: () => Promise<T>,
    percentage: number,
    subjectId: number,
    options: AsyncConditionalRunOptions<T> = {},
  ): Promise<T> {
    const inRollout = inBucket(subjectId, percentage, this.bucketer);
    return this.runConditionalAsync(name, newImplementation, oldImplementation, inRollout, {
      ...withRolloutContext(options, percentage, subjectId, inRollout),
      signal: options.signal,
    });
  }

  private experiment<T>(
    name: string,
    condition: boolean,
    options: ConditionalRunOptions<T>,
  ): Experiment<T> {
    const experimentType = options.experimentType ?? DEFAULT_EXPERIMENT_TYPE;
    return new Experiment<T>(`${name}_${experimentType}`, {
      sink: this.shouldPublish() ? this.sink : this.noOpSink,
      comparator: options.comparator,
      clean: options.clean,
      contexts: {
        ...options.context,
        condition_value: condition,
        experiment_type: experimentType,
      },
    });
  }

  private shouldPublish(): boolean {
    if (!this.rolloutSettings) {
      return true;
    }
    try {
      return this.rolloutSettings.shouldPublishResults();
    } catch (error) {
      logger.error({ err: error }, `${loggerPrefix} Error reading publish setting`);
      return false;
    }
  }
}

function assignRoles<F>(
  whenTrue: F,
  whenFalse: F,
  condition: boolean,
): [F, NamedBehavior<F>] {
  return condition
    ? [whenTrue, { name: CANDIDATE_NAME, behavior: whenFalse }]
    : [whenFalse, { name: CANDIDATE_NAME, behavior: whenTrue }];
}

function withRolloutContext<T>(
  options: ConditionalRunOptions<T>,
  percentage: number,
  subjectId: number,
  inRollout: boolean,
): ConditionalRunOptions<T> {
  return {
    ...options,
    context: {
      ...options.context,
      rollout_percentage: percentage,
      subject_id: subjectId,
      in_rollout_group: inRollout,
    },
  };
}
