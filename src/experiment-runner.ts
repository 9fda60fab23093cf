import { logger, loggerPrefix } from './application-logger';
import { Bucketer, RandomSampler, Sampler, inBucket } from './bucketing';
import { Comparator } from './comparison-result';
import { CANDIDATE_NAME } from './constants';
import { EligibilityCriteria } from './eligibility-criteria';
import { EligibilityPolicy } from './eligibility-policy';
import { Experiment } from './experiment';
import { IResultSink } from './result-sink';
import { RolloutSettings } from './rollout-settings';
import { ConsoleResultSink } from './sinks/console-result-sink';
import { NoOpResultSink } from './sinks/noop-result-sink';
import { Contexts } from './types';
import { Verdict } from './verdict';

export interface RunOptions<T> {
  /** Buckets deterministically on this subject; without it the runner samples at random. */
  subjectId?: number;
  context?: Contexts;
  comparator?: Comparator<T>;
  clean?: (value: T) => unknown;
}

export interface AsyncRunOptions<T> extends RunOptions<T> {
  /** Aborting abandons the candidate; the control's outcome is still returned. */
  signal?: AbortSignal;
}

export interface ExperimentRunnerOptions {
  sink?: IResultSink;
  sampler?: Sampler;
  bucketer?: Bucketer;
}

interface Gate {
  open: boolean;
  percentage: number;
  publish: boolean;
}

const closedGate: Gate = { open: false, percentage: 0, publish: false };

/**
 * Runs the candidate in shadow of the control when the rollout admits the call.
 * Configuration is re-read on every call.
 */
export class ExperimentRunner {
  private sink: IResultSink;
  private readonly sampler: Sampler;
  private readonly bucketer?: Bucketer;
  private readonly noOpSink = new NoOpResultSink();

  constructor(
    private readonly rolloutSettings: RolloutSettings,
    private readonly policy: EligibilityPolicy,
    options: ExperimentRunnerOptions = {},
  ) {
    this.sink = options.sink ?? new ConsoleResultSink();
    this.sampler = options.sampler ?? new RandomSampler();
    this.bucketer = options.bucketer;
  }

  public setSink(sink: IResultSink) {
    this.sink = sink;
  }

  public run<T>(
    name: string,
    control: () => T,
    candidate: () => T,
    options: RunOptions<T> = {},
  ): T {
    const gate = this.gate(options.subjectId);
    if (!gate.open) {
      return control();
    }
    return this.experiment(name, gate, options).run(control, [
      { name: CANDIDATE_NAME, behavior: candidate },
    ]);
  }

  public async runAsync<T>(
    name: string,
    control: () => Promise<T>,
    candidate: () => Promise<T>,
    options: AsyncRunOptions<T> = {},
  ): Promise<T> {
    const gate = this.gate(options.subjectId);
    if (!gate.open) {
      return control();
    }
    return this.experiment(name, gate, options).runAsync(
      control,
      [{ name: CANDIDATE_NAME, behavior: candidate }],
      options.signal,
    );
  }

  /**
   * Evaluates the eligibility policy for the subject first; an ineligible subject only
   * runs the control.
   */
  public runEligible<T>(
    name: string,
    criteria: EligibilityCriteria,
    control: () => T,
    candidate: () => T,
    options: Omit<RunOptions<T>, 'subjectId'> = {},
  ): T {
    const verdict = this.policy.evaluate(criteria);
    if (!verdict.eligible) {
      return control();
    }
    return this.run(name, control, candidate, this.eligibleRunOptions(criteria, verdict, options));
  }

  public async runEligibleAsync<T>(
    name: string,
    criteria: EligibilityCriteria,
    control: () => Promise<T>,
    candidate: () => Promise<T>,
    options: Omit<AsyncRunOptions<T>, 'subjectId'> = {},
  ): Promise<T> {
    const verdict = this.policy.evaluate(criteria);
    if (!verdict.eligible) {
      return control();
    }
    return this.runAsync(name, control, candidate, {
      ...this.eligibleRunOptions(criteria, verdict, options),
      signal: options.signal,
    });
  }

  private eligibleRunOptions<T>(
    criteria: EligibilityCriteria,
    verdict: Verdict,
    options: Omit<RunOptions<T>, 'subjectId'>,
  ): RunOptions<T> {
    return {
      ...options,
      subjectId: criteria.subjectId,
      context: {
        subject_type: criteria.subjectType ?? null,
        has_behavioral_data: Object.keys(criteria.behavioralAttributes).length > 0,
        has_contextual_data: Object.keys(criteria.contextualAttributes).length > 0,
        eligibility_reason: verdict.reason,
        ...options.context,
      },
    };
  }

  private gate(subjectId?: number): Gate {
    try {
      if (!this.rolloutSettings.isEnabled()) {
        return closedGate;
      }
      const percentage = this.rolloutSettings.getPercentage();
      const open =
        subjectId === undefined
          ? this.sampler.sample(percentage)
          : inBucket(subjectId, percentage, this.bucketer);
      return {
        open,
        percentage,
        publish: open && this.rolloutSettings.shouldPublishResults(),
      };
    } catch (error) {
      logger.error(
        { err: error },
        `${loggerPrefix} Error reading rollout gate; running control only`,
      );
      return closedGate;
    }
  }

  private experiment<T>(name: string, gate: Gate, options: RunOptions<T>): Experiment<T> {
    return new Experiment<T>(name, {
      sink: gate.publish ? this.sink : this.noOpSink,
      comparator: options.comparator,
      clean: options.clean,
      contexts: {
        ...(options.subjectId !== undefined ? { subject_id: options.subjectId } : {}),
        ...options.context,
        rollout_percentage: gate.percentage,
      },
    });
  }
}
