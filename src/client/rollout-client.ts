import { Bucketer, Sampler } from '../bucketing';
import {
  AsyncConditionalRunOptions,
  ConditionalRunOptions,
  ConditionalRunner,
} from '../conditional-runner';
import { IConfigProvider } from '../configuration-store/configuration-store';
import { EligibilityCriteria } from '../eligibility-criteria';
import { EligibilityPolicy } from '../eligibility-policy';
import {
  EligibilityConfig,
  EligibilityConfigUpdate,
  EligibilitySettings,
} from '../eligibility-settings';
import { AsyncRunOptions, ExperimentRunner, RunOptions } from '../experiment-runner';
import { IExternalEligibilityService } from '../external-eligibility';
import { IResultSink } from '../result-sink';
import { RolloutConfig, RolloutSettings } from '../rollout-settings';
import { Rule } from '../rules';
import { ConsoleResultSink } from '../sinks/console-result-sink';
import { FireAndForgetResultSink } from '../sinks/fire-and-forget-result-sink';
import { validateNotBlank } from '../validation';
import { Verdict } from '../verdict';

export interface RolloutClientOptions {
  resultSink?: IResultSink;
  externalEligibilityService?: IExternalEligibilityService;
  behavioralRules?: Rule[];
  sampler?: Sampler;
  bucketer?: Bucketer;
}

/**
 * Entry point for callers: configure the rollout and eligibility policy, and run
 * control/candidate comparisons.
 */
export default class RolloutClient {
  private readonly rolloutSettings: RolloutSettings;
  private readonly eligibilitySettings: EligibilitySettings;
  private readonly policy: EligibilityPolicy;
  private readonly runner: ExperimentRunner;
  private readonly conditionalRunner: ConditionalRunner;

  constructor(configProvider: IConfigProvider, options: RolloutClientOptions = {}) {
    this.rolloutSettings = new RolloutSettings(configProvider);
    this.eligibilitySettings = new EligibilitySettings(configProvider);
    this.policy = new EligibilityPolicy(this.rolloutSettings, this.eligibilitySettings, {
      externalEligibilityService: options.externalEligibilityService,
      behavioralRules: options.behavioralRules,
      bucketer: options.bucketer,
    });
    const sink = options.resultSink ?? new ConsoleResultSink();
    this.runner = new ExperimentRunner(this.rolloutSettings, this.policy, {
      sink,
      sampler: options.sampler,
      bucketer: options.bucketer,
    });
    this.conditionalRunner = new ConditionalRunner({
      sink,
      rolloutSettings: this.rolloutSettings,
      bucketer: options.bucketer,
    });
  }

  /**
   * Comparisons are handed to the sink on a later tick, so a slow sink never delays the caller.
   */
  public setResultSink(sink: IResultSink) {
    const deferred = new FireAndForgetResultSink(sink);
    this.runner.setSink(deferred);
    this.conditionalRunner.setSink(deferred);
  }

  public setExternalEligibilityService(service: IExternalEligibilityService) {
    this.policy.setExternalEligibilityService(service);
  }

  public isRolloutEnabled(): boolean {
    return this.rolloutSettings.isEnabled();
  }

  public setRolloutEnabled(enabled: boolean) {
    this.rolloutSettings.setEnabled(enabled);
  }

  public getRolloutPercentage(): number {
    return this.rolloutSettings.getPercentage();
  }

  /** @throws ConfigurationError when outside [0, 100]; the previous value is kept. */
  public setRolloutPercentage(percentage: number) {
    this.rolloutSettings.setPercentage(percentage);
  }

  public setPublishResults(publishResults: boolean) {
    this.rolloutSettings.setPublishResults(publishResults);
  }

  public getRolloutConfig(): RolloutConfig {
    return this.rolloutSettings.getConfig();
  }

  public configureEligibility(update: EligibilityConfigUpdate) {
    this.eligibilitySettings.configure(update);
  }

  public getEligibilityConfig(): EligibilityConfig {
    return this.eligibilitySettings.getConfig();
  }

  public evaluateEligibility(criteria: EligibilityCriteria): Verdict {
    return this.policy.evaluate(criteria);
  }

  public run<T>(
    experimentName: string,
    control: () => T,
    candidate: () => T,
    options?: RunOptions<T>,
  ): T {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.runner.run(experimentName, control, candidate, options);
  }

  public runAsync<T>(
    experimentName: string,
    control: () => Promise<T>,
    candidate: () => Promise<T>,
    options?: AsyncRunOptions<T>,
  ): Promise<T> {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.runner.runAsync(experimentName, control, candidate, options);
  }

  public runEligible<T>(
    experimentName: string,
    criteria: EligibilityCriteria,
    control: () => T,
    candidate: () => T,
    options?: Omit<RunOptions<T>, 'subjectId'>,
  ): T {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.runner.runEligible(experimentName, criteria, control, candidate, options);
  }

  public runEligibleAsync<T>(
    experimentName: string,
    criteria: EligibilityCriteria,
    control: () => Promise<T>,
    candidate: () => Promise<T>,
    options?: Omit<AsyncRunOptions<T>, 'subjectId'>,
  ): Promise<T> {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.runner.runEligibleAsync(experimentName, criteria, control, candidate, options);
  }

  public runConditional<T>(
    experimentName: string,
    whenTrue: () => T,
    whenFalse: () => T,
    condition: boolean,
    options?: ConditionalRunOptions<T>,
  ): T {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.conditionalRunner.runConditional(
      experimentName,
      whenTrue,
      whenFalse,
      condition,
      options,
    );
  }

  public runConditionalAsync<T>(
    experimentName: string,
    whenTrue: () => Promise<T>,
    whenFalse: () => Promise<T>,
    condition: boolean,
    options?: AsyncConditionalRunOptions<T>,
  ): Promise<T> {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.conditionalRunner.runConditionalAsync(
      experimentName,
      whenTrue,
      whenFalse,
      condition,
      options,
    );
  }

  /** Percentage A/B keyed on the subject, independent of the configured rollout. */
  public runRollout<T>(
    experimentName: string,
    newImplementation: () => T,
    oldImplementation: () => T,
    percentage: number,
    subjectId: number,
    options?: ConditionalRunOptions<T>,
  ): T {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.conditionalRunner.runRollout(
      experimentName,
      newImplementation,
      oldImplementation,
      percentage,
      subjectId,
      options,
    );
  }

  public runRolloutAsync<T>(
    experimentName: string,
    newImplementation: () => Promise<T>,
    oldImplementation: () => Promise<T>,
    percentage: number,
    subjectId: number,
    options?: AsyncConditionalRunOptions<T>,
  ): Promise<T> {
    validateNotBlank(experimentName, 'Invalid argument: experimentName cannot be blank');
    return this.conditionalRunner.runRolloutAsync(
      experimentName,
      newImplementation,
      oldImplementation,
      percentage,
      subjectId,
      options,
    );
  }
}
