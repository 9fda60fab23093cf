import { logger as applicationLogger } from './application-logger';
import {
  Bucketer,
  DeterministicBucketer,
  FixedSampler,
  RandomSampler,
  Sampler,
  SeededBucketer,
  SeededRandom,
  inBucket,
  subjectRandom,
} from './bucketing';
import RolloutClient, { RolloutClientOptions } from './client/rollout-client';
import {
  Comparator,
  ComparisonResult,
  defaultComparator,
  mismatchedCandidates,
} from './comparison-result';
import {
  AsyncConditionalRunOptions,
  ConditionalRunOptions,
  ConditionalRunner,
  ConditionalRunnerOptions,
} from './conditional-runner';
import {
  AbstractConfigProvider,
  IAsyncStore,
  IConfigProvider,
  ISyncStore,
} from './configuration-store/configuration-store';
import { HybridConfigProvider } from './configuration-store/hybrid.store';
import { MemoryConfigProvider, MemoryStore } from './configuration-store/memory.store';
import { RedisConfigStore } from './configuration-store/redis.store';
import * as constants from './constants';
import { EligibilityCriteria, buildCriteria, normalizeIdentifier } from './eligibility-criteria';
import { EligibilityPolicy, EligibilityPolicyOptions } from './eligibility-policy';
import {
  EligibilityConfig,
  EligibilityConfigUpdate,
  EligibilitySettings,
} from './eligibility-settings';
import { ConfigurationError, EligibilityEvaluationError, RolloutError } from './errors';
import { Experiment, ExperimentOptions, NamedBehavior } from './experiment';
import {
  AsyncRunOptions,
  ExperimentRunner,
  ExperimentRunnerOptions,
  RunOptions,
} from './experiment-runner';
import { DenyAllEligibilityService, IExternalEligibilityService } from './external-eligibility';
import { IKeyValueClient, IORedisKeyValueClient, createRedisClient } from './key-value-client';
import { Observation, ObservationError, observe, observeAsync } from './observation';
import { IResultSink, publishSafely } from './result-sink';
import { RolloutConfig, RolloutSettings } from './rollout-settings';
import { Condition, OperatorType, Rule } from './rules';
import { CompositeResultSink } from './sinks/composite-result-sink';
import { ConsoleResultSink } from './sinks/console-result-sink';
import { FireAndForgetResultSink } from './sinks/fire-and-forget-result-sink';
import { LoggerResultSink } from './sinks/logger-result-sink';
import { NoOpResultSink } from './sinks/noop-result-sink';
import { IResultStore, RedisResultStore, StoreResultSink } from './sinks/store-result-sink';
import { AttributeType, AttributeValue, Attributes, ContextValue, Contexts } from './types';
import * as validation from './validation';
import { Verdict, VerdictCode } from './verdict';

export {
  applicationLogger,
  constants,
  validation,
  RolloutClient,
  RolloutClientOptions,

  // Bucketing
  Bucketer,
  SeededBucketer,
  DeterministicBucketer,
  Sampler,
  RandomSampler,
  FixedSampler,
  SeededRandom,
  inBucket,
  subjectRandom,

  // Configuration
  IConfigProvider,
  AbstractConfigProvider,
  ISyncStore,
  IAsyncStore,
  MemoryStore,
  MemoryConfigProvider,
  HybridConfigProvider,
  RedisConfigStore,
  IKeyValueClient,
  IORedisKeyValueClient,
  createRedisClient,
  RolloutSettings,
  RolloutConfig,
  EligibilitySettings,
  EligibilityConfig,
  EligibilityConfigUpdate,

  // Eligibility
  EligibilityCriteria,
  buildCriteria,
  normalizeIdentifier,
  EligibilityPolicy,
  EligibilityPolicyOptions,
  IExternalEligibilityService,
  DenyAllEligibilityService,
  Verdict,
  VerdictCode,
  Rule,
  Condition,
  OperatorType,

  // Execution
  Experiment,
  ExperimentOptions,
  NamedBehavior,
  ExperimentRunner,
  ExperimentRunnerOptions,
  RunOptions,
  AsyncRunOptions,
  ConditionalRunner,
  ConditionalRunnerOptions,
  ConditionalRunOptions,
  AsyncConditionalRunOptions,
  Observation,
  ObservationError,
  observe,
  observeAsync,
  ComparisonResult,
  Comparator,
  defaultComparator,
  mismatchedCandidates,

  // Result sinks
  IResultSink,
  publishSafely,
  NoOpResultSink,
  ConsoleResultSink,
  LoggerResultSink,
  FireAndForgetResultSink,
  CompositeResultSink,
  StoreResultSink,
  IResultStore,
  RedisResultStore,

  // Errors
  RolloutError,
  ConfigurationError,
  EligibilityEvaluationError,

  // Types
  AttributeType,
  AttributeValue,
  Attributes,
  ContextValue,
  Contexts,
};
