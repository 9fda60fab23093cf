import { v4 as uuid } from 'uuid';

import { logger, loggerPrefix } from '../application-logger';
import { ComparisonResult } from '../comparison-result';
import { RESULT_KEY_PREFIX, RESULT_TTL_SECONDS } from '../constants';
import { IKeyValueClient } from '../key-value-client';
import { Observation } from '../observation';
import { IResultSink } from '../result-sink';

export interface IResultStore {
  save(key: string, serializedResult: string, ttlSeconds: number): Promise<void>;
}

/** Saves results as Redis strings that expire after the TTL. */
export class RedisResultStore implements IResultStore {
  constructor(private readonly client: IKeyValueClient) {}

  save(key: string, serializedResult: string, ttlSeconds: number): Promise<void> {
    return this.client.set(key, serializedResult, ttlSeconds);
  }
}

export interface StoredObservation {
  name: string;
  value: unknown;
  durationNanos: number;
  error: { type: string; message: string } | null;
}

export interface StoredComparisonResult {
  experimentName: string;
  matched: boolean;
  control: StoredObservation;
  candidates: StoredObservation[];
  contexts: ComparisonResult['contexts'];
}

function toStoredObservation(observation: Observation<unknown>): StoredObservation {
  return {
    name: observation.name,
    value: observation.value ?? null,
    durationNanos: observation.durationNanos,
    // the raw cause is not serializable in general
    error: observation.error
      ? { type: observation.error.type, message: observation.error.message }
      : null,
  };
}

export function serializeResult(result: ComparisonResult): string {
  const stored: StoredComparisonResult = {
    experimentName: result.experimentName,
    matched: result.matched,
    control: toStoredObservation(result.control),
    candidates: result.candidates.map(toStoredObservation),
    contexts: result.contexts,
  };
  return JSON.stringify(stored);
}

/** Persists each result under `experiment:result:<uuid>` and logs the outcome. */
export class StoreResultSink implements IResultSink {
  constructor(
    private readonly store: IResultStore,
    private readonly ttlSeconds: number = RESULT_TTL_SECONDS,
    private readonly generateId: () => string = () => uuid(),
  ) {}

  async publish(result: ComparisonResult): Promise<void> {
    const key = `${RESULT_KEY_PREFIX}${this.generateId()}`;
    try {
      await this.store.save(key, serializeResult(result), this.ttlSeconds);
      logger.info(
        { experiment: result.experimentName, matched: result.matched, key },
        `${loggerPrefix} Stored comparison result`,
      );
    } catch (error) {
      logger.error(
        { err: error, experiment: result.experimentName },
        `${loggerPrefix} Failed to store comparison result`,
      );
    }
  }
}
