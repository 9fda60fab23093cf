import pino from 'pino';

import { logger as applicationLogger, loggerPrefix } from '../application-logger';
import { ComparisonResult } from '../comparison-result';
import { IResultSink } from '../result-sink';

import { durationMs, formatOutcome } from './format';

export class LoggerResultSink implements IResultSink {
  constructor(private readonly logger: pino.Logger = applicationLogger) {}

  publish(result: ComparisonResult): void {
    const candidate = result.candidates[0];
    const fields = {
      experiment: result.experimentName,
      matched: result.matched,
      control: formatOutcome(result.control),
      controlDurationMs: durationMs(result.control),
      candidates: result.candidates.map((observation) => ({
        name: observation.name,
        value: formatOutcome(observation),
        durationMs: durationMs(observation),
        errored: observation.error !== undefined,
      })),
      contexts: result.contexts,
    };
    this.logger.info(
      fields,
      `${loggerPrefix} Experiment ${result.experimentName}: ${result.matched ? 'match' : 'mismatch'}`,
    );
    if (!result.matched) {
      this.logger.warn(
        { experiment: result.experimentName },
        `${loggerPrefix} Mismatch in ${result.experimentName} - control: ${formatOutcome(
          result.control,
        )}, ${candidate.name}: ${formatOutcome(candidate)}`,
      );
    }
  }
}
