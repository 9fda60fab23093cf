import { logger, loggerPrefix } from './application-logger';
import { ComparisonResult } from './comparison-result';
import { isPromiseLike } from './util';

/**
 * Implement this interface to record comparisons, e.g. to your data warehouse.
 * @public
 */
export interface IResultSink {
  /**
   * Invoked once per dual-path execution. The engine does not wait for a returned
   * promise; failures are logged and dropped.
   */
  publish(result: ComparisonResult): void | Promise<void>;
}

/**
 * Hands the result to the sink without waiting for it. Never throws.
 */
export function publishSafely(sink: IResultSink, result: ComparisonResult): void {
  const onError = (error: unknown) => {
    logger.error(
      { err: error, experiment: result.experimentName },
      `${loggerPrefix} Error publishing comparison result`,
    );
  };
  try {
    const pending = sink.publish(result);
    if (isPromiseLike(pending)) {
      pending.then(undefined, onError);
    }
  } catch (error) {
    onError(error);
  }
}
