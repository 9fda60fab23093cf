import { ComparisonResult } from '../comparison-result';
import { IResultSink, publishSafely } from '../result-sink';

/**
 * Defers the wrapped sink to a later macrotask so that even a synchronous sink
 * adds no latency to the caller.
 */
export class FireAndForgetResultSink implements IResultSink {
  constructor(private readonly sink: IResultSink) {}

  publish(result: ComparisonResult): void {
    setImmediate(() => publishSafely(this.sink, result));
  }
}
