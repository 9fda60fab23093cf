import { ComparisonResult } from '../comparison-result';
import { IResultSink, publishSafely } from '../result-sink';

/** Fans a result out to several sinks; one failing sink does not affect the others. */
export class CompositeResultSink implements IResultSink {
  constructor(private readonly sinks: IResultSink[]) {}

  publish(result: ComparisonResult): void {
    this.sinks.forEach((sink) => publishSafely(sink, result));
  }
}
