import { IResultSink } from '../result-sink';

export class NoOpResultSink implements IResultSink {
  publish(): void {
    // discarded
  }
}
