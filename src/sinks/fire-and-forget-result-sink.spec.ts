import { RecordingResultSink, flushImmediate } from '../../test/testHelpers';
import { ComparisonResult } from '../comparison-result';
import { IResultSink } from '../result-sink';

import { CompositeResultSink } from './composite-result-sink';
import { FireAndForgetResultSink } from './fire-and-forget-result-sink';

const result: ComparisonResult = {
  experimentName: 'search',
  control: { name: 'control', value: 1, durationNanos: 100 },
  candidates: [{ name: 'candidate', value: 1, durationNanos: 100 }],
  matched: true,
  contexts: {},
};

describe('FireAndForgetResultSink', () => {
  it('delivers on a later macrotask', async () => {
    const recording = new RecordingResultSink();
    const sink = new FireAndForgetResultSink(recording);

    sink.publish(result);
    expect(recording.results).toEqual([]);

    await flushImmediate();
    expect(recording.results).toEqual([result]);
  });

  it('contains failures of the wrapped sink', async () => {
    const failing: IResultSink = {
      publish: () => {
        throw new Error('sink exploded');
      },
    };
    const sink = new FireAndForgetResultSink(failing);

    expect(() => sink.publish(result)).not.toThrow();
    await expect(flushImmediate()).resolves.toBeUndefined();
  });
});

describe('CompositeResultSink', () => {
  it('delivers to every sink even when one fails', () => {
    const first = new RecordingResultSink();
    const second = new RecordingResultSink();
    const failing: IResultSink = {
      publish: () => {
        throw new Error('sink exploded');
      },
    };

    new CompositeResultSink([first, failing, second]).publish(result);

    expect(first.results).toEqual([result]);
    expect(second.results).toEqual([result]);
  });
});
