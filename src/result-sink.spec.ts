import * as td from 'testdouble';

import { ComparisonResult } from './comparison-result';
import { IResultSink, publishSafely } from './result-sink';

describe('publishSafely', () => {
  const result: ComparisonResult = {
    experimentName: 'checkout',
    control: { name: 'control', value: 1, durationNanos: 10 },
    candidates: [{ name: 'candidate', value: 1, durationNanos: 12 }],
    matched: true,
    contexts: {},
  };

  afterEach(() => {
    td.reset();
  });

  it('hands the result to the sink', () => {
    const sink = td.object<IResultSink>();

    publishSafely(sink, result);

    td.verify(sink.publish(result), { times: 1 });
  });

  it('contains a sink that throws', () => {
    const sink = td.object<IResultSink>();
    td.when(sink.publish(result)).thenThrow(new Error('sink exploded'));

    expect(() => publishSafely(sink, result)).not.toThrow();
  });

  it('attaches a rejection handler to an async sink', () => {
    const rejection = Promise.reject(new Error('write failed'));
    const then = jest.spyOn(rejection, 'then');
    const sink: IResultSink = { publish: () => rejection };

    publishSafely(sink, result);

    expect(then).toHaveBeenCalledWith(undefined, expect.any(Function));
  });
});
