import * as td from 'testdouble';

import { InMemoryKeyValueClient } from '../../test/testHelpers';
import { ComparisonResult } from '../comparison-result';

import {
  IResultStore,
  RedisResultStore,
  StoreResultSink,
  serializeResult,
} from './store-result-sink';

describe('StoreResultSink', () => {
  const cause = new Error('timeout');
  const result: ComparisonResult = {
    experimentName: 'search',
    control: { name: 'control', value: ['a', 'b'], durationNanos: 100 },
    candidates: [
      {
        name: 'candidate',
        durationNanos: 200,
        error: { type: 'Error', message: 'timeout', cause },
      },
    ],
    matched: false,
    contexts: { timestamp: '2024-05-01T10:00:00.000Z', rollout_percentage: 25 },
  };

  afterEach(() => {
    td.reset();
  });

  it('serializes errors without their cause', () => {
    expect(JSON.parse(serializeResult(result))).toEqual({
      experimentName: 'search',
      matched: false,
      control: { name: 'control', value: ['a', 'b'], durationNanos: 100, error: null },
      candidates: [
        {
          name: 'candidate',
          value: null,
          durationNanos: 200,
          error: { type: 'Error', message: 'timeout' },
        },
      ],
      contexts: { timestamp: '2024-05-01T10:00:00.000Z', rollout_percentage: 25 },
    });
  });

  it('saves the result under a fresh key with a seven-day expiry', async () => {
    const client = new InMemoryKeyValueClient();
    const sink = new StoreResultSink(new RedisResultStore(client), undefined, () => 'fixed-id');

    await sink.publish(result);

    expect(client.values.get('experiment:result:fixed-id')).toBe(serializeResult(result));
    expect(client.ttls.get('experiment:result:fixed-id')).toBe(604800);
  });

  it('generates a different key for each result', async () => {
    const client = new InMemoryKeyValueClient();
    const sink = new StoreResultSink(new RedisResultStore(client), 60);

    await sink.publish(result);
    await sink.publish(result);

    const keys = Array.from(client.values.keys());
    expect(keys).toHaveLength(2);
    expect(keys[0]).not.toBe(keys[1]);
    keys.forEach((key) => expect(key).toMatch(/^experiment:result:[0-9a-f-]{36}$/));
  });

  it('logs and drops a failed save', async () => {
    const store = td.object<IResultStore>();
    td.when(store.save('experiment:result:fixed-id', serializeResult(result), 604800)).thenReject(
      new Error('connection lost'),
    );
    const sink = new StoreResultSink(store, undefined, () => 'fixed-id');

    await expect(sink.publish(result)).resolves.toBeUndefined();
  });
});
