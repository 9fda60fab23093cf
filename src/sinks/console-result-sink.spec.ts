import { ComparisonResult } from '../comparison-result';

import { ConsoleResultSink } from './console-result-sink';

describe('ConsoleResultSink', () => {
  it('prints a matching comparison', () => {
    const lines: string[] = [];
    const sink = new ConsoleResultSink((line) => lines.push(line));
    const result: ComparisonResult = {
      experimentName: 'pricing',
      control: { name: 'control', value: { total: 10 }, durationNanos: 1500000 },
      candidates: [{ name: 'candidate', value: { total: 10 }, durationNanos: 250000 }],
      matched: true,
      contexts: { timestamp: '2024-05-01T10:00:00.000Z', rollout_percentage: 50, tags: ['a'] },
    };

    sink.publish(result);

    expect(lines).toEqual([
      'Experiment: pricing',
      'Result: SUCCESS - Matching Values',
      'Control value: {"total":10}',
      'Control duration: 1.5ms',
      'Candidate: candidate',
      'Candidate value: {"total":10}',
      'Candidate duration: 0.25ms',
      'Context - timestamp: 2024-05-01T10:00:00.000Z',
      'Context - rollout_percentage: 50',
      'Context - tags: ["a"]',
      '----------------------------------',
    ]);
  });

  it('prints errors in place of values', () => {
    const lines: string[] = [];
    const sink = new ConsoleResultSink((line) => lines.push(line));
    const cause = new TypeError('boom');

    sink.publish({
      experimentName: 'pricing',
      control: { name: 'control', value: 'A', durationNanos: 1000000 },
      candidates: [
        {
          name: 'candidate',
          durationNanos: 2000000,
          error: { type: 'TypeError', message: 'boom', cause },
        },
      ],
      matched: false,
      contexts: {},
    });

    expect(lines).toEqual([
      'Experiment: pricing',
      'Result: FAILURE - Different Values',
      'Control value: A',
      'Control duration: 1ms',
      'Candidate: candidate',
      'Candidate value: TypeError: boom',
      'Candidate duration: 2ms',
      '----------------------------------',
    ]);
  });

  it('writes to the console by default', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleResultSink().publish({
      experimentName: 'pricing',
      control: { name: 'control', value: null, durationNanos: 0 },
      candidates: [{ name: 'candidate', value: null, durationNanos: 0 }],
      matched: true,
      contexts: {},
    });

    expect(log).toHaveBeenCalledWith('Control value: null');
    log.mockRestore();
  });
});
