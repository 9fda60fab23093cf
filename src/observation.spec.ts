import { observe, observeAsync, toObservationError, unwrap } from './observation';

describe('observation', () => {
  it('records the value and a duration', () => {
    const observation = observe('control', () => 'A');

    expect(observation.name).toBe('control');
    expect(observation.value).toBe('A');
    expect(observation.error).toBeUndefined();
    expect(observation.durationNanos).toBeGreaterThanOrEqual(0);
  });

  it('traps a raised error', () => {
    const failure = new TypeError('bad input');
    const observation = observe('candidate', () => {
      throw failure;
    });

    expect(observation.value).toBeUndefined();
    expect(observation.error).toEqual({ type: 'TypeError', message: 'bad input', cause: failure });
  });

  it('describes values that are not errors', () => {
    expect(toObservationError('plain string')).toEqual({
      type: 'string',
      message: 'plain string',
      cause: 'plain string',
    });
  });

  it('traps a rejected promise', async () => {
    const observation = await observeAsync('candidate', async () => {
      throw new RangeError('out of range');
    });

    expect(observation.error?.type).toBe('RangeError');
    expect(observation.error?.message).toBe('out of range');
  });

  it('awaits the value of an async behavior', async () => {
    const observation = await observeAsync('control', async () => 42);

    expect(observation.value).toBe(42);
  });

  describe('unwrap', () => {
    it('returns the value', () => {
      expect(unwrap(observe('control', () => ({ id: 1 })))).toEqual({ id: 1 });
    });

    it('rethrows the original error unchanged', () => {
      const failure = new Error('control failed');
      const observation = observe('control', () => {
        throw failure;
      });

      let thrown: unknown;
      try {
        unwrap(observation);
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBe(failure);
    });
  });
});
