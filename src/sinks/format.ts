import { Observation } from '../observation';

export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return 'undefined';
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function formatOutcome(observation: Observation<unknown>): string {
  return observation.error !== undefined
    ? `${observation.error.type}: ${observation.error.message}`
    : formatValue(observation.value);
}

export function durationMs(observation: Observation<unknown>): number {
  return observation.durationNanos / 1e6;
}
