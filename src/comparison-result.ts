import { isEqual } from 'lodash';

import { Observation } from './observation';
import { Contexts } from './types';

/**
 * Holds the outcome of running control and candidates side by side.
 * @public
 */
export interface ComparisonResult<V = unknown> {
  experimentName: string;
  control: Observation<V>;
  /** Never empty. */
  candidates: Observation<V>[];
  /** True when every candidate agreed with the control. */
  matched: boolean;
  /** Always carries `timestamp`; runner contexts add the rollout percentage. */
  contexts: Contexts;
}

/**
 * Decides whether a candidate agreed with the control. Receives the raw (uncleaned)
 * observations so it can inspect errors.
 */
export type Comparator<T> = (control: Observation<T>, candidate: Observation<T>) => boolean;

/**
 * Deep equality when both succeeded. When either raised, they agree only if both raised.
 */
export function defaultComparator<T>(control: Observation<T>, candidate: Observation<T>): boolean {
  if (control.error || candidate.error) {
    return !!control.error && !!candidate.error;
  }
  return isEqual(control.value, candidate.value);
}

export function mismatchedCandidates<V>(
  result: ComparisonResult<V>,
  comparator: Comparator<V> = defaultComparator,
): Observation<V>[] {
  return result.candidates.filter((candidate) => !comparator(result.control, candidate));
}
