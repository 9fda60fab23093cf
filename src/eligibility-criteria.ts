import { Attributes } from './types';

/** Snapshot of the subject a request is about. Built fresh per call and frozen. */
export interface EligibilityCriteria {
  readonly subjectId: number;
  readonly subjectType?: string;
  /** Groups the subject belongs to, e.g. beta testers or partners. */
  readonly groups: readonly string[];
  readonly behavioralAttributes: Readonly<Attributes>;
  readonly contextualAttributes: Readonly<Attributes>;
}

export function buildCriteria(
  subjectId: number,
  options: {
    subjectType?: string;
    groups?: string[];
    behavioralAttributes?: Attributes;
    contextualAttributes?: Attributes;
  } = {},
): EligibilityCriteria {
  return Object.freeze({
    subjectId,
    subjectType: options.subjectType,
    groups: Object.freeze([...(options.groups ?? [])]),
    behavioralAttributes: Object.freeze({ ...(options.behavioralAttributes ?? {}) }),
    contextualAttributes: Object.freeze({ ...(options.contextualAttributes ?? {}) }),
  });
}

export function normalizeIdentifier(identifier: string): string {
  return identifier.replace(/[^a-z0-9]/gi, '');
}
