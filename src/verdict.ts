export const verdictCodes = [
  'ELIGIBLE',
  'ROLLOUT_DISABLED',
  'PERCENTAGE_MISS',
  'SUBJECT_TYPE_NOT_ALLOWED',
  'GROUP_NOT_ALLOWED',
  'IDENTIFIER_NOT_ALLOWED',
  'EXTERNAL_CHECK_FAILED',
  'BEHAVIORAL_CRITERIA_FAILED',
  'CONTEXTUAL_CRITERIA_FAILED',
  'EVALUATION_ERROR',
] as const;

export type VerdictCode = typeof verdictCodes[number];

/** Eligibility decision. `reason` is for humans and is never parsed. */
export interface Verdict {
  eligible: boolean;
  code: VerdictCode;
  reason: string;
}

export function eligible(reason: string): Verdict {
  return { eligible: true, code: 'ELIGIBLE', reason };
}

export function ineligible(code: Exclude<VerdictCode, 'ELIGIBLE'>, reason: string): Verdict {
  return { eligible: false, code, reason };
}
