export class RolloutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown when a configuration write is rejected. The stored value is left unchanged. */
export class ConfigurationError extends RolloutError {}

/**
 * Raised while evaluating eligibility, e.g. for a malformed attribute value.
 * Never escapes the policy: it is turned into an ineligible verdict.
 */
export class EligibilityEvaluationError extends RolloutError {
  constructor(
    message: string,
    readonly attribute?: string,
  ) {
    super(message);
  }
}
