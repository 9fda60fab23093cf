/**
 * Implement this interface to let an external service decide whether a subject
 * may take part in the rollout.
 * @public
 */
export interface IExternalEligibilityService {
  /**
   * @param normalizedIdentifier the subject's allowlist identifier with non-alphanumeric characters removed
   * @param subjectId the subject being evaluated
   */
  isEligible(normalizedIdentifier: string, subjectId: number): boolean;
}

/** Used when no service is configured: every external check fails. */
export class DenyAllEligibilityService implements IExternalEligibilityService {
  isEligible(): boolean {
    return false;
  }
}
