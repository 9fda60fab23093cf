import { logger, loggerPrefix } from './application-logger';
import { Bucketer, inBucket } from './bucketing';
import {
  ALLOWLIST_ID_ATTRIBUTE,
  CHECK_EXTERNAL_ELIGIBILITY_ATTRIBUTE,
  PURCHASE_HISTORY_ATTRIBUTE,
  REGION_ATTRIBUTE,
} from './constants';
import { EligibilityCriteria, normalizeIdentifier } from './eligibility-criteria';
import { EligibilitySettings } from './eligibility-settings';
import { EligibilityEvaluationError } from './errors';
import { DenyAllEligibilityService, IExternalEligibilityService } from './external-eligibility';
import { RolloutSettings } from './rollout-settings';
import { Rule, matchesAllRules } from './rules';
import { Attributes } from './types';
import { errorMessage } from './util';
import { Verdict, eligible, ineligible } from './verdict';

export interface EligibilityPolicyOptions {
  externalEligibilityService?: IExternalEligibilityService;
  /** Extra behavioral rules, all of which must hold after the purchase-history check. */
  behavioralRules?: Rule[];
  bucketer?: Bucketer;
}

/**
 * Layered eligibility: rollout switch, percentage gate, then functional, behavioral and
 * contextual criteria. Short-circuits on the first failure and fails closed on any error.
 */
export class EligibilityPolicy {
  private externalEligibilityService: IExternalEligibilityService;
  private readonly behavioralRules: Rule[];
  private readonly bucketer?: Bucketer;

  constructor(
    private readonly rolloutSettings: RolloutSettings,
    private readonly eligibilitySettings: EligibilitySettings,
    options: EligibilityPolicyOptions = {},
  ) {
    this.externalEligibilityService =
      options.externalEligibilityService ?? new DenyAllEligibilityService();
    this.behavioralRules = options.behavioralRules ?? [];
    this.bucketer = options.bucketer;
  }

  public setExternalEligibilityService(service: IExternalEligibilityService) {
    this.externalEligibilityService = service;
  }

  public evaluate(criteria: EligibilityCriteria): Verdict {
    const verdict = this.evaluateLayers(criteria);
    logger.debug(
      { subjectId: criteria.subjectId, code: verdict.code },
      `${loggerPrefix} Eligibility verdict: ${verdict.reason}`,
    );
    return verdict;
  }

  private evaluateLayers(criteria: EligibilityCriteria): Verdict {
    try {
      if (!this.rolloutSettings.isEnabled()) {
        return ineligible('ROLLOUT_DISABLED', 'rollout disabled');
      }

      const percentage = this.rolloutSettings.getPercentage();
      const inRollout = inBucket(criteria.subjectId, percentage, this.bucketer);

      if (!this.eligibilitySettings.isCriteriaValidationActive()) {
        return inRollout
          ? eligible(`subject inside the ${percentage}% rollout (percentage-only gating)`)
          : ineligible(
              'PERCENTAGE_MISS',
              `subject outside the ${percentage}% rollout (percentage-only gating)`,
            );
      }

      if (!inRollout) {
        return ineligible('PERCENTAGE_MISS', `subject outside the ${percentage}% rollout`);
      }

      const functionalFailure = this.checkFunctionalCriteria(criteria);
      if (functionalFailure) {
        return functionalFailure;
      }

      if (!this.eligibilitySettings.isMultipleCriteriaEnabled()) {
        return eligible(`subject inside the ${percentage}% rollout and passed functional criteria`);
      }

      const otherFailure =
        this.checkBehavioralCriteria(criteria) ?? this.checkContextualCriteria(criteria);
      return (
        otherFailure ??
        eligible(
          `subject inside the ${percentage}% rollout and passed functional, behavioral and contextual criteria`,
        )
      );
    } catch (error) {
      logger.error(
        { err: error, subjectId: criteria.subjectId },
        `${loggerPrefix} Error evaluating eligibility; treating subject as ineligible`,
      );
      return ineligible('EVALUATION_ERROR', errorMessage(error));
    }
  }

  private checkFunctionalCriteria(criteria: EligibilityCriteria): Verdict | null {
    const allowedSubjectTypes = this.eligibilitySettings.getAllowedSubjectTypes();
    if (allowedSubjectTypes.size > 0) {
      const subjectType = criteria.subjectType;
      if (!subjectType || !allowedSubjectTypes.has(subjectType.toLowerCase())) {
        return ineligible(
          'SUBJECT_TYPE_NOT_ALLOWED',
          `subject type not allowed: ${subjectType ?? '(none)'}`,
        );
      }
    }

    const allowedGroups = this.eligibilitySettings.getAllowedGroups();
    if (
      allowedGroups.size > 0 &&
      !criteria.groups.some((group) => allowedGroups.has(group.trim().toLowerCase()))
    ) {
      return ineligible('GROUP_NOT_ALLOWED', 'subject belongs to no allowed group');
    }

    const identifier = readIdentifier(criteria.contextualAttributes);
    if (identifier !== undefined) {
      const allowedIds = this.eligibilitySettings.getAllowedAllowlistIds();
      if (allowedIds.size > 0 && !allowedIds.has(identifier.toLowerCase())) {
        return ineligible('IDENTIFIER_NOT_ALLOWED', 'identifier not in allowlist');
      }
    }

    const checkExternal = readBoolean(
      criteria.contextualAttributes,
      CHECK_EXTERNAL_ELIGIBILITY_ATTRIBUTE,
    );
    if (checkExternal) {
      return this.checkExternalEligibility(identifier, criteria.subjectId);
    }
    return null;
  }

  private checkExternalEligibility(
    identifier: string | undefined,
    subjectId: number,
  ): Verdict | null {
    if (!identifier) {
      return ineligible(
        'EXTERNAL_CHECK_FAILED',
        'external eligibility check requested without an identifier',
      );
    }
    let isEligible: boolean;
    try {
      isEligible = this.externalEligibilityService.isEligible(identifier, subjectId);
    } catch (error) {
      logger.error(
        { err: error, subjectId },
        `${loggerPrefix} External eligibility service failed`,
      );
      return ineligible(
        'EXTERNAL_CHECK_FAILED',
        `external eligibility service failed: ${errorMessage(error)}`,
      );
    }
    logger.info(
      { subjectId, eligible: isEligible },
      `${loggerPrefix} External eligibility service answered`,
    );
    return isEligible
      ? null
      : ineligible('EXTERNAL_CHECK_FAILED', 'external eligibility service rejected subject');
  }

  private checkBehavioralCriteria(criteria: EligibilityCriteria): Verdict | null {
    const attributes = criteria.behavioralAttributes;
    if (readBoolean(attributes, PURCHASE_HISTORY_ATTRIBUTE) === false) {
      return ineligible('BEHAVIORAL_CRITERIA_FAILED', 'subject has no purchase history');
    }
    if (!matchesAllRules(this.behavioralRules, attributes)) {
      return ineligible('BEHAVIORAL_CRITERIA_FAILED', 'behavioral rules not satisfied');
    }
    return null;
  }

  private checkContextualCriteria(criteria: EligibilityCriteria): Verdict | null {
    const region = criteria.contextualAttributes[REGION_ATTRIBUTE];
    if (region === undefined || region === null) {
      return null;
    }
    if (typeof region !== 'string') {
      throw new EligibilityEvaluationError(
        `attribute "${REGION_ATTRIBUTE}" must be a string, got ${typeof region}`,
        REGION_ATTRIBUTE,
      );
    }
    const allowedRegions = this.eligibilitySettings.getAllowedRegions();
    if (region.trim() === '' || allowedRegions.size === 0) {
      return null;
    }
    return allowedRegions.has(region.trim().toLowerCase())
      ? null
      : ineligible('CONTEXTUAL_CRITERIA_FAILED', `region not allowed: ${region}`);
  }
}

function readIdentifier(attributes: Readonly<Attributes>): string | undefined {
  const value = attributes[ALLOWLIST_ID_ATTRIBUTE];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'boolean') {
    throw new EligibilityEvaluationError(
      `attribute "${ALLOWLIST_ID_ATTRIBUTE}" must be a string or number`,
      ALLOWLIST_ID_ATTRIBUTE,
    );
  }
  return normalizeIdentifier(String(value));
}

/** Accepts booleans and "true"/"false" strings; absent yields undefined. */
export function readBoolean(attributes: Readonly<Attributes>, name: string): boolean | undefined {
  const value = attributes[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  throw new EligibilityEvaluationError(
    `attribute "${name}" is not a boolean: ${String(value)}`,
    name,
  );
}
