import { logger, loggerPrefix } from './application-logger';
import { IConfigProvider } from './configuration-store/configuration-store';
import {
  ALLOWED_ALLOWLIST_IDS_KEY,
  ALLOWED_GROUPS_KEY,
  ALLOWED_REGIONS_KEY,
  ALLOWED_SUBJECT_TYPES_KEY,
  CRITERIA_ACTIVE_KEY,
  DEFAULT_CRITERIA_ACTIVE,
  DEFAULT_MULTIPLE_CRITERIA,
  MULTIPLE_CRITERIA_KEY,
  PUBLISH_RESULTS_KEY,
  ROLLOUT_ENABLED_KEY,
  ROLLOUT_PERCENTAGE_KEY,
} from './constants';
import { normalizeIdentifier } from './eligibility-criteria';
import { validatePercentage } from './validation';

export interface EligibilityConfig {
  criteriaValidationActive: boolean;
  multipleCriteriaEnabled: boolean;
  allowedSubjectTypes: string[];
  allowedGroups: string[];
  allowedAllowlistIds: string[];
  allowedRegions: string[];
}

export type EligibilityConfigUpdate = Partial<EligibilityConfig> & {
  enabled?: boolean;
  percentage?: number;
  publishResults?: boolean;
};

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function toLowerCaseSet(entries: string[]): Set<string> {
  return new Set(entries.map((entry) => entry.toLowerCase()));
}

export class EligibilitySettings {
  constructor(private readonly provider: IConfigProvider) {}

  isCriteriaValidationActive(): boolean {
    return this.provider.getBoolean(CRITERIA_ACTIVE_KEY, DEFAULT_CRITERIA_ACTIVE);
  }

  isMultipleCriteriaEnabled(): boolean {
    return this.provider.getBoolean(MULTIPLE_CRITERIA_KEY, DEFAULT_MULTIPLE_CRITERIA);
  }

  /** Lower-cased for case-insensitive membership. */
  getAllowedSubjectTypes(): Set<string> {
    return toLowerCaseSet(this.getList(ALLOWED_SUBJECT_TYPES_KEY));
  }

  /** Lower-cased for case-insensitive membership. */
  getAllowedGroups(): Set<string> {
    return toLowerCaseSet(this.getList(ALLOWED_GROUPS_KEY));
  }

  /** Normalized and lower-cased. */
  getAllowedAllowlistIds(): Set<string> {
    return toLowerCaseSet(
      this.getList(ALLOWED_ALLOWLIST_IDS_KEY)
        .map(normalizeIdentifier)
        .filter((id) => id.length > 0),
    );
  }

  /** Lower-cased for case-insensitive membership. */
  getAllowedRegions(): Set<string> {
    return toLowerCaseSet(this.getList(ALLOWED_REGIONS_KEY));
  }

  getConfig(): EligibilityConfig {
    return {
      criteriaValidationActive: this.isCriteriaValidationActive(),
      multipleCriteriaEnabled: this.isMultipleCriteriaEnabled(),
      allowedSubjectTypes: this.getList(ALLOWED_SUBJECT_TYPES_KEY),
      allowedGroups: this.getList(ALLOWED_GROUPS_KEY),
      allowedAllowlistIds: this.getList(ALLOWED_ALLOWLIST_IDS_KEY),
      allowedRegions: this.getList(ALLOWED_REGIONS_KEY),
    };
  }

  /**
   * Writes the supplied fields only. The percentage is validated before anything is
   * written, so a rejected update leaves the configuration untouched.
   */
  configure(update: EligibilityConfigUpdate) {
    if (update.percentage !== undefined) {
      validatePercentage(update.percentage);
    }

    const writes: Array<[string, string]> = [];
    if (update.criteriaValidationActive !== undefined) {
      writes.push([CRITERIA_ACTIVE_KEY, String(update.criteriaValidationActive)]);
    }
    if (update.multipleCriteriaEnabled !== undefined) {
      writes.push([MULTIPLE_CRITERIA_KEY, String(update.multipleCriteriaEnabled)]);
    }
    if (update.allowedSubjectTypes) {
      writes.push([ALLOWED_SUBJECT_TYPES_KEY, joinList(update.allowedSubjectTypes)]);
    }
    if (update.allowedGroups) {
      writes.push([ALLOWED_GROUPS_KEY, joinList(update.allowedGroups)]);
    }
    if (update.allowedAllowlistIds) {
      writes.push([ALLOWED_ALLOWLIST_IDS_KEY, joinList(update.allowedAllowlistIds)]);
    }
    if (update.allowedRegions) {
      writes.push([ALLOWED_REGIONS_KEY, joinList(update.allowedRegions)]);
    }
    if (update.enabled !== undefined) {
      writes.push([ROLLOUT_ENABLED_KEY, String(update.enabled)]);
    }
    if (update.percentage !== undefined) {
      writes.push([ROLLOUT_PERCENTAGE_KEY, String(update.percentage)]);
    }
    if (update.publishResults !== undefined) {
      writes.push([PUBLISH_RESULTS_KEY, String(update.publishResults)]);
    }

    writes.forEach(([key, value]) => this.provider.setString(key, value));
    logger.info(
      { keys: writes.map(([key]) => key) },
      `${loggerPrefix} Eligibility configuration updated`,
    );
  }

  private getList(key: string): string[] {
    return splitList(this.provider.getString(key, ''));
  }
}

function joinList(entries: string[]): string {
  return splitList(entries.join(',')).join(',');
}
