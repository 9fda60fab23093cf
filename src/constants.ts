export const ROLLOUT_ENABLED_KEY = 'rollout:enabled';
export const ROLLOUT_PERCENTAGE_KEY = 'rollout:percentage';
export const PUBLISH_RESULTS_KEY = 'rollout:publish_results';
export const CRITERIA_ACTIVE_KEY = 'rollout:criteria_active';
export const MULTIPLE_CRITERIA_KEY = 'rollout:multiple_criteria';
export const ALLOWED_SUBJECT_TYPES_KEY = 'rollout:allowed_subject_types';
export const ALLOWED_ALLOWLIST_IDS_KEY = 'rollout:allowed_allowlist_ids';
export const ALLOWED_REGIONS_KEY = 'rollout:allowed_regions';
export const ALLOWED_GROUPS_KEY = 'rollout:allowed_groups';

export const CONFIG_KEYS = [
  ROLLOUT_ENABLED_KEY,
  ROLLOUT_PERCENTAGE_KEY,
  PUBLISH_RESULTS_KEY,
  CRITERIA_ACTIVE_KEY,
  MULTIPLE_CRITERIA_KEY,
  ALLOWED_SUBJECT_TYPES_KEY,
  ALLOWED_ALLOWLIST_IDS_KEY,
  ALLOWED_REGIONS_KEY,
  ALLOWED_GROUPS_KEY,
] as const;

export const DEFAULT_ROLLOUT_ENABLED = true;
export const DEFAULT_ROLLOUT_PERCENTAGE = 0;
export const DEFAULT_PUBLISH_RESULTS = true;
export const DEFAULT_CRITERIA_ACTIVE = false;
export const DEFAULT_MULTIPLE_CRITERIA = false;

export const MIN_PERCENTAGE = 0;
export const MAX_PERCENTAGE = 100;
// bucketing draws a uniform integer in [0, BUCKET_COUNT)
export const BUCKET_COUNT = 100;

// well-known subject attributes
export const ALLOWLIST_ID_ATTRIBUTE = 'allowlistId';
export const CHECK_EXTERNAL_ELIGIBILITY_ATTRIBUTE = 'checkExternalEligibility';
export const REGION_ATTRIBUTE = 'region';
export const PURCHASE_HISTORY_ATTRIBUTE = 'hasPurchaseHistory';

export const CONTROL_NAME = 'control';
export const CANDIDATE_NAME = 'candidate';
export const DEFAULT_EXPERIMENT_TYPE = 'A';

export const RESULT_KEY_PREFIX = 'experiment:result:';
export const RESULT_TTL_SECONDS = 7 * 24 * 60 * 60;

export const DEFAULT_POLL_INTERVAL_MS = 30000;
export const POLL_JITTER_PCT = 0.1;
export const DEFAULT_POLL_RETRIES = 7;
