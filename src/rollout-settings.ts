import { logger, loggerPrefix } from './application-logger';
import { IConfigProvider, parseIntValue } from './configuration-store/configuration-store';
import {
  DEFAULT_PUBLISH_RESULTS,
  DEFAULT_ROLLOUT_ENABLED,
  DEFAULT_ROLLOUT_PERCENTAGE,
  PUBLISH_RESULTS_KEY,
  ROLLOUT_ENABLED_KEY,
  ROLLOUT_PERCENTAGE_KEY,
} from './constants';
import { isValidPercentage, validatePercentage } from './validation';

export interface RolloutConfig {
  enabled: boolean;
  percentage: number;
  publishResults: boolean;
}

/**
 * Reads and writes {@link RolloutConfig} through the provider. Nothing is cached:
 * every getter goes back to the provider.
 */
export class RolloutSettings {
  private lastValidPercentage = DEFAULT_ROLLOUT_PERCENTAGE;

  constructor(private readonly provider: IConfigProvider) {}

  isEnabled(): boolean {
    return this.provider.getBoolean(ROLLOUT_ENABLED_KEY, DEFAULT_ROLLOUT_ENABLED);
  }

  /**
   * Always in [0, 100]. A missing or blank key yields 0; an unparsable or out-of-range
   * stored value yields the last valid one read, or 0.
   */
  getPercentage(): number {
    const raw = this.provider.getString(ROLLOUT_PERCENTAGE_KEY, '');
    if (raw.trim() === '') {
      return DEFAULT_ROLLOUT_PERCENTAGE;
    }
    const percentage = parseIntValue(raw, Number.NaN);
    if (!isValidPercentage(percentage)) {
      logger.warn(
        `${loggerPrefix} Ignoring invalid rollout percentage "${raw}"; using ${this.lastValidPercentage}`,
      );
      return this.lastValidPercentage;
    }
    this.lastValidPercentage = percentage;
    return percentage;
  }

  shouldPublishResults(): boolean {
    return this.provider.getBoolean(PUBLISH_RESULTS_KEY, DEFAULT_PUBLISH_RESULTS);
  }

  getConfig(): RolloutConfig {
    return {
      enabled: this.isEnabled(),
      percentage: this.getPercentage(),
      publishResults: this.shouldPublishResults(),
    };
  }

  setEnabled(enabled: boolean) {
    this.provider.setString(ROLLOUT_ENABLED_KEY, String(enabled));
    logger.info(`${loggerPrefix} Rollout ${enabled ? 'enabled' : 'disabled'}`);
  }

  setPercentage(percentage: number) {
    validatePercentage(percentage);
    this.provider.setString(ROLLOUT_PERCENTAGE_KEY, String(percentage));
    logger.info(`${loggerPrefix} Rollout percentage set to ${percentage}%`);
  }

  setPublishResults(publishResults: boolean) {
    this.provider.setString(PUBLISH_RESULTS_KEY, String(publishResults));
  }
}
