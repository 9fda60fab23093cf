import { MemoryConfigProvider } from './configuration-store/memory.store';
import { PUBLISH_RESULTS_KEY, ROLLOUT_ENABLED_KEY, ROLLOUT_PERCENTAGE_KEY } from './constants';
import { ConfigurationError } from './errors';
import { RolloutSettings } from './rollout-settings';

describe('RolloutSettings', () => {
  let provider: MemoryConfigProvider;
  let settings: RolloutSettings;

  beforeEach(() => {
    provider = new MemoryConfigProvider();
    settings = new RolloutSettings(provider);
  });

  it('uses defaults when nothing is configured', () => {
    expect(settings.getConfig()).toEqual({ enabled: true, percentage: 0, publishResults: true });
  });

  it('writes settings through the provider', () => {
    settings.setEnabled(false);
    settings.setPercentage(35);
    settings.setPublishResults(false);

    expect(provider.entries()).toEqual({
      [ROLLOUT_ENABLED_KEY]: 'false',
      [ROLLOUT_PERCENTAGE_KEY]: '35',
      [PUBLISH_RESULTS_KEY]: 'false',
    });
    expect(settings.getConfig()).toEqual({ enabled: false, percentage: 35, publishResults: false });
  });

  it('reads changes made directly in the provider on the next call', () => {
    settings.setPercentage(10);
    provider.setString(ROLLOUT_PERCENTAGE_KEY, '90');

    expect(settings.getPercentage()).toBe(90);
  });

  it.each([-1, 101, 12.5, Number.NaN])('rejects percentage %p and keeps the old value', (value) => {
    settings.setPercentage(20);

    expect(() => settings.setPercentage(value)).toThrow(ConfigurationError);
    expect(settings.getPercentage()).toBe(20);
  });

  it('accepts both bounds', () => {
    settings.setPercentage(0);
    expect(settings.getPercentage()).toBe(0);
    settings.setPercentage(100);
    expect(settings.getPercentage()).toBe(100);
  });

  it('falls back to the last valid percentage when the stored value is out of range', () => {
    settings.setPercentage(45);
    expect(settings.getPercentage()).toBe(45);

    provider.setString(ROLLOUT_PERCENTAGE_KEY, '250');
    expect(settings.getPercentage()).toBe(45);

    provider.setString(ROLLOUT_PERCENTAGE_KEY, 'not a number');
    expect(settings.getPercentage()).toBe(45);
  });

  it('reads a missing percentage as 0 even after a valid one was read', () => {
    settings.setPercentage(45);
    expect(settings.getPercentage()).toBe(45);

    provider.setString(ROLLOUT_PERCENTAGE_KEY, '');
    expect(settings.getPercentage()).toBe(0);

    const fresh = new RolloutSettings(new MemoryConfigProvider());
    expect(fresh.getPercentage()).toBe(0);
  });

  it('falls back to 0 when no valid percentage has been read yet', () => {
    provider.setString(ROLLOUT_PERCENTAGE_KEY, '-20');
    expect(settings.getPercentage()).toBe(0);
  });
});
