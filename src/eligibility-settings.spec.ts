import { MemoryConfigProvider } from './configuration-store/memory.store';
import {
  ALLOWED_ALLOWLIST_IDS_KEY,
  ALLOWED_GROUPS_KEY,
  ALLOWED_REGIONS_KEY,
  ALLOWED_SUBJECT_TYPES_KEY,
  CRITERIA_ACTIVE_KEY,
  ROLLOUT_PERCENTAGE_KEY,
} from './constants';
import { EligibilitySettings } from './eligibility-settings';
import { ConfigurationError } from './errors';

describe('EligibilitySettings', () => {
  let provider: MemoryConfigProvider;
  let settings: EligibilitySettings;

  beforeEach(() => {
    provider = new MemoryConfigProvider();
    settings = new EligibilitySettings(provider);
  });

  it('uses defaults when nothing is configured', () => {
    expect(settings.getConfig()).toEqual({
      criteriaValidationActive: false,
      multipleCriteriaEnabled: false,
      allowedSubjectTypes: [],
      allowedGroups: [],
      allowedAllowlistIds: [],
      allowedRegions: [],
    });
  });

  it('writes only the supplied fields', () => {
    settings.configure({ criteriaValidationActive: true, allowedRegions: [' US ', '', 'eu'] });

    expect(provider.entries()).toEqual({
      [CRITERIA_ACTIVE_KEY]: 'true',
      [ALLOWED_REGIONS_KEY]: 'US,eu',
    });
  });

  it('writes rollout fields alongside eligibility fields', () => {
    settings.configure({ percentage: 60, allowedSubjectTypes: ['Premium'] });

    expect(provider.getString(ROLLOUT_PERCENTAGE_KEY, '')).toBe('60');
    expect(provider.getString(ALLOWED_SUBJECT_TYPES_KEY, '')).toBe('Premium');
  });

  it('rejects an invalid percentage without writing anything', () => {
    expect(() =>
      settings.configure({ percentage: 150, criteriaValidationActive: true }),
    ).toThrow(ConfigurationError);
    expect(provider.entries()).toEqual({});
  });

  it('matches subject types and regions case-insensitively', () => {
    settings.configure({ allowedSubjectTypes: ['Premium', 'GOLD'], allowedRegions: ['Us-East'] });

    expect(settings.getAllowedSubjectTypes()).toEqual(new Set(['premium', 'gold']));
    expect(settings.getAllowedRegions()).toEqual(new Set(['us-east']));
  });

  it('stores groups comma-joined and matches them case-insensitively', () => {
    settings.configure({ allowedGroups: [' Beta Testers ', 'Partners'] });

    expect(provider.getString(ALLOWED_GROUPS_KEY, '')).toBe('Beta Testers,Partners');
    expect(settings.getAllowedGroups()).toEqual(new Set(['beta testers', 'partners']));
    expect(settings.getConfig().allowedGroups).toEqual(['Beta Testers', 'Partners']);
  });

  it('normalizes allowlist ids and drops ones that normalize to nothing', () => {
    provider.setString(ALLOWED_ALLOWLIST_IDS_KEY, 'AB-12.3, --- ,xy_9');

    expect(settings.getAllowedAllowlistIds()).toEqual(new Set(['ab123', 'xy9']));
    expect(settings.getConfig().allowedAllowlistIds).toEqual(['AB-12.3', '---', 'xy_9']);
  });

  it('can clear a list', () => {
    settings.configure({ allowedRegions: ['us'] });
    settings.configure({ allowedRegions: [] });

    expect(settings.getAllowedRegions().size).toBe(0);
  });
});
