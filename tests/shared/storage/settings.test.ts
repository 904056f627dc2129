import { describe, expect, it } from 'vitest';
import {
  DEFAULT_SETTINGS,
  DEFAULT_WARNINGS,
  InMemoryPreferenceStore,
  getSettings,
  normalizeSettings,
  saveSettings,
} from '../../../shared/storage/settings';

describe('settings storage', () => {
  it('returns defaults when nothing is stored', () => {
    expect(getSettings(new InMemoryPreferenceStore())).toEqual(DEFAULT_SETTINGS);
  });

  it('hands out copies that do not change the defaults', () => {
    const store = new InMemoryPreferenceStore();
    const first = getSettings(store);

    first.enabled = false;
    first.warnings.formDisabled = 'changed';

    expect(getSettings(store)).toEqual({
      enabled: true,
      offTheRecord: false,
      disableRequests: false,
      warnings: DEFAULT_WARNINGS,
    });
    expect(DEFAULT_SETTINGS.enabled).toBe(true);
    expect(DEFAULT_WARNINGS.formDisabled).toBe('This webpage has disabled automatic filling for this form.');
  });

  it('round-trips saved settings through the store', () => {
    const store = new InMemoryPreferenceStore();

    saveSettings(store, {
      enabled: false,
      offTheRecord: true,
      disableRequests: false,
      warnings: { formDisabled: '  ', insecureConnection: ' Use https to fill cards. ' },
    });

    expect(getSettings(store)).toEqual({
      enabled: false,
      offTheRecord: true,
      disableRequests: false,
      warnings: {
        formDisabled: DEFAULT_WARNINGS.formDisabled,
        insecureConnection: 'Use https to fill cards.',
      },
    });
  });

  it('stores settings under a namespaced key', () => {
    const store = new InMemoryPreferenceStore();

    saveSettings(store, { ...DEFAULT_SETTINGS, disableRequests: true });

    expect(store.get('settings:autofill')).toEqual({ ...DEFAULT_SETTINGS, disableRequests: true });
  });
});

describe('normalizeSettings', () => {
  it('falls back to defaults for non-object input', () => {
    expect(normalizeSettings('enabled')).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings(null)).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings([false])).toEqual(DEFAULT_SETTINGS);
  });

  it('only disables filling for an explicit false', () => {
    expect(normalizeSettings({ enabled: 'no' }).enabled).toBe(true);
    expect(normalizeSettings({ enabled: false }).enabled).toBe(false);
  });

  it('only turns on opt-in flags for an explicit true', () => {
    const settings = normalizeSettings({ offTheRecord: 'yes', disableRequests: 1 });

    expect(settings.offTheRecord).toBe(false);
    expect(settings.disableRequests).toBe(false);
  });

  it('keeps default warnings that were not overridden', () => {
    expect(normalizeSettings({ warnings: { formDisabled: 'Filling is off here.' } }).warnings).toEqual({
      formDisabled: 'Filling is off here.',
      insecureConnection: DEFAULT_WARNINGS.insecureConnection,
    });
  });
});
