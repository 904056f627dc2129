import type { AutofillSettings, PreferenceStore, WarningMessages } from '../types';

const SETTINGS_KEY = 'settings:autofill';

export const DEFAULT_WARNINGS: Readonly<WarningMessages> = Object.freeze({
  formDisabled: 'This webpage has disabled automatic filling for this form.',
  insecureConnection:
    'Automatic credit card filling is disabled because this form does not use a secure connection.',
});

export const DEFAULT_SETTINGS: Readonly<AutofillSettings> = Object.freeze({
  enabled: true,
  offTheRecord: false,
  disableRequests: false,
  warnings: DEFAULT_WARNINGS,
});

export class InMemoryPreferenceStore implements PreferenceStore {
  private readonly values = new Map<string, unknown>();

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }
}

export function getSettings(store: PreferenceStore): AutofillSettings {
  return normalizeSettings(store.get(SETTINGS_KEY));
}

export function saveSettings(store: PreferenceStore, settings: AutofillSettings): void {
  store.set(SETTINGS_KEY, normalizeSettings(settings));
}

export function normalizeSettings(raw: unknown): AutofillSettings {
  if (!isRecord(raw)) {
    return { ...DEFAULT_SETTINGS, warnings: { ...DEFAULT_WARNINGS } };
  }
  return {
    enabled: raw.enabled === false ? false : true,
    offTheRecord: raw.offTheRecord === true,
    disableRequests: raw.disableRequests === true,
    warnings: normalizeWarnings(raw.warnings),
  };
}

function normalizeWarnings(raw: unknown): WarningMessages {
  if (!isRecord(raw)) {
    return { ...DEFAULT_WARNINGS };
  }
  return {
    formDisabled: nonEmptyString(raw.formDisabled) ?? DEFAULT_WARNINGS.formDisabled,
    insecureConnection: nonEmptyString(raw.insecureConnection) ?? DEFAULT_WARNINGS.insecureConnection,
  };
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
