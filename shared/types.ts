export interface WarningMessages {
  formDisabled: string;
  insecureConnection: string;
}

export interface AutofillSettings {
  enabled: boolean;
  /** Private sessions never learn from submitted forms. */
  offTheRecord: boolean;
  /** Suppresses classification queries and uploads, e.g. in tests or offline hosts. */
  disableRequests: boolean;
  warnings: WarningMessages;
}

/** Synchronous key/value preference storage owned by the host. */
export interface PreferenceStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
}
