import type { FieldType } from './fieldTypes';

export type FieldKind =
  | 'text'
  | 'email'
  | 'tel'
  | 'number'
  | 'month'
  | 'select-one'
  | 'textarea'
  | 'checkbox'
  | 'password';

export interface SelectOption {
  value: string;
  label: string;
}

export interface FormField {
  name: string;
  label: string;
  value: string;
  kind: FieldKind;
  /** 0 means the control has no length limit. */
  maxLength: number;
  isAutofilled: boolean;
  autocomplete?: string;
  options?: SelectOption[];
}

export type FormMethod = 'GET' | 'POST';

export interface FormData {
  name: string;
  origin: string;
  action: string;
  method: FormMethod;
  fields: FormField[];
  userSubmitted: boolean;
}

export interface Profile {
  guid: string;
  values: Partial<Record<FieldType, string>>;
}

export interface PaymentCard {
  guid: string;
  brand: string;
  values: Partial<Record<FieldType, string>>;
}

export type AutofillRecord = { kind: 'profile'; profile: Profile } | { kind: 'payment'; card: PaymentCard };

export interface SuggestionSet {
  values: string[];
  labels: string[];
  icons: string[];
  uniqueIds: number[];
}

export interface SectionRange {
  start: number;
  end: number;
}

/** Compares the attributes that identify a control, ignoring its value and filled state. */
export function isSameField(a: FormField, b: FormField): boolean {
  return a.name === b.name && a.label === b.label && a.kind === b.kind && a.maxLength === b.maxLength;
}

export function isSameForm(a: Pick<FormData, 'name' | 'origin' | 'action'>, b: Pick<FormData, 'name' | 'origin' | 'action'>): boolean {
  return a.name === b.name && a.origin === b.origin && a.action === b.action;
}

export function emptySuggestionSet(): SuggestionSet {
  return { values: [], labels: [], icons: [], uniqueIds: [] };
}
