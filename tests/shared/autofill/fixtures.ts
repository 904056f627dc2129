import type { FieldType } from '../../../shared/autofill/fieldTypes';
import { ParsedForm, type FieldClassifier } from '../../../shared/autofill/formStructure';
import type { FormData, FormField, PaymentCard, Profile } from '../../../shared/autofill/types';

export function field(name: string, overrides: Partial<FormField> = {}): FormField {
  return {
    name,
    label: '',
    value: '',
    kind: 'text',
    maxLength: 0,
    isAutofilled: false,
    ...overrides,
  };
}

export function formData(fields: FormField[], overrides: Partial<FormData> = {}): FormData {
  return {
    name: 'checkout',
    origin: 'https://shop.example.com/checkout',
    action: 'https://shop.example.com/submit',
    method: 'POST',
    fields,
    userSubmitted: true,
    ...overrides,
  };
}

export function classifierFor(types: Record<string, FieldType>): FieldClassifier {
  return (candidate) => types[candidate.name] ?? 'unknown';
}

/** Builds a parsed form whose fields are named after the given entries and classified as listed. */
export function parsedForm(entries: Array<[string, FieldType]>, overrides: Partial<FormData> = {}): ParsedForm {
  const types = Object.fromEntries(entries);
  return new ParsedForm(
    formData(
      entries.map(([name]) => field(name)),
      overrides,
    ),
    classifierFor(types),
  );
}

export const ADA: Profile = {
  guid: 'profile-ada',
  values: {
    'name-full': 'Ada Lovelace',
    email: 'ada@example.com',
    'address-city': 'London',
    'address-zip': 'NW1',
    'phone-number': '5551234',
  },
};

export const ALAN: Profile = {
  guid: 'profile-alan',
  values: {
    'name-full': 'Alan Turing',
    email: 'alan@example.com',
    'address-city': 'Wilmslow',
  },
};

export const VISA: PaymentCard = {
  guid: 'card-visa',
  brand: 'visa',
  values: {
    'cc-name': 'Ada Lovelace',
    'cc-number': '4111111111111111',
    'cc-exp-month': '4',
    'cc-exp-4-digit-year': '2030',
  },
};

export const MASTERCARD: PaymentCard = {
  guid: 'card-mastercard',
  brand: 'mastercard',
  values: {
    'cc-name': 'Ada L',
    'cc-number': '5555555555554444',
  },
};
