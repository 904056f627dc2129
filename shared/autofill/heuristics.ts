import type { FieldType } from './fieldTypes';
import type { FormField } from './types';

const AUTOCOMPLETE_TYPES: Record<string, FieldType> = {
  'given-name': 'name-first',
  'additional-name': 'name-middle',
  'family-name': 'name-last',
  name: 'name-full',
  email: 'email',
  organization: 'company',
  'address-line1': 'address-line1',
  'street-address': 'address-line1',
  'address-line2': 'address-line2',
  'address-level2': 'address-city',
  'address-level1': 'address-state',
  'postal-code': 'address-zip',
  country: 'address-country',
  'country-name': 'address-country',
  tel: 'phone-whole-number',
  'tel-national': 'phone-city-and-number',
  'tel-country-code': 'phone-country-code',
  'tel-area-code': 'phone-city-code',
  'tel-local': 'phone-number',
  'cc-name': 'cc-name',
  'cc-number': 'cc-number',
  'cc-exp': 'cc-exp-date-4-digit-year',
  'cc-exp-month': 'cc-exp-month',
  'cc-exp-year': 'cc-exp-4-digit-year',
  'cc-type': 'cc-type',
  'cc-csc': 'cc-verification-code',
};

// Order matters: more specific patterns come first.
const LABEL_PATTERNS: Array<[FieldType, RegExp]> = [
  ['cc-name', /(card\s*holder|name\s*on\s*(the\s*)?card|cc[-_\s]?name)/i],
  ['cc-number', /(card\s*number|card\s*#|cc[-_\s]?(num|number)|ccnumber)/i],
  ['cc-verification-code', /(cvc|cvv|csc|verification\s*code|security\s*code)/i],
  ['cc-exp-month', /(exp(iry|iration)?[-_\s]*month|cc[-_\s]?exp[-_\s]?month)/i],
  ['cc-exp-4-digit-year', /(exp(iry|iration)?[-_\s]*year|cc[-_\s]?exp[-_\s]?year)/i],
  ['cc-exp-date-4-digit-year', /(expiration|expiry|exp[-_\s]?date)/i],
  ['fax-whole-number', /fax/i],
  ['phone-whole-number', /(phone|mobile|telephone|^tel$)/i],
  ['email', /e[-_\s]?mail/i],
  ['company', /(company|organi[sz]ation|business)/i],
  ['address-line2', /(address[-_\s]*(line)?[-_\s]*2|apt|suite|unit)/i],
  ['address-line1', /(address|street)/i],
  ['address-city', /(city|town)/i],
  ['address-state', /(state|province|region|county)/i],
  ['address-zip', /(zip|postal|postcode)/i],
  ['address-country', /country/i],
  ['name-first', /(first[-_\s]*name|given[-_\s]*name|fname)/i],
  ['name-middle', /(middle[-_\s]*name|middle[-_\s]*initial|mname)/i],
  ['name-last', /(last[-_\s]*name|family[-_\s]*name|surname|lname)/i],
  ['name-full', /(full[-_\s]*name|your[-_\s]*name|^name$)/i],
];

export function classifyFromAutocomplete(token: string | undefined): FieldType | null {
  if (!token) {
    return null;
  }
  // Section and shipping/billing prefixes are ignored; the last token names the field.
  const parts = token.trim().toLowerCase().split(/\s+/).filter(Boolean);
  const last = parts[parts.length - 1];
  if (!last) {
    return null;
  }
  return Object.hasOwn(AUTOCOMPLETE_TYPES, last) ? AUTOCOMPLETE_TYPES[last] : null;
}

export function classifyFromText(text: string): FieldType | null {
  const normalized = text.trim();
  if (!normalized) {
    return null;
  }
  for (const [type, pattern] of LABEL_PATTERNS) {
    if (pattern.test(normalized)) {
      return type;
    }
  }
  return null;
}

/**
 * Default heuristic classification of one field: autocomplete token, then
 * label, then name attribute, then the control kind.
 */
export function classifyField(field: FormField): FieldType {
  const byAutocomplete = classifyFromAutocomplete(field.autocomplete);
  if (byAutocomplete) {
    return byAutocomplete;
  }
  const byLabel = classifyFromText(field.label);
  if (byLabel) {
    return byLabel;
  }
  const byName = classifyFromText(field.name);
  if (byName) {
    return byName;
  }
  if (field.kind === 'email') return 'email';
  if (field.kind === 'tel') return 'phone-whole-number';
  return 'unknown';
}
