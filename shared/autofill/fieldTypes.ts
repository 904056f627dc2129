export type NameFieldType = 'name-first' | 'name-middle' | 'name-last' | 'name-full';

export type AddressFieldType =
  | 'address-line1'
  | 'address-line2'
  | 'address-city'
  | 'address-state'
  | 'address-zip'
  | 'address-country';

export type PhoneFieldType =
  | 'phone-number'
  | 'phone-city-code'
  | 'phone-country-code'
  | 'phone-city-and-number'
  | 'phone-whole-number';

export type FaxFieldType =
  | 'fax-number'
  | 'fax-city-code'
  | 'fax-country-code'
  | 'fax-city-and-number'
  | 'fax-whole-number';

export type PaymentFieldType =
  | 'cc-name'
  | 'cc-number'
  | 'cc-exp-month'
  | 'cc-exp-2-digit-year'
  | 'cc-exp-4-digit-year'
  | 'cc-exp-date-2-digit-year'
  | 'cc-exp-date-4-digit-year'
  | 'cc-type'
  | 'cc-verification-code';

export type FieldType =
  | 'unknown'
  | 'empty'
  | NameFieldType
  | 'email'
  | 'company'
  | AddressFieldType
  | PhoneFieldType
  | FaxFieldType
  | PaymentFieldType;

export type FieldTypeGroup = 'identity' | 'payment' | 'phone' | 'fax' | 'none';

export type PhoneSubgroup = 'number' | 'city-code' | 'country-code' | 'city-and-number' | 'whole-number';

interface FieldTypeInfo {
  group: FieldTypeGroup;
  subgroup?: PhoneSubgroup;
}

const FIELD_TYPE_TABLE: Record<FieldType, FieldTypeInfo> = {
  unknown: { group: 'none' },
  empty: { group: 'none' },
  'name-first': { group: 'identity' },
  'name-middle': { group: 'identity' },
  'name-last': { group: 'identity' },
  'name-full': { group: 'identity' },
  email: { group: 'identity' },
  company: { group: 'identity' },
  'address-line1': { group: 'identity' },
  'address-line2': { group: 'identity' },
  'address-city': { group: 'identity' },
  'address-state': { group: 'identity' },
  'address-zip': { group: 'identity' },
  'address-country': { group: 'identity' },
  'phone-number': { group: 'phone', subgroup: 'number' },
  'phone-city-code': { group: 'phone', subgroup: 'city-code' },
  'phone-country-code': { group: 'phone', subgroup: 'country-code' },
  'phone-city-and-number': { group: 'phone', subgroup: 'city-and-number' },
  'phone-whole-number': { group: 'phone', subgroup: 'whole-number' },
  'fax-number': { group: 'fax', subgroup: 'number' },
  'fax-city-code': { group: 'fax', subgroup: 'city-code' },
  'fax-country-code': { group: 'fax', subgroup: 'country-code' },
  'fax-city-and-number': { group: 'fax', subgroup: 'city-and-number' },
  'fax-whole-number': { group: 'fax', subgroup: 'whole-number' },
  'cc-name': { group: 'payment' },
  'cc-number': { group: 'payment' },
  'cc-exp-month': { group: 'payment' },
  'cc-exp-2-digit-year': { group: 'payment' },
  'cc-exp-4-digit-year': { group: 'payment' },
  'cc-exp-date-2-digit-year': { group: 'payment' },
  'cc-exp-date-4-digit-year': { group: 'payment' },
  'cc-type': { group: 'payment' },
  'cc-verification-code': { group: 'payment' },
};

export const FIELD_TYPES: readonly FieldType[] = Object.keys(FIELD_TYPE_TABLE).filter(isFieldType);

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(FIELD_TYPE_TABLE, value);
}

export function fieldTypeGroup(type: FieldType): FieldTypeGroup {
  return FIELD_TYPE_TABLE[type].group;
}

export function phoneSubgroup(type: FieldType): PhoneSubgroup | undefined {
  return FIELD_TYPE_TABLE[type].subgroup;
}

export function isPaymentType(type: FieldType): boolean {
  return fieldTypeGroup(type) === 'payment';
}

/**
 * Types that carry no fillable data. These never take part in section
 * boundaries and are never written during a fill.
 */
export function isUnknownType(type: FieldType): boolean {
  return fieldTypeGroup(type) === 'none';
}

/** Server-predicted type wins over the heuristic one when present. */
export function resolveEffectiveType(heuristicType: FieldType, serverType: FieldType | null): FieldType {
  return serverType ?? heuristicType;
}
