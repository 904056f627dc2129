import type { FieldType } from './fieldTypes';
import type { AutofillRecord, PaymentCard, Profile } from './types';

const CARD_MASK = '************';

export function getProfileFieldText(profile: Profile, type: FieldType): string {
  const stored = coerceText(profile.values[type]);
  if (stored) {
    return stored;
  }
  const { values } = profile;
  switch (type) {
    case 'name-full':
      return joinNonEmpty([values['name-first'], values['name-middle'], values['name-last']], ' ');
    case 'phone-city-and-number':
      return joinNonEmpty([values['phone-city-code'], values['phone-number']], '');
    case 'phone-whole-number':
      return joinNonEmpty([values['phone-country-code'], values['phone-city-code'], values['phone-number']], '');
    case 'fax-city-and-number':
      return joinNonEmpty([values['fax-city-code'], values['fax-number']], '');
    case 'fax-whole-number':
      return joinNonEmpty([values['fax-country-code'], values['fax-city-code'], values['fax-number']], '');
    default:
      return '';
  }
}

export function getCardFieldText(card: PaymentCard, type: FieldType): string {
  if (type === 'cc-exp-month') {
    return padMonth(coerceText(card.values['cc-exp-month']));
  }
  const stored = coerceText(card.values[type]);
  if (stored) {
    return stored;
  }
  switch (type) {
    case 'cc-exp-4-digit-year': {
      const shortYear = coerceText(card.values['cc-exp-2-digit-year']);
      return /^\d{2}$/.test(shortYear) ? `20${shortYear}` : '';
    }
    case 'cc-exp-2-digit-year': {
      const fullYear = coerceText(card.values['cc-exp-4-digit-year']);
      return /^\d{4}$/.test(fullYear) ? fullYear.slice(2) : '';
    }
    case 'cc-exp-date-2-digit-year':
      return expirationDate(card, 'cc-exp-2-digit-year');
    case 'cc-exp-date-4-digit-year':
      return expirationDate(card, 'cc-exp-4-digit-year');
    case 'cc-type':
      return card.brand;
    default:
      return '';
  }
}

export function getRecordFieldText(record: AutofillRecord, type: FieldType): string {
  return record.kind === 'profile' ? getProfileFieldText(record.profile, type) : getCardFieldText(record.card, type);
}

export function cardLastFourDigits(card: PaymentCard): string {
  const digits = coerceText(card.values['cc-number']).replace(/\D/g, '');
  return digits.length > 4 ? digits.slice(-4) : digits;
}

export function maskedCardNumber(card: PaymentCard): string {
  const lastFour = cardLastFourDigits(card);
  return lastFour ? `${CARD_MASK}${lastFour}` : '';
}

function expirationDate(card: PaymentCard, yearType: 'cc-exp-2-digit-year' | 'cc-exp-4-digit-year'): string {
  const month = getCardFieldText(card, 'cc-exp-month');
  const year = getCardFieldText(card, yearType);
  if (!month || !year) {
    return '';
  }
  return `${month}/${year}`;
}

function padMonth(value: string): string {
  if (!/^\d{1,2}$/.test(value)) {
    return value;
  }
  return value.length === 1 ? `0${value}` : value;
}

function joinNonEmpty(parts: Array<string | undefined>, separator: string): string {
  return parts
    .map((part) => coerceText(part))
    .filter(Boolean)
    .join(separator);
}

function coerceText(value: string | undefined): string {
  return typeof value === 'string' ? value.trim() : '';
}
