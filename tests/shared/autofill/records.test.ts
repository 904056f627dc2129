import { describe, expect, it } from 'vitest';
import {
  cardLastFourDigits,
  getCardFieldText,
  getProfileFieldText,
  maskedCardNumber,
} from '../../../shared/autofill/records';
import type { PaymentCard, Profile } from '../../../shared/autofill/types';
import { VISA } from './fixtures';

describe('getProfileFieldText', () => {
  const profile: Profile = {
    guid: 'parts',
    values: {
      'name-first': 'Ada',
      'name-middle': ' ',
      'name-last': 'Lovelace',
      'phone-country-code': '1',
      'phone-city-code': '650',
      'phone-number': '5551234',
      company: '  Analytical Engines  ',
    },
  };

  it('returns stored values trimmed', () => {
    expect(getProfileFieldText(profile, 'company')).toBe('Analytical Engines');
  });

  it('derives the full name from its parts', () => {
    expect(getProfileFieldText(profile, 'name-full')).toBe('Ada Lovelace');
  });

  it('derives composite phone numbers', () => {
    expect(getProfileFieldText(profile, 'phone-city-and-number')).toBe('6505551234');
    expect(getProfileFieldText(profile, 'phone-whole-number')).toBe('16505551234');
    expect(getProfileFieldText(profile, 'fax-whole-number')).toBe('');
  });
});

describe('getCardFieldText', () => {
  it('pads the expiry month to two digits', () => {
    expect(getCardFieldText(VISA, 'cc-exp-month')).toBe('04');
  });

  it('converts between two- and four-digit years', () => {
    const shortYear: PaymentCard = { guid: 'short', brand: 'visa', values: { 'cc-exp-2-digit-year': '31' } };

    expect(getCardFieldText(shortYear, 'cc-exp-4-digit-year')).toBe('2031');
    expect(getCardFieldText(VISA, 'cc-exp-2-digit-year')).toBe('30');
  });

  it('formats expiry dates', () => {
    expect(getCardFieldText(VISA, 'cc-exp-date-2-digit-year')).toBe('04/30');
    expect(getCardFieldText(VISA, 'cc-exp-date-4-digit-year')).toBe('04/2030');
  });

  it('reports the brand as the card type', () => {
    expect(getCardFieldText(VISA, 'cc-type')).toBe('visa');
  });
});

describe('card number masking', () => {
  it('keeps only the last four digits', () => {
    const spaced: PaymentCard = { guid: 'spaced', brand: 'amex', values: { 'cc-number': '3782 822463 10005' } };

    expect(cardLastFourDigits(spaced)).toBe('0005');
    expect(maskedCardNumber(VISA)).toBe('************1111');
  });

  it('masks nothing when the card has no number', () => {
    expect(maskedCardNumber({ guid: 'blank', brand: 'generic', values: {} })).toBe('');
  });
});
