import { describe, expect, it } from 'vitest';
import { ParsedForm } from '../../../shared/autofill/formStructure';
import type { FormField } from '../../../shared/autofill/types';
import { InMemoryPersonalDataStore, detectCardBrand } from '../../../shared/storage/personalData';
import { ADA, ALAN, VISA, classifierFor, field, formData } from '../autofill/fixtures';

const classify = classifierFor({
  name: 'name-full',
  email: 'email',
  city: 'address-city',
  card: 'cc-number',
  month: 'cc-exp-month',
});

function submittedForm(values: Record<string, string>): ParsedForm {
  const fields: FormField[] = Object.entries(values).map(([name, value]) => field(name, { value }));
  return new ParsedForm(formData(fields), classify);
}

function sequentialGuids(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `guid-${next}`;
  };
}

describe('InMemoryPersonalDataStore.possibleFieldTypes', () => {
  const store = new InMemoryPersonalDataStore({ profiles: [ADA], paymentCards: [VISA] });

  it('reports empty values as empty', () => {
    expect([...store.possibleFieldTypes('  ')]).toEqual(['empty']);
  });

  it('matches stored values ignoring case and surrounding space', () => {
    expect([...store.possibleFieldTypes(' ADA@example.com ')]).toEqual(['email']);
    expect([...store.possibleFieldTypes('4111111111111111')]).toEqual(['cc-number']);
    expect([...store.possibleFieldTypes('04')]).toEqual(['cc-exp-month']);
  });

  it('reports every type that holds the value', () => {
    expect([...store.possibleFieldTypes('Ada Lovelace')]).toEqual(['name-full', 'cc-name']);
  });

  it('reports values it does not hold as unknown', () => {
    expect([...store.possibleFieldTypes('Nothing stored')]).toEqual(['unknown']);
  });
});

describe('InMemoryPersonalDataStore.importFormData', () => {
  it('imports a new profile and offers a new card without storing it', () => {
    const store = new InMemoryPersonalDataStore({ profiles: [ALAN], createGuid: sequentialGuids() });
    const form = submittedForm({
      name: 'Grace Hopper',
      email: 'grace@example.com',
      city: 'Arlington',
      card: '4242 4242 4242 4242',
      month: '12',
    });

    const result = store.importFormData([form]);

    expect(result).toEqual({
      imported: true,
      paymentCard: {
        guid: 'guid-2',
        brand: 'visa',
        values: { 'cc-number': '4242424242424242', 'cc-exp-month': '12' },
      },
    });
    expect(store.profiles()).toHaveLength(2);
    expect(store.profiles()[1]).toEqual({
      guid: 'guid-1',
      values: { 'name-full': 'Grace Hopper', email: 'grace@example.com', 'address-city': 'Arlington' },
    });
    expect(store.paymentCards()).toHaveLength(0);
  });

  it('does not import a profile it already holds', () => {
    const store = new InMemoryPersonalDataStore({ profiles: [ADA] });
    const form = submittedForm({ name: 'Ada Lovelace', email: 'ADA@example.com', city: 'London' });

    expect(store.importFormData([form])).toEqual({ imported: false, paymentCard: null });
    expect(store.profiles()).toHaveLength(1);
  });

  it('needs three identity values to import a profile', () => {
    const store = new InMemoryPersonalDataStore();
    const form = submittedForm({ name: 'Grace Hopper', email: 'grace@example.com', card: '' });

    expect(store.importFormData([form])).toEqual({ imported: false, paymentCard: null });
  });

  it('does not offer cards that are stored or not card numbers', () => {
    const store = new InMemoryPersonalDataStore({ paymentCards: [VISA] });

    expect(store.importFormData([submittedForm({ name: 'x', card: '4111-1111-1111-1111', month: '1' })])).toEqual({
      imported: false,
      paymentCard: null,
    });
    expect(store.importFormData([submittedForm({ name: 'x', card: '1234', month: '1' })]).paymentCard).toBeNull();
  });

  it('stores an accepted card once', () => {
    const store = new InMemoryPersonalDataStore({ createGuid: sequentialGuids() });
    const { paymentCard } = store.importFormData([submittedForm({ name: 'x', card: '5555555555554444', month: '3' })]);

    expect(paymentCard?.brand).toBe('mastercard');
    if (paymentCard) {
      store.saveImportedCard(paymentCard);
      store.saveImportedCard({ ...paymentCard, guid: 'other' });
    }

    expect(store.paymentCards()).toHaveLength(1);
    expect(store.paymentCards()[0].guid).toBe('guid-1');
  });
});

describe('detectCardBrand', () => {
  it.each([
    ['4111111111111111', 'visa'],
    ['5105105105105100', 'mastercard'],
    ['378282246310005', 'amex'],
    ['6011111111111117', 'discover'],
    ['3530111333300000', 'generic'],
  ])('detects %s as %s', (number, brand) => {
    expect(detectCardBrand(number)).toBe(brand);
  });
});
