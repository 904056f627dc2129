import { randomUUID } from 'node:crypto';
import { FIELD_TYPES, fieldTypeGroup, type FieldType } from '../autofill/fieldTypes';
import type { ParsedForm } from '../autofill/formStructure';
import { getCardFieldText, getProfileFieldText } from '../autofill/records';
import type { PossibleTypeSource } from '../autofill/submission';
import type { PaymentCard, Profile } from '../autofill/types';

/** Submitted forms need this many identity values before they become a profile. */
const MIN_IMPORTED_PROFILE_VALUES = 3;

export interface ImportResult {
  imported: boolean;
  /** A newly seen card; it is only stored once the user agrees to save it. */
  paymentCard: PaymentCard | null;
}

export interface PersonalDataStore extends PossibleTypeSource {
  profiles(): readonly Profile[];
  paymentCards(): readonly PaymentCard[];
  importFormData(forms: readonly ParsedForm[]): ImportResult;
  saveImportedCard(card: PaymentCard): void;
}

export interface InMemoryPersonalDataOptions {
  profiles?: Profile[];
  paymentCards?: PaymentCard[];
  createGuid?: () => string;
}

export class InMemoryPersonalDataStore implements PersonalDataStore {
  private readonly profileList: Profile[];
  private readonly cardList: PaymentCard[];
  private readonly createGuid: () => string;

  constructor(options: InMemoryPersonalDataOptions = {}) {
    this.profileList = [...(options.profiles ?? [])];
    this.cardList = [...(options.paymentCards ?? [])];
    this.createGuid = options.createGuid ?? randomUUID;
  }

  profiles(): readonly Profile[] {
    return this.profileList;
  }

  paymentCards(): readonly PaymentCard[] {
    return this.cardList;
  }

  addProfile(profile: Profile): void {
    this.profileList.push(profile);
  }

  addPaymentCard(card: PaymentCard): void {
    this.cardList.push(card);
  }

  possibleFieldTypes(value: string): ReadonlySet<FieldType> {
    const needle = normalize(value);
    if (!needle) {
      return new Set<FieldType>(['empty']);
    }
    const types = new Set<FieldType>();
    for (const type of FIELD_TYPES) {
      const group = fieldTypeGroup(type);
      if (group === 'none') {
        continue;
      }
      const matches =
        group === 'payment'
          ? this.cardList.some((card) => normalize(getCardFieldText(card, type)) === needle)
          : this.profileList.some((profile) => normalize(getProfileFieldText(profile, type)) === needle);
      if (matches) {
        types.add(type);
      }
    }
    if (types.size === 0) {
      types.add('unknown');
    }
    return types;
  }

  importFormData(forms: readonly ParsedForm[]): ImportResult {
    let imported = false;
    let paymentCard: PaymentCard | null = null;

    for (const form of forms) {
      const profileValues: Partial<Record<FieldType, string>> = {};
      const cardValues: Partial<Record<FieldType, string>> = {};
      for (const field of form.fields) {
        const value = field.field.value.trim();
        const group = field.group;
        if (!value || group === 'none') {
          continue;
        }
        if (group === 'payment') {
          cardValues[field.effectiveType] = value;
        } else {
          profileValues[field.effectiveType] = value;
        }
      }

      if (Object.keys(profileValues).length >= MIN_IMPORTED_PROFILE_VALUES && !this.hasProfile(profileValues)) {
        this.profileList.push({ guid: this.createGuid(), values: profileValues });
        imported = true;
      }

      const number = (cardValues['cc-number'] ?? '').replace(/[\s-]/g, '');
      if (/^\d{12,19}$/.test(number) && !this.cardList.some((card) => digitsOf(card) === number)) {
        paymentCard = {
          guid: this.createGuid(),
          brand: detectCardBrand(number),
          values: { ...cardValues, 'cc-number': number },
        };
        imported = true;
      }
    }

    return { imported, paymentCard };
  }

  saveImportedCard(card: PaymentCard): void {
    const number = digitsOf(card);
    if (this.cardList.some((existing) => digitsOf(existing) === number)) {
      return;
    }
    this.cardList.push(card);
  }

  private hasProfile(values: Partial<Record<FieldType, string>>): boolean {
    const types = FIELD_TYPES.filter((type) => values[type] !== undefined);
    return this.profileList.some((profile) =>
      types.every((type) => normalize(getProfileFieldText(profile, type)) === normalize(values[type] ?? '')),
    );
  }
}

export function detectCardBrand(number: string): string {
  if (/^4/.test(number)) return 'visa';
  if (/^5[1-5]/.test(number)) return 'mastercard';
  if (/^3[47]/.test(number)) return 'amex';
  if (/^(6011|65)/.test(number)) return 'discover';
  return 'generic';
}

function digitsOf(card: PaymentCard): string {
  return (card.values['cc-number'] ?? '').replace(/\D/g, '');
}

function normalize(value: string): string {
  return value.trim().toLowerCase();
}
