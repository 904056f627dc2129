import type { FieldType } from './fieldTypes';
import type { ParsedForm } from './formStructure';
import { INVALID_UNIQUE_ID, type GuidIdTable } from './guidIds';
import { createInferredLabels } from './labels';
import { cardLastFourDigits, getCardFieldText, getProfileFieldText, maskedCardNumber } from './records';
import { emptySuggestionSet, type FormField, type PaymentCard, type Profile, type SuggestionSet } from './types';

const CARD_LABEL_PREFIX = '*';

export interface SuggestionGate {
  /** When set, the whole list collapses into one row showing this text. */
  warning: string | null;
  sectionAutofilled: boolean;
}

export function getProfileSuggestions(
  profiles: readonly Profile[],
  form: ParsedForm,
  field: FormField,
  type: FieldType,
  ids: GuidIdTable,
): SuggestionSet {
  const result = emptySuggestionSet();
  const matched: Profile[] = [];
  for (const profile of profiles) {
    const value = getProfileFieldText(profile, type);
    if (!value || !startsWithIgnoringCase(value, field.value)) {
      continue;
    }
    matched.push(profile);
    result.values.push(value);
    result.uniqueIds.push(ids.pack('', profile.guid));
  }

  const formTypes = form.fields.map((candidate) => candidate.effectiveType);
  result.labels = createInferredLabels(matched, formTypes, type);
  // Profile rows carry no icon.
  result.icons = result.values.map(() => '');
  return result;
}

export function getPaymentSuggestions(
  cards: readonly PaymentCard[],
  field: FormField,
  type: FieldType,
  ids: GuidIdTable,
): SuggestionSet {
  const result = emptySuggestionSet();
  for (const card of cards) {
    const value = getCardFieldText(card, type);
    if (!value || !startsWithIgnoringCase(value, field.value)) {
      continue;
    }
    result.values.push(type === 'cc-number' ? maskedCardNumber(card) : value);
    result.labels.push(`${CARD_LABEL_PREFIX}${cardLastFourDigits(card)}`);
    result.icons.push(card.brand);
    result.uniqueIds.push(ids.pack(card.guid, ''));
  }
  return result;
}

/** Drops rows whose (value, label) pair was already seen, keeping the first occurrence of each in place. */
export function removeDuplicateSuggestions(set: SuggestionSet): SuggestionSet {
  const seen = new Set<string>();
  const result = emptySuggestionSet();
  set.values.forEach((value, index) => {
    const key = JSON.stringify([value, set.labels[index]]);
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    result.values.push(value);
    result.labels.push(set.labels[index]);
    result.icons.push(set.icons[index]);
    result.uniqueIds.push(set.uniqueIds[index]);
  });
  return result;
}

export function warningSuggestion(message: string): SuggestionSet {
  return { values: [message], labels: [''], icons: [''], uniqueIds: [INVALID_UNIQUE_ID] };
}

/**
 * Final shaping of a non-empty query result. Once a section has been filled
 * the user is editing an accepted value, so labels and icons are dropped and
 * the list reads like plain autocomplete.
 */
export function gateSuggestions(set: SuggestionSet, gate: SuggestionGate): SuggestionSet {
  if (set.values.length === 0) {
    return set;
  }
  if (gate.warning !== null) {
    return warningSuggestion(gate.warning);
  }
  if (!gate.sectionAutofilled) {
    return removeDuplicateSuggestions(set);
  }
  return removeDuplicateSuggestions({
    values: set.values,
    labels: set.labels.map(() => ''),
    icons: set.icons.map(() => ''),
    uniqueIds: set.uniqueIds,
  });
}

function startsWithIgnoringCase(value: string, prefix: string): boolean {
  return value.toLowerCase().startsWith(prefix.toLowerCase());
}
