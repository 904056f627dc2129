import { invariant } from '../errors';
import { isPaymentType, phoneSubgroup, type FieldType } from './fieldTypes';
import type { ClassifiedField, ParsedForm } from './formStructure';
import { getCardFieldText, getRecordFieldText } from './records';
import { matchFieldsInSection, sectionIsAutofilled } from './sections';
import { fillSelectControl, type SelectControlFiller } from './select';
import { isSameField, type AutofillRecord, type FormData, type FormField, type SectionRange } from './types';

/** Local numbers are stored as a 3-digit exchange followed by a 4-digit line. */
export const PHONE_PREFIX_OFFSET = 0;
export const PHONE_PREFIX_LENGTH = 3;
export const PHONE_SUFFIX_OFFSET = 3;
export const PHONE_SUFFIX_LENGTH = 4;

type FillTarget = { kind: 'select' } | { kind: 'month' } | { kind: 'phone' } | { kind: 'plain' };

export interface SectionFillRequest {
  form: ParsedForm;
  live: FormData;
  /** Live field the user started the fill from. */
  field: FormField;
  target: ClassifiedField;
  range: SectionRange;
  record: AutofillRecord;
  selectFiller?: SelectControlFiller;
}

export interface SectionFillResult {
  form: FormData;
  /** False when only the initiating field was written because its section was already filled. */
  filledSection: boolean;
}

export function fillSection(request: SectionFillRequest): SectionFillResult {
  const { form, live, range, record } = request;
  const selectFiller = request.selectFiller ?? fillSelectControl;
  const fields = [...live.fields];

  if (sectionIsAutofilled(form, live.fields, range)) {
    const index = fields.findIndex((candidate) => isSameField(candidate, request.field));
    if (index >= 0) {
      fields[index] = fillFormField(record, request.target.effectiveType, fields[index], selectFiller);
    }
    return { form: { ...live, fields }, filledSection: false };
  }

  for (const match of matchFieldsInSection(form, live.fields, range)) {
    const cached = form.fields[match.cachedIndex];
    if (cached.group === 'none') {
      continue;
    }
    fields[match.liveIndex] = fillFormField(record, cached.effectiveType, fields[match.liveIndex], selectFiller);
  }
  return { form: { ...live, fields }, filledSection: true };
}

export function fillFormField(
  record: AutofillRecord,
  type: FieldType,
  field: FormField,
  selectFiller: SelectControlFiller = fillSelectControl,
): FormField {
  invariant(
    isPaymentType(type) === (record.kind === 'payment'),
    `Cannot fill a ${type} field from a ${record.kind} record`,
  );

  const target = resolveFillTarget(record, type, field);
  switch (target.kind) {
    case 'select': {
      const chosen = selectFiller(field, getRecordFieldText(record, type), type);
      return chosen === null ? field : withValue(field, chosen);
    }
    case 'month': {
      if (record.kind !== 'payment') {
        return field;
      }
      const year = getCardFieldText(record.card, 'cc-exp-4-digit-year');
      const month = getCardFieldText(record.card, 'cc-exp-month');
      return year && month ? withValue(field, `${year}-${month}`) : field;
    }
    case 'phone':
      return withValue(field, splitPhoneNumber(getRecordFieldText(record, type), field.maxLength));
    case 'plain':
      return withValue(field, getRecordFieldText(record, type));
  }
}

/**
 * Forms sometimes split a local number over two inputs. A stored number of
 * exactly prefix + suffix length is cut to the part whose length matches the
 * input's limit; anything else is written whole.
 */
export function splitPhoneNumber(number: string, maxLength: number): string {
  if (number.length !== PHONE_PREFIX_LENGTH + PHONE_SUFFIX_LENGTH) {
    return number;
  }
  if (maxLength === PHONE_PREFIX_LENGTH) {
    return number.slice(PHONE_PREFIX_OFFSET, PHONE_PREFIX_OFFSET + PHONE_PREFIX_LENGTH);
  }
  if (maxLength === PHONE_SUFFIX_LENGTH) {
    return number.slice(PHONE_SUFFIX_OFFSET, PHONE_SUFFIX_OFFSET + PHONE_SUFFIX_LENGTH);
  }
  return number;
}

function resolveFillTarget(record: AutofillRecord, type: FieldType, field: FormField): FillTarget {
  if (record.kind === 'profile') {
    if (phoneSubgroup(type) === 'number') {
      return { kind: 'phone' };
    }
    return field.kind === 'select-one' ? { kind: 'select' } : { kind: 'plain' };
  }
  if (field.kind === 'select-one') {
    return { kind: 'select' };
  }
  return field.kind === 'month' ? { kind: 'month' } : { kind: 'plain' };
}

function withValue(field: FormField, value: string): FormField {
  return { ...field, value, isAutofilled: true };
}
