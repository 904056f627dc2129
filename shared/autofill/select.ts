import type { FieldType } from './fieldTypes';
import type { FormField, SelectOption } from './types';

/** Picks the option of a single-select control that represents `value`; returns `null` when none does. */
export type SelectControlFiller = (field: FormField, value: string, type: FieldType) => string | null;

const NUMERIC_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
  'cc-exp-month',
  'cc-exp-2-digit-year',
  'cc-exp-4-digit-year',
]);

export const fillSelectControl: SelectControlFiller = (field, value, type) => {
  const options = field.options ?? [];
  const target = normalize(value);
  if (!target || options.length === 0) {
    return null;
  }

  const direct = options.find((option) => normalize(option.label) === target || normalize(option.value) === target);
  if (direct) {
    return direct.value;
  }

  if (NUMERIC_TYPES.has(type)) {
    const numeric = findNumericOption(options, target);
    if (numeric) {
      return numeric.value;
    }
  }
  return null;
};

function findNumericOption(options: readonly SelectOption[], target: string): SelectOption | undefined {
  if (!/^\d+$/.test(target)) {
    return undefined;
  }
  const wanted = Number.parseInt(target, 10);
  return options.find((option) => {
    const candidate = normalize(option.value) || normalize(option.label);
    return /^\d+$/.test(candidate) && Number.parseInt(candidate, 10) === wanted;
  });
}

function normalize(value: string): string {
  return value.trim().toLowerCase();
}
