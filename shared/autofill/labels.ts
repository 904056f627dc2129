import { fieldTypeGroup, type FieldType } from './fieldTypes';
import { getProfileFieldText } from './records';
import type { Profile } from './types';

const LABEL_SEPARATOR = ', ';

const DEFAULT_LABEL_FIELDS: readonly FieldType[] = [
  'name-full',
  'address-line1',
  'address-line2',
  'address-city',
  'address-state',
  'address-zip',
  'address-country',
  'email',
  'phone-whole-number',
  'fax-whole-number',
  'company',
];

/**
 * Builds one label per profile from the field types the form asks for. Each
 * profile is labelled with its first `minimalFields` values; profiles that
 * would share a label also show every value that tells them apart.
 */
export function createInferredLabels(
  profiles: readonly Profile[],
  formTypes: readonly FieldType[],
  excludedType: FieldType,
  minimalFields = 1,
): string[] {
  const fields = selectLabelFields(formTypes, excludedType);
  const defaults = profiles.map((profile) => leadingValues(profile, fields, minimalFields));

  const labels = defaults.map((entry) => entry.join(LABEL_SEPARATOR));
  const groups = new Map<string, number[]>();
  labels.forEach((label, index) => {
    const members = groups.get(label) ?? [];
    members.push(index);
    groups.set(label, members);
  });

  for (const members of groups.values()) {
    if (members.length < 2) {
      continue;
    }
    const differing = fields.filter((type) => {
      const distinct = new Set(members.map((index) => getProfileFieldText(profiles[index], type)));
      return distinct.size > 1;
    });
    for (const index of members) {
      const profile = profiles[index];
      const shown = new Set(leadingFields(profile, fields, minimalFields));
      differing.forEach((type) => shown.add(type));
      labels[index] = fields
        .filter((type) => shown.has(type))
        .map((type) => getProfileFieldText(profile, type))
        .filter(Boolean)
        .join(LABEL_SEPARATOR);
    }
  }
  return labels;
}

function selectLabelFields(formTypes: readonly FieldType[], excludedType: FieldType): FieldType[] {
  const seen = new Set<FieldType>();
  const fields: FieldType[] = [];
  for (const type of formTypes) {
    const group = fieldTypeGroup(type);
    if (group === 'none' || group === 'payment' || type === excludedType || seen.has(type)) {
      continue;
    }
    seen.add(type);
    fields.push(type);
  }
  if (fields.length > 0) {
    return fields;
  }
  return DEFAULT_LABEL_FIELDS.filter((type) => type !== excludedType);
}

function leadingFields(profile: Profile, fields: readonly FieldType[], count: number): FieldType[] {
  return fields.filter((type) => getProfileFieldText(profile, type)).slice(0, count);
}

function leadingValues(profile: Profile, fields: readonly FieldType[], count: number): string[] {
  return leadingFields(profile, fields, count).map((type) => getProfileFieldText(profile, type));
}
