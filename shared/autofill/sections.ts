import { invariant } from '../errors';
import { fieldTypeGroup, isUnknownType, type FieldType } from './fieldTypes';
import type { ParsedForm } from './formStructure';
import type { FormField, SectionRange } from './types';

export interface FieldMatch {
  cachedIndex: number;
  liveIndex: number;
}

/**
 * Bounds of the logical section of `form` that contains the field at
 * `targetIndex`. A section holds only payment fields or only non-payment
 * fields, and never repeats a field type; phone and fax numbers may repeat
 * because forms routinely ask for more than one.
 *
 * The scan stops at the first boundary after the target field, so fields past
 * that point are never considered part of any section.
 */
export function findSectionBounds(form: ParsedForm, targetIndex: number, fillingPayment: boolean): SectionRange {
  let start = 0;
  let end = form.fieldCount;
  const seenTypes = new Set<FieldType>();
  let targetInSection = false;

  for (let index = 0; index < form.fieldCount; index += 1) {
    const type = form.fields[index].effectiveType;
    if (isUnknownType(type)) {
      continue;
    }

    const group = fieldTypeGroup(type);
    const repeated = group !== 'phone' && group !== 'fax' && seenTypes.has(type);
    const appropriate = (group === 'payment') === fillingPayment;

    if (repeated || !appropriate) {
      if (targetInSection) {
        end = index;
        break;
      }
      seenTypes.clear();
      if (!appropriate) {
        start = index + 1;
        continue;
      }
      start = index;
    }

    seenTypes.add(type);
    if (index === targetIndex) {
      targetInSection = true;
    }
  }

  invariant(
    targetInSection && targetIndex >= start && targetIndex < end,
    `Field ${targetIndex} is outside its own section [${start}, ${end})`,
  );
  return { start, end };
}

/**
 * Pairs live fields with cached fields inside `range`. The page may have
 * added or removed controls since the form was parsed, so each live field is
 * looked up by searching forward from the cached cursor; a live field with no
 * counterpart is skipped and neither cursor ever moves backwards.
 */
export function matchFieldsInSection(form: ParsedForm, live: readonly FormField[], range: SectionRange): FieldMatch[] {
  const matches: FieldMatch[] = [];
  let cursor = range.start;
  for (let liveIndex = 0; cursor < range.end && liveIndex < live.length; liveIndex += 1) {
    let probe = cursor;
    while (probe < range.end && !form.fields[probe].matches(live[liveIndex])) {
      probe += 1;
    }
    if (probe >= range.end) {
      continue;
    }
    matches.push({ cachedIndex: probe, liveIndex });
    cursor = probe + 1;
  }
  return matches;
}

/** True when every classified field of the section is already marked as filled on the page. */
export function sectionIsAutofilled(form: ParsedForm, live: readonly FormField[], range: SectionRange): boolean {
  const relevant = matchFieldsInSection(form, live, range).filter(
    (match) => form.fields[match.cachedIndex].group !== 'none',
  );
  return relevant.length > 0 && relevant.every((match) => live[match.liveIndex].isAutofilled);
}
