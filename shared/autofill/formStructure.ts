import { createHash } from 'node:crypto';
import { classifyField } from './heuristics';
import { fieldTypeGroup, resolveEffectiveType, type FieldType, type FieldTypeGroup } from './fieldTypes';
import { isSameField, isSameForm, type FormData, type FormField } from './types';

/** Forms with fewer fields (or fewer classified fields) are never offered for filling. */
export const REQUIRED_FILLABLE_FIELDS = 3;

export type FieldClassifier = (field: FormField, index: number, form: FormData) => FieldType;

export class ClassifiedField {
  readonly field: FormField;
  readonly heuristicType: FieldType;
  serverType: FieldType | null = null;
  possibleTypes: ReadonlySet<FieldType> = new Set();

  constructor(field: FormField, heuristicType: FieldType) {
    this.field = field;
    this.heuristicType = heuristicType;
  }

  get effectiveType(): FieldType {
    return resolveEffectiveType(this.heuristicType, this.serverType);
  }

  get group(): FieldTypeGroup {
    return fieldTypeGroup(this.effectiveType);
  }

  get signature(): string {
    return computeFieldSignature(this.field);
  }

  matches(field: FormField): boolean {
    return isSameField(this.field, field);
  }
}

export class ParsedForm {
  readonly source: FormData;
  readonly fields: ClassifiedField[];
  readonly signature: string;
  experimentId = '';

  constructor(source: FormData, classify: FieldClassifier = classifyField) {
    this.source = source;
    this.fields = source.fields.map((field, index) => new ClassifiedField(field, classify(field, index, source)));
    this.signature = computeFormSignature(source);
  }

  get fieldCount(): number {
    return this.fields.length;
  }

  get autofillCount(): number {
    return this.fields.filter((field) => field.group !== 'none').length;
  }

  get isSecure(): boolean {
    return parseUrl(this.source.origin)?.protocol === 'https:';
  }

  shouldBeParsed(requirePost: boolean): boolean {
    if (this.fieldCount < REQUIRED_FILLABLE_FIELDS) {
      return false;
    }
    // Search boxes such as https://example.com/search?q= are not worth filling.
    if (parseUrl(this.source.action)?.pathname === '/search') {
      return false;
    }
    return !requirePost || this.source.method === 'POST';
  }

  isAutofillable(requirePost: boolean): boolean {
    if (this.autofillCount < REQUIRED_FILLABLE_FIELDS) {
      return false;
    }
    return this.shouldBeParsed(requirePost);
  }

  matches(form: Pick<FormData, 'name' | 'origin' | 'action'>): boolean {
    return isSameForm(this.source, form);
  }

  findField(field: FormField): ClassifiedField | undefined {
    return this.fields.find((candidate) => candidate.matches(field));
  }

  indexOf(field: ClassifiedField): number {
    return this.fields.indexOf(field);
  }

  setPossibleTypes(index: number, types: ReadonlySet<FieldType>): void {
    const target = this.fields[index];
    if (target) {
      target.possibleTypes = types;
    }
  }

  /** Applies server predictions in field order; a count mismatch leaves the form untouched. */
  applyServerTypes(types: readonly FieldType[]): boolean {
    if (types.length !== this.fields.length) {
      return false;
    }
    types.forEach((type, index) => {
      this.fields[index].serverType = type;
    });
    return true;
  }
}

export interface FormParser {
  parse(form: FormData): ParsedForm;
}

export function createFormParser(classify: FieldClassifier = classifyField): FormParser {
  return {
    parse: (form) => new ParsedForm(form, classify),
  };
}

/**
 * 64-bit signature over the form's host, name and field names, printed as a
 * decimal string. The action URL is preferred; the origin is used when the
 * action is not an absolute http(s) URL.
 */
export function computeFormSignature(form: FormData): string {
  const target = parseUrl(form.action);
  const base = target && isWebUrl(target) ? target : parseUrl(form.origin);
  const scheme = base ? base.protocol.replace(/:$/, '') : '';
  const host = base ? base.hostname : '';
  const fieldNames = form.fields.map((field) => `&${field.name}`).join('');
  const digest = createHash('sha1').update(`${scheme}://${host}&${form.name}${fieldNames}`).digest();
  return digest.readBigUInt64BE(0).toString(10);
}

export function computeFieldSignature(field: FormField): string {
  const digest = createHash('sha1').update(`${field.name}&${field.kind}`).digest();
  return digest.readUInt32BE(0).toString(10);
}

function isWebUrl(url: URL): boolean {
  return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
}

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}
