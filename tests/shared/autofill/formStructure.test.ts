import { describe, expect, it } from 'vitest';
import {
  ParsedForm,
  computeFieldSignature,
  computeFormSignature,
  createFormParser,
} from '../../../shared/autofill/formStructure';
import { field, formData, parsedForm } from './fixtures';

const CONTACT = [field('name'), field('email'), field('city')];

describe('ParsedForm', () => {
  it('classifies fields with the default heuristics', () => {
    const form = new ParsedForm(
      formData([
        field('a', { label: 'Full name' }),
        field('b', { autocomplete: 'email' }),
        field('c', { label: 'Comments' }),
      ]),
    );

    expect(form.fields.map((candidate) => candidate.heuristicType)).toEqual(['name-full', 'email', 'unknown']);
    expect(form.autofillCount).toBe(2);
  });

  it('uses the classifier of the parser it was created by', () => {
    const parser = createFormParser(() => 'company');

    expect(parser.parse(formData(CONTACT)).fields.map((candidate) => candidate.effectiveType)).toEqual([
      'company',
      'company',
      'company',
    ]);
  });

  it('requires three fields and a non-search action before parsing', () => {
    expect(parsedForm([['name', 'name-full'], ['email', 'email']]).shouldBeParsed(false)).toBe(false);
    expect(
      parsedForm(
        [
          ['q', 'unknown'],
          ['name', 'name-full'],
          ['email', 'email'],
        ],
        { action: 'https://shop.example.com/search' },
      ).shouldBeParsed(false),
    ).toBe(false);
  });

  it('only accepts GET forms when POST is not required', () => {
    const form = parsedForm(
      [
        ['name', 'name-full'],
        ['email', 'email'],
        ['city', 'address-city'],
      ],
      { method: 'GET' },
    );

    expect(form.shouldBeParsed(false)).toBe(true);
    expect(form.shouldBeParsed(true)).toBe(false);
    expect(form.isAutofillable(false)).toBe(true);
    expect(form.isAutofillable(true)).toBe(false);
  });

  it('needs three classified fields to be autofillable', () => {
    const form = parsedForm([
      ['name', 'name-full'],
      ['email', 'email'],
      ['note', 'unknown'],
    ]);

    expect(form.shouldBeParsed(true)).toBe(true);
    expect(form.isAutofillable(true)).toBe(false);
  });

  it('treats only https origins as secure', () => {
    expect(parsedForm([['name', 'name-full']]).isSecure).toBe(true);
    expect(parsedForm([['name', 'name-full']], { origin: 'http://shop.example.com/' }).isSecure).toBe(false);
    expect(parsedForm([['name', 'name-full']], { origin: 'not a url' }).isSecure).toBe(false);
  });

  it('lets server predictions override the heuristic type', () => {
    const form = parsedForm([
      ['name', 'name-full'],
      ['email', 'email'],
      ['city', 'address-city'],
    ]);

    expect(form.applyServerTypes(['name-full', 'unknown', 'address-zip'])).toBe(true);
    expect(form.fields.map((candidate) => candidate.effectiveType)).toEqual(['name-full', 'unknown', 'address-zip']);
    expect(form.fields[1].heuristicType).toBe('email');
    expect(form.autofillCount).toBe(2);
  });

  it('ignores server predictions for a different number of fields', () => {
    const form = parsedForm([
      ['name', 'name-full'],
      ['email', 'email'],
      ['city', 'address-city'],
    ]);

    expect(form.applyServerTypes(['company'])).toBe(false);
    expect(form.fields.map((candidate) => candidate.serverType)).toEqual([null, null, null]);
  });

  it('finds cached fields regardless of their current value', () => {
    const form = parsedForm([
      ['name', 'name-full'],
      ['email', 'email'],
      ['city', 'address-city'],
    ]);

    const found = form.findField(field('email', { value: 'ada@example.com', isAutofilled: true }));

    expect(found).toBe(form.fields[1]);
    expect(found && form.indexOf(found)).toBe(1);
    expect(form.findField(field('email', { kind: 'email' }))).toBeUndefined();
  });

  it('identifies the page form by name, origin and action', () => {
    const form = parsedForm([['name', 'name-full']]);

    expect(form.matches(formData([]))).toBe(true);
    expect(form.matches(formData([], { name: 'signup' }))).toBe(false);
  });
});

describe('computeFormSignature', () => {
  it('is a stable decimal string', () => {
    const signature = computeFormSignature(formData(CONTACT));

    expect(signature).toMatch(/^\d+$/);
    expect(computeFormSignature(formData(CONTACT))).toBe(signature);
  });

  it('changes with the field names', () => {
    expect(computeFormSignature(formData(CONTACT))).not.toBe(
      computeFormSignature(formData([field('name'), field('email'), field('town')])),
    );
  });

  it('ignores values and the path of the action', () => {
    const filled = formData([field('name', { value: 'Ada' }), field('email'), field('city')], {
      action: 'https://shop.example.com/other',
    });

    expect(computeFormSignature(filled)).toBe(computeFormSignature(formData(CONTACT)));
  });

  it('falls back to the origin when the action is not a web URL', () => {
    const relative = formData(CONTACT, { action: '' });
    const script = formData(CONTACT, { action: 'javascript:void(0)' });

    expect(computeFormSignature(relative)).toBe(computeFormSignature(formData(CONTACT)));
    expect(computeFormSignature(script)).toBe(computeFormSignature(formData(CONTACT)));
  });
});

describe('computeFieldSignature', () => {
  it('depends on the name and kind only', () => {
    expect(computeFieldSignature(field('email', { value: 'ada@example.com' }))).toBe(
      computeFieldSignature(field('email')),
    );
    expect(computeFieldSignature(field('email', { kind: 'email' }))).not.toBe(computeFieldSignature(field('email')));
  });
});
