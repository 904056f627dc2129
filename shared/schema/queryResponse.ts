import { FIELD_TYPES, type FieldType } from '../autofill/fieldTypes';

export const QUERY_RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    experimentId: { type: 'string' },
    forms: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          signature: { type: 'string', minLength: 1 },
          fields: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                type: { enum: [...FIELD_TYPES] },
              },
              required: ['type'],
              additionalProperties: false,
            },
          },
        },
        required: ['signature', 'fields'],
        additionalProperties: false,
      },
    },
  },
  required: ['forms'],
  additionalProperties: false,
} as const;

export interface QueryResponseForm {
  signature: string;
  fields: Array<{ type: FieldType }>;
}

export interface QueryResponse {
  experimentId?: string;
  forms: QueryResponseForm[];
}
