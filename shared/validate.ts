import Ajv, { type ErrorObject } from 'ajv';
import { ResponseValidationError } from './errors';
import { QUERY_RESPONSE_SCHEMA, type QueryResponse } from './schema/queryResponse';

const ajv = new Ajv({ allErrors: true });
const validateQueryResponseShape = ajv.compile<QueryResponse>(QUERY_RESPONSE_SCHEMA);

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: ResponseValidationError };

/** Parses the raw body of a classification query response. Never throws. */
export function parseQueryResponse(raw: string): ParseResult<QueryResponse> {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ResponseValidationError('Query response is not valid JSON.', [reason]) };
  }

  if (validateQueryResponseShape(payload)) {
    return { ok: true, value: payload };
  }
  return {
    ok: false,
    error: new ResponseValidationError(
      'Query response does not match the expected shape.',
      formatErrors(validateQueryResponseShape.errors),
    ),
  };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['Query response does not match the expected shape.'];
  }

  return errors.map((error) => {
    if (error.keyword === 'type' && !error.instancePath) {
      return 'Query response must be a JSON object.';
    }
    const where = describeLocation(error.instancePath);
    if (error.keyword === 'required') {
      return `${where}: missing ${String(error.params.missingProperty)}`;
    }
    return `${where}: ${error.message ?? 'invalid value'}`;
  });
}

/** Turns `/forms/0/fields/2/type` into `form 0 field 2 type`. */
function describeLocation(instancePath: string): string {
  const words: string[] = [];
  const segments = instancePath.split('/').filter(Boolean);
  for (let index = 0; index < segments.length; index += 1) {
    const segment = segments[index];
    const next = segments[index + 1];
    if ((segment === 'forms' || segment === 'fields') && next !== undefined && /^\d+$/.test(next)) {
      words.push(`${segment === 'forms' ? 'form' : 'field'} ${next}`);
      index += 1;
    } else {
      words.push(segment);
    }
  }
  return words.length > 0 ? words.join(' ') : 'response';
}
