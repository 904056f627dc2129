import { invariant } from '../errors';
import type { FieldType } from './fieldTypes';
import type { ClassifiedField, ParsedForm } from './formStructure';
import type { MetricLogger } from './metrics';

export interface PossibleTypeSource {
  /** Every stored type whose value equals `value`; `empty` or `unknown` when nothing matches. */
  possibleFieldTypes(value: string): ReadonlySet<FieldType>;
}

export function determinePossibleFieldTypes(submitted: ParsedForm, source: PossibleTypeSource): void {
  submitted.fields.forEach((field, index) => {
    const types = source.possibleFieldTypes(field.field.value);
    invariant(types.size > 0, `No possible types reported for field "${field.field.name}"`);
    submitted.setPossibleTypes(index, types);
  });
}

/**
 * Compares what the user submitted against the types predicted for the cached
 * copy of the form. Select controls are skipped because their filled state is
 * not tracked reliably.
 */
export function logSubmittedFormMetrics(submitted: ParsedForm, cached: ParsedForm, logger: MetricLogger): void {
  const cachedBySignature = new Map<string, ClassifiedField>();
  for (const field of cached.fields) {
    cachedBySignature.set(field.signature, field);
  }

  const experimentId = cached.experimentId;
  for (const field of submitted.fields) {
    if (field.field.kind === 'select-one') {
      continue;
    }

    logger.log('field-submitted', experimentId);
    const types = field.possibleTypes;
    if (types.has('empty') || types.has('unknown')) {
      continue;
    }

    if (field.field.isAutofilled) {
      logger.log('field-autofilled', experimentId);
      continue;
    }
    logger.log('field-autofill-failed', experimentId);

    const prediction = cachedBySignature.get(field.signature);
    const heuristicType = prediction?.heuristicType ?? 'unknown';
    const serverType = prediction?.serverType ?? null;

    if (heuristicType === 'unknown') {
      logger.log('field-heuristic-type-unknown', experimentId);
    } else if (types.has(heuristicType)) {
      logger.log('field-heuristic-type-match', experimentId);
    } else {
      logger.log('field-heuristic-type-mismatch', experimentId);
    }

    if (serverType === null) {
      logger.log('field-server-type-unknown', experimentId);
    } else if (types.has(serverType)) {
      logger.log('field-server-type-match', experimentId);
    } else {
      logger.log('field-server-type-mismatch', experimentId);
    }
  }
}
