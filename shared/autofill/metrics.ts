export type AutofillMetric =
  | 'field-submitted'
  | 'field-autofilled'
  | 'field-autofill-failed'
  | 'field-heuristic-type-unknown'
  | 'field-heuristic-type-match'
  | 'field-heuristic-type-mismatch'
  | 'field-server-type-unknown'
  | 'field-server-type-match'
  | 'field-server-type-mismatch'
  | 'query-response-received'
  | 'query-response-parsed'
  | 'query-response-rejected';

export interface MetricLogger {
  log(metric: AutofillMetric, experimentId: string): void;
}

export class ConsoleMetricLogger implements MetricLogger {
  log(metric: AutofillMetric, experimentId: string): void {
    console.debug('[autofill-metric]', metric, experimentId);
  }
}
