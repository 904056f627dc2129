import { RequestFailedError } from '../errors';
import type { QueryResponse } from '../schema/queryResponse';
import { parseQueryResponse } from '../validate';
import type { ParsedForm } from './formStructure';
import type { MetricLogger } from './metrics';
import { RecentSignatures } from './recentSignatures';

/**
 * Transport for the remote classification service. Query responses are
 * returned as the raw response body.
 */
export interface ClassificationRequester {
  startQueryRequest(forms: readonly ParsedForm[]): Promise<string>;
  startUploadRequest(form: ParsedForm, wasRecentlyAutofilled: boolean): Promise<void>;
}

export type RequestState = 'idle' | 'in-flight';

export interface RequestSchedulerOptions {
  requester: ClassificationRequester;
  metricLogger: MetricLogger;
  recent?: RecentSignatures;
}

/**
 * Dispatches classification queries and uploads without waiting on them.
 * Responses only inform the cache, so a failed or malformed one is logged
 * and dropped.
 */
export class RequestScheduler {
  readonly recent: RecentSignatures;
  private readonly requester: ClassificationRequester;
  private readonly metricLogger: MetricLogger;
  private pendingQueries = 0;
  private pendingUploads = 0;

  constructor(options: RequestSchedulerOptions) {
    this.requester = options.requester;
    this.metricLogger = options.metricLogger;
    this.recent = options.recent ?? new RecentSignatures();
  }

  get queryState(): RequestState {
    return this.pendingQueries > 0 ? 'in-flight' : 'idle';
  }

  get uploadState(): RequestState {
    return this.pendingUploads > 0 ? 'in-flight' : 'idle';
  }

  startQuery(forms: readonly ParsedForm[], onResponse: (response: QueryResponse) => void): Promise<void> {
    if (forms.length === 0) {
      return Promise.resolve();
    }
    this.pendingQueries += 1;
    return this.requester
      .startQueryRequest(forms)
      .then((raw) => {
        this.metricLogger.log('query-response-received', '');
        const parsed = parseQueryResponse(raw);
        if (!parsed.ok) {
          this.metricLogger.log('query-response-rejected', '');
          console.warn('Dropping malformed classification response.', parsed.error.errors);
          return;
        }
        this.metricLogger.log('query-response-parsed', parsed.value.experimentId ?? '');
        onResponse(parsed.value);
      })
      .catch((error: unknown) => {
        console.warn('Classification query failed.', new RequestFailedError('query', 'Query request failed', error));
      })
      .finally(() => {
        this.pendingQueries -= 1;
      });
  }

  startUpload(form: ParsedForm): Promise<void> {
    const wasRecentlyAutofilled = this.recent.contains(form.signature);
    this.pendingUploads += 1;
    return this.requester
      .startUploadRequest(form, wasRecentlyAutofilled)
      .catch((error: unknown) => {
        console.warn('Classification upload failed.', new RequestFailedError('upload', 'Upload request failed', error));
      })
      .finally(() => {
        this.pendingUploads -= 1;
      });
  }

  recordAutofilled(signature: string): void {
    this.recent.push(signature);
  }
}
