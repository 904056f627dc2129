import type { QueryResponse } from '../schema/queryResponse';
import { getSettings } from '../storage/settings';
import type { PersonalDataStore } from '../storage/personalData';
import type { AutofillSettings, PreferenceStore } from '../types';
import { isPaymentType, isUnknownType } from './fieldTypes';
import { fillSection } from './fill';
import { createFormParser, type ClassifiedField, type FormParser, type ParsedForm } from './formStructure';
import { GuidIdTable, INVALID_UNIQUE_ID } from './guidIds';
import { ConsoleMetricLogger, type MetricLogger } from './metrics';
import { RequestScheduler, type ClassificationRequester } from './scheduler';
import { findSectionBounds, sectionIsAutofilled } from './sections';
import type { SelectControlFiller } from './select';
import { determinePossibleFieldTypes, logSubmittedFormMetrics } from './submission';
import { gateSuggestions, getPaymentSuggestions, getProfileSuggestions } from './suggestions';
import {
  emptySuggestionSet,
  type AutofillRecord,
  type FormData,
  type FormField,
  type PaymentCard,
  type SuggestionSet,
} from './types';

/** Asks the user whether a card typed into a submitted form should be stored. */
export interface CardImportPrompt {
  offerToSave(card: PaymentCard): Promise<boolean>;
}

export interface AutofillObserver {
  onDidFill?(form: FormData): void;
  onDidShowSuggestions?(suggestions: SuggestionSet): void;
}

export interface AutofillManagerOptions {
  personalData: PersonalDataStore;
  preferences: PreferenceStore;
  requester: ClassificationRequester;
  metricLogger?: MetricLogger;
  parser?: FormParser;
  ids?: GuidIdTable;
  cardImportPrompt?: CardImportPrompt;
  selectFiller?: SelectControlFiller;
  observer?: AutofillObserver;
}

interface CachedFormAndField {
  form: ParsedForm;
  field: ClassifiedField;
}

/**
 * Handles the autofill events of one page. Events are processed one at a
 * time; classification responses come back later and are matched against
 * whatever is still cached at that point.
 */
export class AutofillManager {
  readonly ids: GuidIdTable;
  readonly scheduler: RequestScheduler;
  private readonly personalData: PersonalDataStore;
  private readonly preferences: PreferenceStore;
  private readonly metricLogger: MetricLogger;
  private readonly parser: FormParser;
  private readonly cardImportPrompt?: CardImportPrompt;
  private readonly selectFiller?: SelectControlFiller;
  private readonly observer?: AutofillObserver;
  private readonly pending = new Set<Promise<void>>();
  private forms: ParsedForm[] = [];
  // Bumped on navigation so that responses to earlier queries are recognised as stale.
  private generation = 0;

  constructor(options: AutofillManagerOptions) {
    this.personalData = options.personalData;
    this.preferences = options.preferences;
    this.metricLogger = options.metricLogger ?? new ConsoleMetricLogger();
    this.parser = options.parser ?? createFormParser();
    this.ids = options.ids ?? new GuidIdTable();
    this.cardImportPrompt = options.cardImportPrompt;
    this.selectFiller = options.selectFiller;
    this.observer = options.observer;
    this.scheduler = new RequestScheduler({ requester: options.requester, metricLogger: this.metricLogger });
  }

  get cachedForms(): readonly ParsedForm[] {
    return this.forms;
  }

  onFormsSeen(forms: readonly FormData[]): void {
    const settings = this.settings();
    if (!settings.enabled) {
      return;
    }

    const queryable: ParsedForm[] = [];
    const others: ParsedForm[] = [];
    for (const form of forms) {
      const parsed = this.parser.parse(form);
      if (!parsed.shouldBeParsed(false)) {
        continue;
      }
      // GET forms are cached but never sent to the classification service.
      if (parsed.shouldBeParsed(true)) {
        queryable.push(parsed);
      } else {
        others.push(parsed);
      }
    }

    this.forms.push(...queryable, ...others);
    if (queryable.length > 0 && !settings.disableRequests) {
      const generation = this.generation;
      this.track(this.scheduler.startQuery(queryable, (response) => this.applyQueryResponse(response, generation)));
    }
  }

  onQueryFormField(form: FormData, field: FormField): SuggestionSet {
    const settings = this.settings();
    const profiles = this.personalData.profiles();
    const cards = this.personalData.paymentCards();
    if (profiles.length === 0 && cards.length === 0) {
      return emptySuggestionSet();
    }

    const cached = this.findCachedFormAndField(form, field);
    if (!cached || !cached.form.isAutofillable(false)) {
      return emptySuggestionSet();
    }

    const type = cached.field.effectiveType;
    const fillingPayment = isPaymentType(type);
    const candidates = fillingPayment
      ? getPaymentSuggestions(cards, field, type, this.ids)
      : getProfileSuggestions(profiles, cached.form, field, type, this.ids);
    if (candidates.values.length === 0) {
      return candidates;
    }

    const warning = this.warningFor(settings, cached.form, fillingPayment);
    const sectionAutofilled =
      warning === null &&
      sectionIsAutofilled(
        cached.form,
        form.fields,
        findSectionBounds(cached.form, cached.form.indexOf(cached.field), fillingPayment),
      );

    const suggestions = gateSuggestions(candidates, { warning, sectionAutofilled });
    this.observer?.onDidShowSuggestions?.(suggestions);
    return suggestions;
  }

  onFillFormData(form: FormData, field: FormField, uniqueId: number): FormData | null {
    if (uniqueId === INVALID_UNIQUE_ID || uniqueId === 0 || !this.settings().enabled) {
      return null;
    }
    const cached = this.findCachedFormAndField(form, field);
    if (!cached) {
      return null;
    }

    const record = this.findRecord(uniqueId);
    const type = cached.field.effectiveType;
    if (!record || isUnknownType(type) || isPaymentType(type) !== (record.kind === 'payment')) {
      return null;
    }

    const range = findSectionBounds(cached.form, cached.form.indexOf(cached.field), record.kind === 'payment');
    const result = fillSection({
      form: cached.form,
      live: form,
      field,
      target: cached.field,
      range,
      record,
      selectFiller: this.selectFiller,
    });
    if (result.filledSection) {
      this.scheduler.recordAutofilled(cached.form.signature);
    }
    this.observer?.onDidFill?.(result.form);
    return result.form;
  }

  onFormSubmitted(form: FormData): void {
    const settings = this.settings();
    if (!settings.enabled || settings.offTheRecord || !form.userSubmitted) {
      return;
    }

    const submitted = this.parser.parse(form);
    if (!submitted.shouldBeParsed(true)) {
      return;
    }

    determinePossibleFieldTypes(submitted, this.personalData);
    const cached = this.findCachedForm(form);
    if (cached) {
      logSubmittedFormMetrics(submitted, cached, this.metricLogger);
    } else {
      console.warn('Submitted form was never seen; skipping quality metrics.', form.name);
    }

    if (!settings.disableRequests) {
      this.track(this.scheduler.startUpload(submitted));
    }

    if (submitted.isAutofillable(true)) {
      this.importFormData(submitted);
    }
  }

  onNavigationCommitted(): void {
    this.forms = [];
    this.generation += 1;
  }

  /** Resolves once every request and prompt started so far has completed. */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private settings(): AutofillSettings {
    return getSettings(this.preferences);
  }

  private warningFor(settings: AutofillSettings, form: ParsedForm, fillingPayment: boolean): string | null {
    if (!settings.enabled || !form.isAutofillable(true)) {
      return settings.warnings.formDisabled;
    }
    if (fillingPayment && !form.isSecure) {
      return settings.warnings.insecureConnection;
    }
    return null;
  }

  private applyQueryResponse(response: QueryResponse, generation: number): void {
    if (generation !== this.generation) {
      return;
    }
    for (const entry of response.forms) {
      const types = entry.fields.map((field) => field.type);
      for (const form of this.forms) {
        if (form.signature === entry.signature && form.applyServerTypes(types)) {
          form.experimentId = response.experimentId ?? '';
        }
      }
    }
  }

  private importFormData(submitted: ParsedForm): void {
    const { imported, paymentCard } = this.personalData.importFormData([submitted]);
    const prompt = this.cardImportPrompt;
    if (!imported || !paymentCard || !prompt) {
      return;
    }
    this.track(
      prompt
        .offerToSave(paymentCard)
        .then((accepted) => {
          if (accepted) {
            this.personalData.saveImportedCard(paymentCard);
          }
        })
        .catch((error: unknown) => {
          console.warn('Unable to save imported card.', error);
        }),
    );
  }

  private findRecord(uniqueId: number): AutofillRecord | null {
    const { cardGuid, profileGuid } = this.ids.unpack(uniqueId);
    if (profileGuid) {
      const profile = this.personalData.profiles().find((candidate) => candidate.guid === profileGuid);
      return profile ? { kind: 'profile', profile } : null;
    }
    if (cardGuid) {
      const card = this.personalData.paymentCards().find((candidate) => candidate.guid === cardGuid);
      return card ? { kind: 'payment', card } : null;
    }
    return null;
  }

  private findCachedForm(form: FormData): ParsedForm | undefined {
    return this.forms.find((candidate) => candidate.matches(form));
  }

  private findCachedFormAndField(form: FormData, field: FormField): CachedFormAndField | null {
    const cached = this.findCachedForm(form);
    if (!cached || cached.autofillCount === 0) {
      return null;
    }
    const classified = cached.findField(field);
    return classified ? { form: cached, field: classified } : null;
  }

  private track(task: Promise<void>): void {
    this.pending.add(task);
    void task.finally(() => {
      this.pending.delete(task);
    });
  }
}
