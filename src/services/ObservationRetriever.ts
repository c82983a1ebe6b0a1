/**
 * Paginated, throttled retrieval of a user's or project's observations.
 * Pages that fail are dropped; the table is built from whatever pages
 * succeeded, up to the request budget.
 */

import { DEFAULTS, minIntervalMs, type PageFailurePolicy } from '../config.js';
import { InvalidArgumentError, ServiceUnavailableError, errorMessage } from '../errors.js';
import type { ILogProvider, PageLogEvent } from '../providers/ILogProvider.js';
import type { IObservationProvider } from '../providers/IObservationProvider.js';
import type { ObservationPage, ObservationQuery, ObservationRecord } from '../types/models.js';
import { RetrievalCursor, type RetrievalStateKind } from './RetrievalCursor.js';
import { Throttle, sleep as realSleep, type Sleep } from './Throttle.js';

export interface ObservationRetrieverOptions {
  perPage?: number;
  maxRequests?: number;
  requestsPerSecond?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  pageFailure?: PageFailurePolicy;
  strict?: boolean;
  /** Injected in tests to avoid real waiting. */
  sleep?: Sleep;
  /** Millisecond clock for request durations. Default: performance.now. */
  now?: () => number;
}

export type PageOutcome =
  | { ok: true; page: number; attempt: number; data: ObservationPage }
  | { ok: false; page: number; attempt: number; error: unknown };

export interface RetrievalResult {
  records: ObservationRecord[];
  /** Requests issued, retries included. */
  requests: number;
  pagesSucceeded: number;
  pagesFailed: number;
  /** As reported by the first successful page; null if none succeeded. */
  totalResults: number | null;
  /** Results without a taxon, left out of `records`. */
  skipped: number;
  state: RetrievalStateKind;
}

export class ObservationRetriever {
  private readonly perPage: number;
  private readonly maxRequests: number;
  private readonly intervalMs: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly pageFailure: PageFailurePolicy;
  private readonly strict: boolean;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly provider: IObservationProvider,
    private readonly logger: ILogProvider,
    opts?: ObservationRetrieverOptions
  ) {
    this.perPage = opts?.perPage ?? DEFAULTS.retrieval.perPage;
    this.maxRequests = opts?.maxRequests ?? DEFAULTS.retrieval.maxRequests;
    this.intervalMs = minIntervalMs(opts?.requestsPerSecond ?? DEFAULTS.retrieval.requestsPerSecond);
    this.maxRetries = opts?.maxRetries ?? DEFAULTS.retrieval.maxRetries;
    this.retryBackoffMs = opts?.retryBackoffMs ?? DEFAULTS.retrieval.retryBackoffMs;
    this.pageFailure = opts?.pageFailure ?? DEFAULTS.retrieval.pageFailure;
    this.strict = opts?.strict ?? DEFAULTS.retrieval.strict;
    this.sleep = opts?.sleep ?? realSleep;
    this.now = opts?.now ?? (() => performance.now());
  }

  /** Largest number of rows a single retrieval can return. */
  get resultCap(): number {
    return this.perPage * this.maxRequests;
  }

  async fetchAll(query: ObservationQuery): Promise<RetrievalResult> {
    validateQuery(query);

    const cursor = new RetrievalCursor(this.maxRequests);
    const records: ObservationRecord[] = [];
    let pagesSucceeded = 0;
    let pagesFailed = 0;
    let totalResults: number | null = null;
    let skipped = 0;

    for await (const outcome of this.pages(query, cursor)) {
      if (outcome.ok) {
        pagesSucceeded++;
        totalResults ??= outcome.data.totalResults;
        skipped += outcome.data.skipped;
        records.push(...outcome.data.records);
      } else {
        pagesFailed++;
      }
    }

    const state = cursor.state;
    if (state.kind === 'CappedOut') {
      this.logger.info('Request budget reached; older observations not retrieved', {
        requests: cursor.requests,
        totalPages: state.totalPages,
        cap: this.resultCap,
      });
    }

    if (pagesSucceeded === 0 && this.strict) {
      throw new ServiceUnavailableError('iNaturalist', 'no observation page could be retrieved', {
        requests: cursor.requests,
      });
    }

    const capped = records.length > this.resultCap ? records.slice(0, this.resultCap) : records;

    this.logger.info('Observations retrieved', {
      rows: capped.length,
      totalResults,
      pagesSucceeded,
      pagesFailed,
      requests: cursor.requests,
    });

    return {
      records: capped,
      requests: cursor.requests,
      pagesSucceeded,
      pagesFailed,
      totalResults,
      skipped,
      state: state.kind,
    };
  }

  /**
   * Yield one outcome per page, in page order. A page's failed retries are
   * not yielded; only its final outcome is.
   */
  async *pages(
    query: ObservationQuery,
    cursor: RetrievalCursor = new RetrievalCursor(this.maxRequests)
  ): AsyncGenerator<PageOutcome> {
    validateQuery(query);

    if (query.iconicTaxon) {
      this.logger.debug('iconicTaxon filter is reserved and not applied', {
        iconicTaxon: query.iconicTaxon,
      });
    }

    const throttle = new Throttle(this.intervalMs, this.sleep);

    for (let page = cursor.nextPage(); page !== null; page = cursor.nextPage()) {
      const outcome = await this.fetchWithRetry(query, page, cursor, throttle);

      if (outcome.ok) {
        cursor.pageSucceeded(page, outcome.data.totalResults, outcome.data.perPage);
      } else {
        cursor.pageFailed(page);
        if (this.pageFailure === 'warn') {
          this.logger.warn(`Dropped observation page ${page}`, {
            page,
            attempts: outcome.attempt,
            error: errorMessage(outcome.error),
          });
        }
      }

      yield outcome;
    }
  }

  private async fetchWithRetry(
    query: ObservationQuery,
    page: number,
    cursor: RetrievalCursor,
    throttle: Throttle
  ): Promise<PageOutcome> {
    let attempt = 0;
    let lastError: unknown = null;

    while (attempt <= this.maxRetries && cursor.canRequest()) {
      attempt++;
      if (attempt > 1 && this.retryBackoffMs > 0) {
        await this.sleep(this.retryBackoffMs * (attempt - 1));
      }
      await throttle.wait();

      cursor.beginRequest();
      const start = this.now();
      try {
        const data = await this.provider.fetchPage(query, page, this.perPage);
        this.logPage(page, attempt, 200, start);
        return { ok: true, page, attempt, data };
      } catch (err) {
        lastError = err;
        this.logPage(page, attempt, statusOf(err), start, errorMessage(err));
      }
    }

    return { ok: false, page, attempt, error: lastError };
  }

  private logPage(page: number, attempt: number, status: number, start: number, error?: string): void {
    const durationMs = Math.round(this.now() - start);
    const event: PageLogEvent = {
      level: 'debug',
      message: `GET observations page ${page} → ${status || 'failed'} (${durationMs}ms)`,
      page,
      attempt,
      status,
      durationMs,
      ...(error && { fields: { error } }),
    };
    this.logger.log(event);
  }
}

/** At least one of userId / projectId must be a non-empty string. */
export function validateQuery(query: ObservationQuery): void {
  const hasUser = typeof query.userId === 'string' && query.userId.trim() !== '';
  const hasProject = typeof query.projectId === 'string' && query.projectId.trim() !== '';
  if (!hasUser && !hasProject) {
    throw new InvalidArgumentError(
      'At least one of userId or projectId must be given as a non-empty string'
    );
  }
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 0;
}
