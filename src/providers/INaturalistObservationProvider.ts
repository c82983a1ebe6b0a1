/**
 * iNaturalist observation search (GET /v1/observations).
 * Results are ordered newest-created first so that the result cap keeps
 * the most recent observations.
 */

import { DEFAULTS } from '../config.js';
import {
  InatObservationPageSchema,
  type InatObservation,
} from '../types/api.js';
import {
  ICONIC_TAXA,
  type IconicTaxonTag,
  type ObservationPage,
  type ObservationQuery,
  type ObservationRecord,
} from '../types/models.js';
import type { IObservationProvider } from './IObservationProvider.js';
import { requestJson } from './http.js';

const SERVICE = 'iNaturalist';

export interface INaturalistObservationProviderOptions {
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
}

export class INaturalistObservationProvider implements IObservationProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string | undefined;

  constructor(opts?: INaturalistObservationProviderOptions) {
    this.baseUrl = (opts?.baseUrl ?? DEFAULTS.retrieval.baseUrl).replace(/\/+$/, '');
    this.timeoutMs = opts?.timeoutMs ?? DEFAULTS.retrieval.timeoutMs;
    this.userAgent = opts?.userAgent;
  }

  async fetchPage(query: ObservationQuery, page: number, perPage: number): Promise<ObservationPage> {
    const { data } = await requestJson(
      {
        service: SERVICE,
        url: buildObservationsUrl(this.baseUrl, query, page, perPage),
        timeoutMs: this.timeoutMs,
        ...(this.userAgent && { headers: { 'User-Agent': this.userAgent } }),
      },
      InatObservationPageSchema
    );

    const records: ObservationRecord[] = [];
    for (const raw of data.results) {
      const record = toObservationRecord(raw);
      if (record) records.push(record);
    }

    return {
      totalResults: data.total_results,
      perPage: data.per_page,
      page: data.page ?? page,
      records,
      skipped: data.results.length - records.length,
    };
  }
}

/**
 * Query string for one page. `iconicTaxon` is deliberately not forwarded.
 * Filters are trimmed; blank ones are left out rather than sent.
 */
export function buildObservationsUrl(
  baseUrl: string,
  query: ObservationQuery,
  page: number,
  perPage: number
): string {
  const qs = new URLSearchParams();
  const user = query.userId?.trim();
  const project = query.projectId?.trim();
  if (user) qs.set('user_id', user);
  if (project) qs.set('project_id', project);
  qs.set('page', String(page));
  qs.set('per_page', String(perPage));
  qs.set('order', 'desc');
  qs.set('order_by', 'created_at');
  return `${baseUrl}/observations?${qs.toString()}`;
}

/**
 * Flatten one observation payload:
 *
 * | record field      | payload field               |
 * |-------------------|-----------------------------|
 * | taxonName         | taxon.name                  |
 * | taxonId           | taxon.id                    |
 * | iconicTaxonName   | taxon.iconic_taxon_name     |
 * | iconicTaxonId     | taxon.iconic_taxon_id       |
 *
 * Returns null for observations without a taxon. An iconic taxon name that
 * is absent or not one of ICONIC_TAXA becomes 'unknown'.
 */
export function toObservationRecord(raw: InatObservation): ObservationRecord | null {
  if (!raw.taxon) return null;
  return {
    taxonName: raw.taxon.name,
    taxonId: raw.taxon.id,
    iconicTaxonName: toIconicTag(raw.taxon.iconic_taxon_name),
    iconicTaxonId: raw.taxon.iconic_taxon_id ?? null,
  };
}

function toIconicTag(name: string | null | undefined): IconicTaxonTag {
  return ICONIC_TAXA.find((t) => t === name) ?? 'unknown';
}
