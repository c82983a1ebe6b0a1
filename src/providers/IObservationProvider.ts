import type { ObservationPage, ObservationQuery } from '../types/models.js';

/**
 * Source of observation pages.
 * One call is one outbound request; implementations throw UpstreamError on
 * any failure and never retry on their own.
 */
export interface IObservationProvider {
  fetchPage(query: ObservationQuery, page: number, perPage: number): Promise<ObservationPage>;
}
