import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  INaturalistObservationProvider,
  buildObservationsUrl,
  toObservationRecord,
} from '../../src/providers/INaturalistObservationProvider.js';
import { UpstreamError } from '../../src/errors.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function observation(name: string, id: number, iconic: string | null, iconicId: number | null) {
  return {
    id: id * 10,
    quality_grade: 'research',
    taxon: { id, name, rank: 'species', iconic_taxon_name: iconic, iconic_taxon_id: iconicId },
  };
}

describe('INaturalistObservationProvider', () => {
  let provider: INaturalistObservationProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    provider = new INaturalistObservationProvider();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should query the observation search newest first', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ total_results: 0, page: 2, per_page: 200, results: [] }));

    await provider.fetchPage({ userId: 'alice' }, 2, 200);

    expect(mockFetch).toHaveBeenCalledOnce();
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(
      'https://api.inaturalist.org/v1/observations?user_id=alice&page=2&per_page=200&order=desc&order_by=created_at'
    );
    expect(init?.method).toBe('GET');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should flatten results into records in payload order', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        total_results: 450,
        page: 1,
        per_page: 200,
        results: [
          observation('Apis mellifera', 47219, 'Insecta', 47158),
          observation('Quercus robur', 56133, 'Plantae', 47126),
          observation('Apis mellifera', 47219, 'Insecta', 47158),
        ],
      })
    );

    const page = await provider.fetchPage({ projectId: 'p1' }, 1, 200);

    expect(page.totalResults).toBe(450);
    expect(page.perPage).toBe(200);
    expect(page.records).toEqual([
      { taxonName: 'Apis mellifera', taxonId: 47219, iconicTaxonName: 'Insecta', iconicTaxonId: 47158 },
      { taxonName: 'Quercus robur', taxonId: 56133, iconicTaxonName: 'Plantae', iconicTaxonId: 47126 },
      { taxonName: 'Apis mellifera', taxonId: 47219, iconicTaxonName: 'Insecta', iconicTaxonId: 47158 },
    ]);
  });

  it('should skip unidentified observations and count them', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        total_results: 2,
        per_page: 200,
        results: [{ id: 1, taxon: null }, observation('Bufo bufo', 64968, 'Amphibia', 20978)],
      })
    );

    const page = await provider.fetchPage({ userId: 'alice' }, 1, 200);

    expect(page.records).toHaveLength(1);
    expect(page.skipped).toBe(1);
    expect(page.page).toBe(1);
  });

  it('should throw UpstreamError with the status on a non-2xx response', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Too Many Requests' }, 429));

    const err = await provider.fetchPage({ userId: 'alice' }, 1, 200).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ status: 429, message: 'iNaturalist error (429): Too Many Requests' });
  });

  it('should throw UpstreamError when the payload shape changed', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ total_results: '12', per_page: 200, results: [] }));

    await expect(provider.fetchPage({ userId: 'alice' }, 1, 200)).rejects.toThrow(
      'iNaturalist error (200): unexpected payload shape at total_results: Expected number, received string'
    );
  });

  it('should throw UpstreamError on a network failure', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(provider.fetchPage({ userId: 'alice' }, 1, 200)).rejects.toThrow(
      'iNaturalist error: fetch failed'
    );
  });

  it('should send the configured User-Agent', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ total_results: 0, per_page: 200, results: [] }));
    const custom = new INaturalistObservationProvider({ userAgent: 'test-agent/1.0' });

    await custom.fetchPage({ userId: 'alice' }, 1, 200);

    expect(mockFetch.mock.calls[0][1]?.headers).toMatchObject({ 'User-Agent': 'test-agent/1.0' });
  });
});

describe('buildObservationsUrl', () => {
  it('should send both filters when both are given', () => {
    expect(buildObservationsUrl('https://example.test/v1', { userId: 'alice', projectId: 'p1' }, 1, 50)).toBe(
      'https://example.test/v1/observations?user_id=alice&project_id=p1&page=1&per_page=50&order=desc&order_by=created_at'
    );
  });

  it('should leave out a blank filter instead of sending it', () => {
    const url = buildObservationsUrl('https://example.test/v1', { userId: '   ', projectId: ' garden ' }, 1, 200);
    expect(url).toBe(
      'https://example.test/v1/observations?project_id=garden&page=1&per_page=200&order=desc&order_by=created_at'
    );
  });

  it('should not forward the iconic taxon filter', () => {
    const url = buildObservationsUrl('https://example.test/v1', { userId: 'alice', iconicTaxon: 'Aves' }, 1, 200);
    expect(url).toBe(
      'https://example.test/v1/observations?user_id=alice&page=1&per_page=200&order=desc&order_by=created_at'
    );
  });
});

describe('toObservationRecord', () => {
  it('should return null without a taxon', () => {
    expect(toObservationRecord({ taxon: null })).toBeNull();
    expect(toObservationRecord({})).toBeNull();
  });

  it('should tag a missing or unfamiliar iconic taxon as unknown', () => {
    expect(toObservationRecord({ taxon: { id: 1, name: 'Life' } })).toEqual({
      taxonName: 'Life',
      taxonId: 1,
      iconicTaxonName: 'unknown',
      iconicTaxonId: null,
    });
    expect(
      toObservationRecord({ taxon: { id: 2, name: 'X', iconic_taxon_name: 'Bacteria', iconic_taxon_id: 9 } })
    ).toMatchObject({ iconicTaxonName: 'unknown', iconicTaxonId: 9 });
  });
});
