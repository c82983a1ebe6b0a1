import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OpenTreeSubtreeProvider } from '../../src/providers/OpenTreeSubtreeProvider.js';
import { UpstreamError } from '../../src/errors.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

describe('OpenTreeSubtreeProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request the induced subtree with the label format', async () => {
    mockFetch.mockResolvedValueOnce(
      Response.json({ newick: '(Apis_mellifera_ott7073,Bombus_ott2)Apidae_ott3;', broken: {} })
    );
    const provider = new OpenTreeSubtreeProvider({ baseUrl: 'https://example.test/v3/' });

    const subtree = await provider.inducedSubtree([7073, 2], 'name_and_id');

    expect(subtree).toEqual({ newick: '(Apis_mellifera_ott7073,Bombus_ott2)Apidae_ott3;', broken: {} });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://example.test/v3/tree_of_life/induced_subtree');
    expect(JSON.parse(String(init?.body))).toEqual({ ott_ids: [7073, 2], label_format: 'name_and_id' });
  });

  it('should pass on the taxa the tree reports as broken', async () => {
    mockFetch.mockResolvedValueOnce(
      Response.json({ newick: '(A_ott1,mrcaott2ott3)B_ott9;', broken: { ott42: 'mrcaott2ott3' } })
    );
    const provider = new OpenTreeSubtreeProvider();

    const subtree = await provider.inducedSubtree([1, 42], 'name_and_id');

    expect(subtree.broken).toEqual({ ott42: 'mrcaott2ott3' });
  });

  it('should treat a missing broken field as none', async () => {
    mockFetch.mockResolvedValueOnce(Response.json({ newick: '(A,B);' }));
    const provider = new OpenTreeSubtreeProvider();

    expect((await provider.inducedSubtree([1, 2], 'name')).broken).toEqual({});
  });

  it('should reject a response without newick text', async () => {
    mockFetch.mockResolvedValueOnce(Response.json({ newick: '' }));
    const provider = new OpenTreeSubtreeProvider();

    await expect(provider.inducedSubtree([1, 2], 'name')).rejects.toBeInstanceOf(UpstreamError);
  });
});
