import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createSerpApiClient, isSearchConfigured, searchWeb } from '@prepscout/agents';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('searchWeb', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns [] without calling out when no key is configured', async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({}));
    expect(await searchWeb('python interview', { apiKey: '  ', fetchImpl })).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('sends the query and keeps unique http(s) links in order', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) =>
      jsonResponse({
        organic_results: [
          { link: 'https://github.com/a/b', title: ' Repo ', snippet: 'notes' },
          { link: 'https://github.com/a/b', title: 'Duplicate' },
          { link: 'ftp://files.example.com/x', title: 'FTP' },
          { title: 'No link' },
          { link: 'https://medium.com/p/1', title: 'Post' },
        ],
      }),
    );

    const results = await searchWeb('  sql interview  ', { apiKey: 'test-secret', num: 3, fetchImpl });

    expect(results).toEqual([
      { url: 'https://github.com/a/b', title: 'Repo', snippet: 'notes' },
      { url: 'https://medium.com/p/1', title: 'Post', snippet: undefined },
    ]);
    const requested = new URL(fetchImpl.mock.calls[0]?.[0] ?? '');
    expect(requested.searchParams.get('q')).toBe('sql interview');
    expect(requested.searchParams.get('num')).toBe('3');
    expect(requested.searchParams.get('api_key')).toBe('test-secret');
  });

  it('returns [] on an HTTP error, an error payload or a thrown request', async () => {
    const failing = [
      vi.fn(async () => jsonResponse({}, 500)),
      vi.fn(async () => jsonResponse({ error: 'Invalid API key.' })),
      vi.fn(async (): Promise<Response> => {
        throw new Error('offline');
      }),
    ];
    for (const fetchImpl of failing) {
      expect(await searchWeb('q', { apiKey: 'test-secret', fetchImpl })).toEqual([]);
    }
  });

  it('wraps into a search client', async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ organic_results: [{ link: 'https://kaggle.com/x' }] }));
    const client = createSerpApiClient({ apiKey: 'test-secret', fetchImpl });
    expect(await client.search('kaggle')).toEqual([{ url: 'https://kaggle.com/x', title: '', snippet: undefined }]);
  });
});

describe('isSearchConfigured', () => {
  it('requires a non-blank key', () => {
    expect(isSearchConfigured('test-secret')).toBe(true);
    expect(isSearchConfigured('')).toBe(false);
    expect(isSearchConfigured(undefined)).toBe(false);
  });
});
