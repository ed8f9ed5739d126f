import { http, HttpResponse } from 'msw';
import { describe, it, expect } from 'vitest';

import { EXA_API_BASE_URL, exaSearch, parseExaResponse } from '../../../src/ai/tools/exa';
import { server } from '../../mocks/server';

describe('parseExaResponse', () => {
  it('drops results without a url', () => {
    const parsed = parseExaResponse('q', { results: [{ title: 'No link' }, { title: 'Linked', url: 'https://x.example.org' }] });

    expect(parsed.results).toEqual([{ title: 'Linked', url: 'https://x.example.org' }]);
  });
});

describe('exaSearch', () => {
  it('maps paper metadata', async () => {
    const response = await exaSearch('sparse routing', { apiKey: 'test-exa-key' });

    expect(response).toEqual({
      query: 'sparse routing',
      results: [
        {
          title: 'Sparse Routing for Efficient Mixture-of-Experts',
          url: 'https://papers.example.org/sparse-routing',
          content: 'We propose a routing scheme that reduces expert load imbalance.',
          summary: 'A routing method that balances expert load.',
          score: 0.88,
          publishedDate: '2025-01-10T00:00:00.000Z',
          author: 'A. Researcher',
        },
      ],
    });
  });

  it('sends the search body and API key header', async () => {
    let body: unknown;
    let apiKey: string | null = null;
    server.use(
      http.post(`${EXA_API_BASE_URL}/search`, async ({ request }) => {
        body = await request.json();
        apiKey = request.headers.get('x-api-key');
        return HttpResponse.json({ results: [] });
      })
    );

    await exaSearch('sparse routing', {
      apiKey: 'test-exa-key',
      category: 'research paper',
      includeSummary: true,
      numResults: 3,
    });

    expect(apiKey).toBe('test-exa-key');
    expect(body).toEqual({
      query: 'sparse routing',
      numResults: 3,
      type: 'auto',
      contents: { text: { maxCharacters: 1000 }, summary: true },
      category: 'research paper',
    });
  });

  it('raises ToolExecutionError on a non-2xx response', async () => {
    server.use(http.post(`${EXA_API_BASE_URL}/search`, () => new HttpResponse(null, { status: 429 })));

    await expect(exaSearch('sparse routing', { apiKey: 'test-exa-key' })).rejects.toMatchObject({
      code: 'TOOL_FAILED',
      toolName: 'academic_search',
      status: 429,
      message: 'Exa search failed with status 429',
    });
  });
});
