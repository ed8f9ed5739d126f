/**
 * MSW Request Handlers
 *
 * In-process stand-ins for the search APIs (Tavily, Exa, Reddit).
 * Model calls never go over HTTP in tests; they are mocked through the
 * injected `generateText`.
 */

import { http, HttpResponse } from 'msw';

/** 2025-01-15T12:00:00Z, the clock reading Reddit fixtures are relative to */
export const FIXTURE_NOW_MS = 1_736_942_400_000;

export const MOCK_TAVILY_RESPONSE = {
  query: 'placeholder',
  answer: 'Brief factual overview for the requested query. This is a mocked Tavily answer.',
  results: [
    {
      title: 'Open model release tops reasoning benchmark',
      url: 'https://news.example.com/open-model-release',
      content: 'A new open-weights model was released with strong reasoning results.',
      score: 0.92,
      published_date: '2025-01-14',
    },
    {
      title: 'Chipmaker announces inference accelerator',
      url: 'https://news.example.com/inference-accelerator',
      content: 'The accelerator targets low-latency serving of large models.',
      score: 0.81,
    },
    {
      // Dropped by the parser: no url
      title: 'Untitled fragment',
      content: 'Missing url.',
    },
  ],
};

export const MOCK_EXA_RESPONSE = {
  results: [
    {
      title: 'Sparse Routing for Efficient Mixture-of-Experts',
      url: 'https://papers.example.org/sparse-routing',
      text: 'We propose a routing scheme that reduces expert load imbalance.',
      summary: 'A routing method that balances expert load.',
      score: 0.88,
      publishedDate: '2025-01-10T00:00:00.000Z',
      author: 'A. Researcher',
    },
  ],
};

export const MOCK_REDDIT_LISTING = {
  kind: 'Listing',
  data: {
    children: [
      {
        kind: 't3',
        data: {
          title: 'New open model beats last year\'s frontier on math',
          permalink: '/r/MachineLearning/comments/abc123/new_open_model/',
          score: 450,
          subreddit: 'MachineLearning',
          created_utc: 1_736_935_200, // 2h before FIXTURE_NOW_MS
        },
      },
      {
        kind: 't3',
        data: {
          title: 'Low-traction question about GPUs',
          permalink: '/r/MachineLearning/comments/def456/gpu_question/',
          score: 40,
          subreddit: 'MachineLearning',
          created_utc: 1_736_931_600, // 3h before
        },
      },
      {
        kind: 't3',
        data: {
          title: 'Old but popular thread',
          permalink: '/r/MachineLearning/comments/ghi789/old_thread/',
          score: 900,
          subreddit: 'MachineLearning',
          created_utc: 1_736_683_200, // 72h before
        },
      },
      {
        kind: 't3',
        data: {
          title: 'Benchmark contamination discussion',
          permalink: '/r/LocalLLaMA/comments/jkl012/contamination/',
          score: 150,
          subreddit: 'LocalLLaMA',
          created_utc: 1_736_906_400, // 10h before
        },
      },
    ],
  },
};

export const handlers = [
  http.post('https://api.tavily.com/search', async ({ request }) => {
    const body: unknown = await request.json();
    const query =
      typeof body === 'object' && body !== null && 'query' in body && typeof body.query === 'string'
        ? body.query
        : '';
    return HttpResponse.json({ ...MOCK_TAVILY_RESPONSE, query });
  }),

  http.post('https://api.exa.ai/search', () => HttpResponse.json(MOCK_EXA_RESPONSE)),

  http.get('https://www.reddit.com/search.json', () => HttpResponse.json(MOCK_REDDIT_LISTING)),

  http.get('https://www.reddit.com/r/:forum/search.json', () =>
    HttpResponse.json(MOCK_REDDIT_LISTING)
  ),
];
