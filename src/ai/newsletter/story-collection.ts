/**
 * Story Collection
 *
 * Append-only union of the stories scouts report. Parallel scouts finish in
 * any order, so nothing here depends on arrival order: duplicates resolve by
 * a total order and snapshots are sorted canonically.
 */

import type { NewsStory } from './types';

/**
 * Identity of a story across scouts: normalized url plus title.
 */
export function storyKey(story: Pick<NewsStory, 'url' | 'title'>): string {
  return `${story.url.trim().toLowerCase()}|${story.title.trim().toLowerCase()}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Which of two stories with the same key survives: higher score, then the
 * longer summary, then the lexically smaller serialization.
 */
function preferStory(current: NewsStory, candidate: NewsStory): NewsStory {
  if (candidate.score !== current.score) {
    return candidate.score > current.score ? candidate : current;
  }
  if (candidate.summary.length !== current.summary.length) {
    return candidate.summary.length > current.summary.length ? candidate : current;
  }
  return compareText(JSON.stringify(candidate), JSON.stringify(current)) < 0 ? candidate : current;
}

/**
 * Canonical snapshot order: score descending, then url, then title.
 */
export function compareStories(a: NewsStory, b: NewsStory): number {
  return b.score - a.score || compareText(a.url, b.url) || compareText(a.title, b.title);
}

export class StoryCollection {
  private readonly stories = new Map<string, NewsStory>();

  constructor(initial: readonly NewsStory[] = []) {
    this.addBatch(initial);
  }

  get size(): number {
    return this.stories.size;
  }

  has(story: Pick<NewsStory, 'url' | 'title'>): boolean {
    return this.stories.has(storyKey(story));
  }

  /**
   * Merges a batch into the union.
   *
   * @returns The stories whose key was not present before this batch
   */
  addBatch(batch: readonly NewsStory[]): NewsStory[] {
    const addedKeys: string[] = [];
    for (const story of batch) {
      const key = storyKey(story);
      const existing = this.stories.get(key);
      if (existing) {
        this.stories.set(key, preferStory(existing, story));
      } else {
        this.stories.set(key, story);
        addedKeys.push(key);
      }
    }
    // Duplicates inside the batch may have replaced the first arrival
    return addedKeys.flatMap((key) => {
      const stored = this.stories.get(key);
      return stored ? [stored] : [];
    });
  }

  snapshot(): NewsStory[] {
    return [...this.stories.values()].sort(compareStories);
  }
}
