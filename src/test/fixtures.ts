import type { FetchResult, Story, StoryFetcher, StoryIdSource } from '../types';

export function makeStory(id: number, overrides: Partial<Story> = {}): Story {
  return Object.freeze({
    id,
    title: `Story ${id}`,
    url: `https://example.test/${id}`,
    author: `user${id}`,
    time: 1600000000 + id,
    score: id,
    descendants: 0,
    ...overrides,
  });
}

/**
 * In-memory stand-in for the upstream API.
 * `failures` maps an ID to how many more times it should fail before succeeding
 * (Infinity: always fails).
 */
export class FakeHackerNews implements StoryFetcher, StoryIdSource {
  readonly requests: number[] = [];
  ids: number[];
  failures: Map<number, number>;
  idListError: Error | null = null;

  constructor(ids: number[], failures: Record<number, number> = {}) {
    this.ids = ids;
    this.failures = new Map(Object.entries(failures).map(([id, count]) => [Number(id), count]));
  }

  async fetchBestStoryIds(): Promise<number[]> {
    if (this.idListError) throw this.idListError;
    return [...this.ids];
  }

  async fetchStory(id: number): Promise<FetchResult> {
    this.requests.push(id);
    const remaining = this.failures.get(id) ?? 0;
    if (remaining > 0) {
      this.failures.set(id, remaining - 1);
      return { ok: false, id, reason: 'HTTP 500' };
    }
    return { ok: true, story: makeStory(id) };
  }
}
