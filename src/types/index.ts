/**
 * A story as held in a snapshot. Frozen once created.
 */
export interface Story {
  readonly id: number;
  readonly title: string;
  readonly url: string;
  readonly author: string;
  /** Unix-epoch seconds */
  readonly time: number;
  readonly score: number;
  readonly descendants: number;
}

/**
 * Outward-facing record returned by GET /api/best
 */
export interface BestStoryDto {
  title: string;
  uri: string;
  postedBy: string;
  /** ISO-8601, e.g. 2020-09-13T12:26:40+00:00 */
  time: string;
  score: number;
  commentCount: number;
}

/**
 * An immutable, unordered set of stories from one refresh cycle
 */
export type Snapshot = ReadonlyArray<Story>;

/**
 * Result of one fan-out pass
 */
export interface RefreshOutcome {
  succeeded: Story[];
  failed: number[];
}

export type FetchResult =
  | { ok: true; story: Story }
  | { ok: false; id: number; reason: string };

/**
 * Anything that can fetch a single story detail
 */
export interface StoryFetcher {
  fetchStory(id: number, signal?: AbortSignal): Promise<FetchResult>;
}

/**
 * Anything that can provide the current best-story ID list
 */
export interface StoryIdSource {
  fetchBestStoryIds(signal?: AbortSignal): Promise<number[]>;
}

export interface RefreshCycleStats {
  requested: number;
  succeeded: number;
  dropped: number;
  retryAttempts: number;
  /** succeeded / requested, 1 when nothing was requested */
  completenessRatio: number;
  durationMs: number;
}
