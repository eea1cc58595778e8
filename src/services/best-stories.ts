import type { BestStoryDto, Story } from '../types';
import type { SnapshotStore } from '../refresh/snapshot-store';
import { debugLogger } from '../utils/debug-logger';
import { formatUnixTime } from '../utils/time';

export function toBestStoryDto(story: Story): BestStoryDto {
  return {
    title: story.title,
    uri: story.url,
    postedBy: story.author,
    time: formatUnixTime(story.time),
    score: story.score,
    commentCount: story.descendants,
  };
}

/**
 * Read side of the snapshot: ranks the current stories by score.
 * `n` is validated by the route (1-200).
 */
export class BestStoriesService {
  constructor(private readonly store: SnapshotStore) {}

  getBestStories(n: number): BestStoryDto[] {
    // Take the reference once so the whole call works on a single snapshot
    const snapshot = this.store.current();

    if (snapshot.length === 0) {
      console.log('ℹ️ There are no best stories');
      debugLogger.info('QUERY', 'Empty snapshot', { requested: n });
      return [];
    }

    return [...snapshot]
      .sort((a, b) => b.score - a.score)
      .slice(0, n)
      .map(toBestStoryDto);
  }
}
