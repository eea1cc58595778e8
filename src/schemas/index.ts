import { z } from 'zod';

/**
 * Upper bound on identifiers taken from the best-stories list per refresh
 */
export const MAX_BEST_STORIES = 200;

/**
 * Response of GET /beststories.json
 */
export const StoryIdListSchema = z.array(z.number().int().positive());

export type StoryIdList = z.infer<typeof StoryIdListSchema>;

/**
 * Response of GET /item/{id}.json for a story.
 * Deleted or unknown items come back as JSON null and fail this schema.
 */
export const HackerNewsItemSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  url: z.string().optional(),
  by: z.string(),
  time: z.number().int().nonnegative(),
  score: z.number().int().nonnegative(),
  descendants: z.number().int().nonnegative().optional(),
});

export type HackerNewsItem = z.infer<typeof HackerNewsItemSchema>;

/**
 * Plain decimal integer, optionally negative. No whitespace, exponent, hex or fraction.
 */
export const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Query string of GET /api/best
 */
export const BestStoriesQuerySchema = z.object({
  n: z
    .string()
    .regex(INTEGER_PATTERN)
    .transform(Number)
    .pipe(z.number().int().min(1).max(MAX_BEST_STORIES)),
});

export type BestStoriesQuery = z.infer<typeof BestStoriesQuerySchema>;
