import { isDeepStrictEqual } from 'node:util';
import type { Checkpoint, TaskMessage } from '@stepwise/shared';

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_RELATED_LIMIT = 5;

/** Case-insensitive, non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  const target = needle.toLowerCase();
  if (!target) return 0;
  const text = haystack.toLowerCase();
  let count = 0;
  let from = text.indexOf(target);
  while (from !== -1) {
    count++;
    from = text.indexOf(target, from + target.length);
  }
  return count;
}

/**
 * Relevance of a task's messages to a search query. An empty query scores
 * one per message so that every task with history is listed.
 */
export function messageRelevance(messages: Pick<TaskMessage, 'content'>[], query: string): number {
  if (!query) return messages.length;
  return messages.reduce((sum, m) => sum + countOccurrences(m.content, query), 0);
}

/** Shared keys with equal values over the size of the larger context. */
export function contextSimilarity(a: Record<string, unknown>, b: Record<string, unknown>): number {
  const size = Math.max(Object.keys(a).length, Object.keys(b).length);
  if (size === 0) return 0;
  let shared = 0;
  for (const [key, value] of Object.entries(a)) {
    if (Object.hasOwn(b, key) && isDeepStrictEqual(value, b[key])) shared++;
  }
  return shared / size;
}

/** Drop zero scores, order by relevance (ties by task id) and truncate. */
export function rankByRelevance<T extends { taskId: string; relevance: number }>(
  items: T[],
  limit: number,
): T[] {
  return items
    .filter((item) => item.relevance > 0)
    .sort((a, b) => b.relevance - a.relevance || a.taskId.localeCompare(b.taskId))
    .slice(0, Math.max(0, limit));
}

export function checkpointId(taskId: string, seq: number): string {
  return `${taskId}_${seq}`;
}

export function checkpointSeq(id: string): number {
  const suffix = id.slice(id.lastIndexOf('_') + 1);
  const seq = Number.parseInt(suffix, 10);
  return Number.isNaN(seq) ? 0 : seq;
}

export function compareCheckpoints(a: Checkpoint, b: Checkpoint): number {
  return a.timestamp - b.timestamp || checkpointSeq(a.id) - checkpointSeq(b.id);
}
