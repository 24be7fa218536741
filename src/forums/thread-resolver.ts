import type { ForumPlatform, LoggerLike, ThreadRef } from './types.js';

export const ARCHIVED_SCAN_LIMIT = 200;

export const THREAD_NAME_SEPARATOR = '/';

/** A thread belongs to a display name when its name starts with `<name>/`. */
export function threadBelongsTo(threadName: string, displayName: string): boolean {
  return threadName.startsWith(`${displayName}${THREAD_NAME_SEPARATOR}`);
}

/**
 * Find a thread in the forum that already belongs to `displayName`.
 * Active threads are checked first, then up to ARCHIVED_SCAN_LIMIT archived
 * threads in whatever order the platform returns them.
 *
 * A failure while listing archived threads is logged and reported as "no
 * match".
 */
export async function findExistingThread(
  platform: ForumPlatform,
  forumId: string,
  displayName: string,
  log?: LoggerLike,
): Promise<ThreadRef | null> {
  const active = await platform.listActiveThreads(forumId);
  for (const thread of active) {
    if (threadBelongsTo(thread.name, displayName)) return thread;
  }

  try {
    for await (const thread of platform.listArchivedThreads(forumId, ARCHIVED_SCAN_LIMIT)) {
      if (threadBelongsTo(thread.name, displayName)) return thread;
    }
  } catch (err) {
    log?.warn({ err, forumId }, 'forums:resolve archived thread listing failed');
  }
  return null;
}
