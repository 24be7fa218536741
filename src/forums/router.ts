import type { ForumRef, LoggerLike, RoutingTable } from './types.js';

/**
 * Collect the forum IDs an author's roles route to. Every matching rule
 * contributes its list in table order; when nothing matches the default list
 * is used. Duplicates are dropped keeping the first occurrence.
 */
export function routeForumIds(authorRoleIds: ReadonlySet<string>, table: RoutingTable): string[] {
  const candidates: string[] = [];
  for (const rule of table.routes) {
    if (authorRoleIds.has(rule.roleId)) candidates.push(...rule.forumIds);
  }
  if (candidates.length === 0) candidates.push(...table.defaultForumIds);

  return [...new Set(candidates)];
}

/** Keep only IDs that currently resolve to a forum channel. */
export function selectForums(
  forumIds: string[],
  resolveForum: (forumId: string) => ForumRef | null,
  log?: LoggerLike,
): ForumRef[] {
  const forums: ForumRef[] = [];
  for (const forumId of forumIds) {
    const forum = resolveForum(forumId);
    if (forum) {
      forums.push(forum);
    } else {
      log?.debug?.({ forumId }, 'forums:route configured forum not found, dropped');
    }
  }
  return forums;
}
