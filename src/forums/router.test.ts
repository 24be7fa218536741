import { describe, expect, it, vi } from 'vitest';
import { routeForumIds, selectForums } from './router.js';
import type { ForumRef, RoutingTable } from './types.js';

const table: RoutingTable = {
  routes: [
    { label: 'male', roleId: '100', forumIds: ['1', '2', '3'] },
    { label: 'female', roleId: '200', forumIds: ['3', '4'] },
  ],
  defaultForumIds: ['9'],
};

describe('routeForumIds', () => {
  it('returns the forums of the single matching label in configured order', () => {
    expect(routeForumIds(new Set(['100', '555']), table)).toEqual(['1', '2', '3']);
  });

  it('concatenates labels in priority order and drops later duplicates', () => {
    expect(routeForumIds(new Set(['200', '100']), table)).toEqual(['1', '2', '3', '4']);
  });

  it('falls back to the default list when no label matches', () => {
    expect(routeForumIds(new Set(['555']), table)).toEqual(['9']);
  });

  it('returns an empty list when nothing matches and there is no default', () => {
    expect(routeForumIds(new Set(['555']), { ...table, defaultForumIds: [] })).toEqual([]);
  });

  it('falls back to the default list when the matching label has no forums', () => {
    const sparse: RoutingTable = {
      routes: [{ label: 'male', roleId: '100', forumIds: [] }],
      defaultForumIds: ['9'],
    };
    expect(routeForumIds(new Set(['100']), sparse)).toEqual(['9']);
  });

  it('dedupes repeated IDs inside one list', () => {
    const dup: RoutingTable = { routes: [{ label: 'x', roleId: '1', forumIds: ['5', '5', '6', '5'] }], defaultForumIds: [] };
    expect(routeForumIds(new Set(['1']), dup)).toEqual(['5', '6']);
  });

  it('is deterministic for the same inputs', () => {
    const roles = new Set(['200', '100']);
    expect(routeForumIds(roles, table)).toEqual(routeForumIds(roles, table));
  });
});

describe('selectForums', () => {
  it('keeps only IDs that resolve to a forum, preserving order', () => {
    const known: Record<string, ForumRef> = {
      '1': { id: '1', name: 'one', guildId: 'g' },
      '3': { id: '3', name: 'three', guildId: 'g' },
    };
    const debug = vi.fn();
    const forums = selectForums(['1', '2', '3'], (id) => known[id] ?? null, {
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    });

    expect(forums.map((f) => f.id)).toEqual(['1', '3']);
    expect(debug).toHaveBeenCalledWith({ forumId: '2' }, 'forums:route configured forum not found, dropped');
  });
});
