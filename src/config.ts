import { assertTimeZone, DEFAULT_TIME_ZONE } from './forums/thread-name.js';
import type { RouteRule, RoutingTable } from './forums/types.js';

export type BotConfig = {
  token: string;
  sourceChannelIds: Set<string>;
  routing: RoutingTable;
  threadLinksFile: string;
  timeZone: string;
  logLevel: string;
};

export type ParseResult = {
  config: BotConfig;
  /** Non-fatal misconfiguration that leaves part of the routing disabled. */
  errors: string[];
  warnings: string[];
  infos: string[];
};

export const DEFAULT_THREAD_LINKS_FILE = 'data/thread_links.json';

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
const LOG_LEVEL_ALIASES: Record<string, string> = { warning: 'warn', critical: 'fatal' };

/** Comma-separated IDs; entries that are not all digits are dropped. */
export function parseIdList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => /^\d+$/.test(s));
}

function parseRoleId(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = (env[name] ?? '').trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw)) throw new Error(`${name} must be a numeric Discord role ID, got "${raw}"`);
  return raw;
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = (env.DISCORD_TOKEN ?? '').trim();
  if (!token) throw new Error('Missing DISCORD_TOKEN');

  const sourceChannelIds = new Set(parseIdList(env.SOURCE_TEXT_CHANNEL_IDS));
  if (sourceChannelIds.size === 0) {
    warnings.push('SOURCE_TEXT_CHANNEL_IDS is empty: no messages will trigger thread creation');
  }

  const routes: RouteRule[] = [];
  for (const label of ['male', 'female'] as const) {
    const prefix = label.toUpperCase();
    const roleId = parseRoleId(env, `${prefix}_ROLE_ID`);
    const forumIds = parseIdList(env[`${prefix}_FORUM_IDS`]);
    if (!roleId) {
      if (forumIds.length > 0) {
        errors.push(`${prefix}_FORUM_IDS is set but ${prefix}_ROLE_ID is not: ${label} route disabled`);
      }
      continue;
    }
    if (forumIds.length === 0) infos.push(`${prefix}_FORUM_IDS is empty: ${label} role routes to no forum`);
    routes.push({ label, roleId, forumIds });
  }

  const defaultForumIds = parseIdList(env.DEFAULT_FORUM_IDS);
  if (routes.every((r) => r.forumIds.length === 0) && defaultForumIds.length === 0) {
    warnings.push('No forum IDs configured (MALE_FORUM_IDS, FEMALE_FORUM_IDS, DEFAULT_FORUM_IDS): every trigger will fail routing');
  }

  const timeZone = (env.THREAD_TIME_ZONE ?? '').trim() || DEFAULT_TIME_ZONE;
  try {
    assertTimeZone(timeZone);
  } catch {
    throw new Error(`THREAD_TIME_ZONE must be an IANA time zone, got "${timeZone}"`);
  }

  const rawLogLevel = (env.LOG_LEVEL ?? '').trim().toLowerCase();
  let logLevel = LOG_LEVEL_ALIASES[rawLogLevel] ?? (rawLogLevel || 'info');
  if (!LOG_LEVELS.has(logLevel)) {
    warnings.push(`LOG_LEVEL "${env.LOG_LEVEL}" is not a known level: using info`);
    logLevel = 'info';
  }

  return {
    config: {
      token,
      sourceChannelIds,
      routing: { routes, defaultForumIds },
      threadLinksFile: (env.THREAD_LINKS_FILE ?? '').trim() || DEFAULT_THREAD_LINKS_FILE,
      timeZone,
      logLevel,
    },
    errors,
    warnings,
    infos,
  };
}
