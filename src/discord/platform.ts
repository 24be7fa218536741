import { ChannelType, DiscordAPIError, HTTPError, RESTJSONErrorCodes } from 'discord.js';
import type { AnyThreadChannel, Client, FetchedThreadsMore, ForumChannel } from 'discord.js';
import { classifyPlatformError, errorMessage } from '../forums/errors.js';
import { PlatformError } from '../forums/types.js';
import type { CreateThreadInput, ForumPlatform, ForumRef, ThreadRef } from '../forums/types.js';

/** Discord caps one archived-threads page at 100. */
const ARCHIVED_PAGE_MAX = 100;

const NOT_FOUND_CODES = new Set<number | string>([RESTJSONErrorCodes.UnknownChannel]);
const FORBIDDEN_CODES = new Set<number | string>([
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions,
]);

/** Map a discord.js failure onto the platform error kinds. */
export function toPlatformError(err: unknown, context: string): PlatformError {
  if (err instanceof PlatformError) return err;

  const detail = `${context}: ${errorMessage(err)}`;
  if (err instanceof DiscordAPIError) {
    if (NOT_FOUND_CODES.has(err.code) || err.status === 404) return new PlatformError('not_found', detail, { cause: err });
    if (FORBIDDEN_CODES.has(err.code) || err.status === 403) return new PlatformError('forbidden', detail, { cause: err });
    if (err.status >= 500) return new PlatformError('transport', detail, { cause: err });
    return new PlatformError('other', detail, { cause: err });
  }
  if (err instanceof HTTPError) return new PlatformError('transport', detail, { cause: err });
  return new PlatformError(classifyPlatformError(err), detail, { cause: err });
}

type ThreadLike = { id: string; name: string; archived: boolean | null };

function toThreadRef(thread: ThreadLike): ThreadRef {
  return { id: thread.id, name: thread.name, archived: thread.archived ?? false };
}

/** `ForumPlatform` over a logged-in discord.js client. */
export class DiscordForumPlatform implements ForumPlatform {
  constructor(private readonly client: Client) {}

  resolveForum(guildId: string, forumId: string): ForumRef | null {
    const ch = this.client.guilds.cache.get(guildId)?.channels.cache.get(forumId);
    if (!ch || ch.type !== ChannelType.GuildForum) return null;
    return { id: ch.id, name: ch.name, guildId: ch.guildId };
  }

  async listActiveThreads(forumId: string): Promise<ThreadRef[]> {
    const forum = this.forumOrThrow(forumId);
    return [...forum.threads.cache.values()].filter((t) => !t.archived).map(toThreadRef);
  }

  async *listArchivedThreads(forumId: string, limit: number): AsyncIterable<ThreadRef> {
    const forum = this.forumOrThrow(forumId);
    let remaining = limit;
    let before: AnyThreadChannel | undefined;

    while (remaining > 0) {
      let page: FetchedThreadsMore;
      try {
        page = await forum.threads.fetchArchived({
          type: 'public',
          limit: Math.min(remaining, ARCHIVED_PAGE_MAX),
          ...(before ? { before } : {}),
        });
      } catch (err) {
        throw toPlatformError(err, `list archived threads of ${forumId}`);
      }

      const threads = [...page.threads.values()];
      for (const thread of threads) {
        yield toThreadRef(thread);
      }
      remaining -= threads.length;
      if (!page.hasMore || threads.length === 0) return;
      before = threads[threads.length - 1];
    }
  }

  async createThread(forumId: string, input: CreateThreadInput): Promise<ThreadRef> {
    const forum = this.forumOrThrow(forumId);
    try {
      const thread = await forum.threads.create({
        name: input.name,
        message: { content: input.content },
        reason: input.reason,
      });
      return toThreadRef(thread);
    } catch (err) {
      throw toPlatformError(err, `create thread in ${forumId}`);
    }
  }

  async fetchThread(channelId: string): Promise<ThreadRef | null> {
    try {
      const ch = await this.client.channels.fetch(channelId);
      if (!ch) throw new PlatformError('not_found', `channel ${channelId} not found`);
      return ch.isThread() ? toThreadRef(ch) : null;
    } catch (err) {
      throw toPlatformError(err, `fetch channel ${channelId}`);
    }
  }

  async deleteThread(threadId: string, reason: string): Promise<void> {
    try {
      const ch = await this.client.channels.fetch(threadId);
      if (!ch || !ch.isThread()) throw new PlatformError('not_found', `thread ${threadId} not found`);
      await ch.delete(reason);
    } catch (err) {
      throw toPlatformError(err, `delete thread ${threadId}`);
    }
  }

  private forumOrThrow(forumId: string): ForumChannel {
    const ch = this.client.channels.cache.get(forumId);
    if (!ch || ch.type !== ChannelType.GuildForum) {
      throw new PlatformError('not_found', `forum ${forumId} not found`);
    }
    return ch;
  }
}
