import { KeyedQueue } from '../group-queue.js';
import type { MetricsRegistry } from '../observability/metrics.js';
import { classifyPlatformError, errorMessage } from './errors.js';
import type { ThreadLinkStore } from './link-store.js';
import { routeForumIds, selectForums } from './router.js';
import { buildThreadName, DEFAULT_TIME_ZONE } from './thread-name.js';
import { findExistingThread } from './thread-resolver.js';
import type {
  CreationTrigger,
  DeletionTrigger,
  ForumOutcome,
  ForumPlatform,
  ForumRef,
  LoggerLike,
  RoutingTable,
  ThreadCleanupOutcome,
} from './types.js';

export type ThreadOrchestratorOptions = {
  platform: ForumPlatform;
  links: Pick<ThreadLinkStore, 'add' | 'popAll'>;
  routing: RoutingTable;
  timeZone?: string;
  metrics?: MetricsRegistry;
  log?: LoggerLike;
};

export function deletionReason(messageId: string): string {
  return `Source message ${messageId} deleted; auto-clean thread.`;
}

export function creationReason(trigger: CreationTrigger): string {
  return `Triggered by message in #${trigger.channelName} from ${trigger.authorTag} (${trigger.authorId})`;
}

/**
 * Event handlers for thread creation and cascade deletion.
 *
 * Both paths for one message ID run through the same queue key, so a
 * deletion that arrives while its creation is still in flight waits for every
 * link to be recorded before it pops them.
 */
export class ThreadOrchestrator {
  private readonly platform: ForumPlatform;
  private readonly links: Pick<ThreadLinkStore, 'add' | 'popAll'>;
  private readonly routing: RoutingTable;
  private readonly timeZone: string;
  private readonly metrics?: MetricsRegistry;
  private readonly log?: LoggerLike;
  private readonly messageQueue = new KeyedQueue();

  constructor(opts: ThreadOrchestratorOptions) {
    this.platform = opts.platform;
    this.links = opts.links;
    this.routing = opts.routing;
    this.timeZone = opts.timeZone ?? DEFAULT_TIME_ZONE;
    this.metrics = opts.metrics;
    this.log = opts.log;
  }

  handleCreation(trigger: CreationTrigger): Promise<ForumOutcome[]> {
    return this.messageQueue.run(trigger.messageId, () => this.createThreads(trigger));
  }

  handleDeletion(trigger: DeletionTrigger): Promise<ThreadCleanupOutcome[]> {
    return this.messageQueue.run(trigger.messageId, () => this.deleteThreads(trigger));
  }

  /** Messages with a creation or deletion queued or in flight. */
  pendingMessages(): number {
    return this.messageQueue.size();
  }

  // -------------------------------------------------------------------------
  // Creation
  // -------------------------------------------------------------------------

  private async createThreads(trigger: CreationTrigger): Promise<ForumOutcome[]> {
    const forumIds = routeForumIds(trigger.authorRoleIds, this.routing);
    const forums = selectForums(
      forumIds,
      (forumId) => this.platform.resolveForum(trigger.guildId, forumId),
      this.log,
    );
    if (forums.length === 0) {
      this.metrics?.increment('routing.no_forum');
      this.log?.error(
        { messageId: trigger.messageId, authorId: trigger.authorId, configuredForumIds: forumIds },
        'forums:route no eligible forum (check role to forum mapping and DEFAULT_FORUM_IDS)',
      );
      return [];
    }

    const threadName = buildThreadName(trigger.authorDisplayName, trigger.createdAt, this.timeZone);
    const outcomes: ForumOutcome[] = [];
    for (const forum of forums) {
      outcomes.push(await this.createInForum(forum, threadName, trigger));
    }
    return outcomes;
  }

  private async createInForum(forum: ForumRef, threadName: string, trigger: CreationTrigger): Promise<ForumOutcome> {
    try {
      const existing = await findExistingThread(this.platform, forum.id, trigger.authorDisplayName, this.log);
      if (existing) {
        this.metrics?.increment('threads.skipped_existing');
        this.log?.info(
          { forumId: forum.id, forum: forum.name, threadId: existing.id, thread: existing.name },
          'forums:create skipped, thread already exists',
        );
        return {
          forumId: forum.id,
          status: 'skipped',
          existingThreadId: existing.id,
          existingThreadName: existing.name,
        };
      }

      const thread = await this.platform.createThread(forum.id, {
        name: threadName,
        content: trigger.permalink,
        reason: creationReason(trigger),
      });
      await this.links.add(trigger.messageId, thread.id);

      this.metrics?.increment('threads.created');
      this.log?.info(
        { forumId: forum.id, forum: forum.name, threadId: thread.id, thread: thread.name, messageId: trigger.messageId },
        'forums:create thread created',
      );
      return { forumId: forum.id, status: 'created', threadId: thread.id, threadName: thread.name };
    } catch (err) {
      const errorKind = classifyPlatformError(err);
      this.metrics?.increment(`threads.create_failed.${errorKind}`);
      this.log?.error(
        { err, errorKind, forumId: forum.id, forum: forum.name, messageId: trigger.messageId },
        'forums:create failed',
      );
      return { forumId: forum.id, status: 'failed', errorKind, error: errorMessage(err) };
    }
  }

  // -------------------------------------------------------------------------
  // Deletion
  // -------------------------------------------------------------------------

  private async deleteThreads(trigger: DeletionTrigger): Promise<ThreadCleanupOutcome[]> {
    const threadIds = await this.links.popAll(trigger.messageId);
    if (threadIds.length === 0) return [];

    const reason = deletionReason(trigger.messageId);
    const outcomes: ThreadCleanupOutcome[] = [];
    for (const threadId of threadIds) {
      outcomes.push(await this.deleteOne(threadId, trigger, reason));
    }
    return outcomes;
  }

  private async deleteOne(threadId: string, trigger: DeletionTrigger, reason: string): Promise<ThreadCleanupOutcome> {
    const { messageId, channelId } = trigger;
    try {
      const thread = await this.platform.fetchThread(threadId);
      if (!thread) {
        this.log?.warn({ threadId, messageId, channelId }, 'forums:delete linked channel is not a thread, skipped');
        return { threadId, status: 'skipped' };
      }
      await this.platform.deleteThread(threadId, reason);
      this.metrics?.increment('threads.deleted');
      this.log?.info({ threadId, thread: thread.name, messageId, channelId }, 'forums:delete thread deleted');
      return { threadId, status: 'deleted' };
    } catch (err) {
      const errorKind = classifyPlatformError(err);
      if (errorKind === 'not_found') {
        this.metrics?.increment('threads.delete_missing');
        this.log?.info({ threadId, messageId, channelId }, 'forums:delete thread already gone');
        return { threadId, status: 'missing' };
      }
      this.metrics?.increment(`threads.delete_failed.${errorKind}`);
      this.log?.error({ err, errorKind, threadId, messageId, channelId }, 'forums:delete failed');
      return { threadId, status: 'failed', errorKind, error: errorMessage(err) };
    }
  }
}
