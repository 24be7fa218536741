// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type LoggerLike = {
  debug?(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
};

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export type RouteRule = {
  label: string;
  roleId: string;
  forumIds: string[];
};

/** Rules are tested in array order; that order is the routing priority. */
export type RoutingTable = {
  routes: RouteRule[];
  defaultForumIds: string[];
};

// ---------------------------------------------------------------------------
// Platform entities
// ---------------------------------------------------------------------------

export type ForumRef = {
  id: string;
  name: string;
  guildId: string;
};

export type ThreadRef = {
  id: string;
  name: string;
  archived: boolean;
};

export type CreateThreadInput = {
  name: string;
  content: string;
  reason: string;
};

/**
 * The thread CRUD surface the orchestrator needs from the chat platform.
 * Implementations throw `PlatformError` for failures they can classify.
 */
export type ForumPlatform = {
  resolveForum(guildId: string, forumId: string): ForumRef | null;
  listActiveThreads(forumId: string): Promise<ThreadRef[]>;
  listArchivedThreads(forumId: string, limit: number): AsyncIterable<ThreadRef>;
  createThread(forumId: string, input: CreateThreadInput): Promise<ThreadRef>;
  /** Resolves a channel by ID; null when the channel exists but is not a thread. */
  fetchThread(channelId: string): Promise<ThreadRef | null>;
  deleteThread(threadId: string, reason: string): Promise<void>;
};

// ---------------------------------------------------------------------------
// Triggers
// ---------------------------------------------------------------------------

export type CreationTrigger = {
  messageId: string;
  guildId: string;
  channelId: string;
  channelName: string;
  authorId: string;
  authorTag: string;
  authorDisplayName: string;
  authorRoleIds: ReadonlySet<string>;
  createdAt: Date;
  permalink: string;
};

export type DeletionTrigger = {
  messageId: string;
  channelId?: string;
};

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type ForumOutcome =
  | { forumId: string; status: 'created'; threadId: string; threadName: string }
  | { forumId: string; status: 'skipped'; existingThreadId: string; existingThreadName: string }
  | { forumId: string; status: 'failed'; errorKind: PlatformErrorKind; error: string };

export type ThreadCleanupOutcome =
  | { threadId: string; status: 'deleted' }
  | { threadId: string; status: 'missing' }
  | { threadId: string; status: 'skipped' }
  | { threadId: string; status: 'failed'; errorKind: PlatformErrorKind; error: string };

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type PlatformErrorKind = 'forbidden' | 'not_found' | 'transport' | 'other';

export class PlatformError extends Error {
  readonly kind: PlatformErrorKind;

  constructor(kind: PlatformErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlatformError';
    this.kind = kind;
  }
}
