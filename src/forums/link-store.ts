import fs from 'node:fs/promises';
import path from 'node:path';
import { KeyedQueue } from '../group-queue.js';
import type { MetricsRegistry } from '../observability/metrics.js';
import type { LoggerLike } from './types.js';

export type ThreadLinks = Record<string, string[]>;

export type ThreadLinkStoreOptions = {
  filePath: string;
  log?: LoggerLike;
  metrics?: MetricsRegistry;
};

const STORE_KEY = 'thread-links';

// Snowflakes written as bare numbers would lose precision in JSON.parse;
// quote any long integer that sits in an array slot before parsing.
const BARE_ID_RE = /([[,]\s*)(\d{16,})(?=\s*[,\]])/g;

/** Parse a links file body. Returns null when the shape is wrong. */
export function parseThreadLinks(raw: string): ThreadLinks | null {
  const parsed: unknown = JSON.parse(raw.replace(BARE_ID_RE, '$1"$2"'));
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null;

  const links: ThreadLinks = {};
  for (const [messageId, value] of Object.entries(parsed)) {
    if (!Array.isArray(value)) return null;
    const threadIds: string[] = [];
    for (const id of value) {
      if (typeof id === 'string' && /^\d+$/.test(id)) threadIds.push(id);
      else if (typeof id === 'number' && Number.isSafeInteger(id)) threadIds.push(String(id));
      else return null;
    }
    if (threadIds.length > 0) links[messageId] = [...new Set(threadIds)];
  }
  return links;
}

/**
 * Durable `messageId -> threadIds` mapping. Every operation, including its
 * flush to disk, finishes before the next one starts. A failed flush is
 * logged and leaves the in-memory state in place.
 */
export class ThreadLinkStore {
  private readonly filePath: string;
  private readonly log?: LoggerLike;
  private readonly metrics?: MetricsRegistry;
  private readonly queue = new KeyedQueue();
  private links = new Map<string, Set<string>>();

  constructor(opts: ThreadLinkStoreOptions) {
    this.filePath = opts.filePath;
    this.log = opts.log;
    this.metrics = opts.metrics;
  }

  load(): Promise<void> {
    return this.queue.run(STORE_KEY, async () => {
      let raw: string;
      try {
        raw = await fs.readFile(this.filePath, 'utf8');
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
          this.log?.error({ err, filePath: this.filePath }, 'links:load read failed, starting empty');
        }
        this.links = new Map();
        return;
      }

      let parsed: ThreadLinks | null;
      try {
        parsed = parseThreadLinks(raw);
      } catch (err) {
        this.log?.error({ err, filePath: this.filePath }, 'links:load parse failed, starting empty');
        this.links = new Map();
        return;
      }
      if (!parsed) {
        this.log?.error({ filePath: this.filePath }, 'links:load unexpected file shape, starting empty');
        this.links = new Map();
        return;
      }

      this.links = new Map(Object.entries(parsed).map(([messageId, ids]) => [messageId, new Set(ids)]));
      this.log?.info({ filePath: this.filePath, messages: this.links.size }, 'links:load complete');
    });
  }

  add(messageId: string, threadId: string): Promise<void> {
    return this.queue.run(STORE_KEY, async () => {
      let threadIds = this.links.get(messageId);
      if (!threadIds) {
        threadIds = new Set();
        this.links.set(messageId, threadIds);
      }
      if (threadIds.has(threadId)) return;
      threadIds.add(threadId);
      await this.flush();
    });
  }

  popAll(messageId: string): Promise<string[]> {
    return this.queue.run(STORE_KEY, async () => {
      const threadIds = this.links.get(messageId);
      if (!threadIds) return [];
      this.links.delete(messageId);
      if (threadIds.size > 0) await this.flush();
      return [...threadIds];
    });
  }

  get(messageId: string): string[] {
    return [...(this.links.get(messageId) ?? [])];
  }

  size(): number {
    return this.links.size;
  }

  private snapshot(): ThreadLinks {
    const out: ThreadLinks = {};
    for (const [messageId, threadIds] of this.links) {
      if (threadIds.size > 0) out[messageId] = [...threadIds];
    }
    return out;
  }

  private async flush(): Promise<void> {
    const tmpPath = `${this.filePath}.tmp.${process.pid}`;
    try {
      const dir = path.dirname(this.filePath);
      if (dir) await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(this.snapshot(), null, 2) + '\n', 'utf8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      this.metrics?.increment('links.flush_failed');
      this.log?.error({ err, filePath: this.filePath }, 'links:flush failed');
    }
  }
}
