import 'dotenv/config';
import pino from 'pino';

import { parseConfig } from './config.js';
import type { ParseResult } from './config.js';
import { startDiscordBot } from './discord.js';
import { ThreadLinkStore } from './forums/link-store.js';
import { globalMetrics } from './observability/metrics.js';

// Level is applied from the validated config once it has been parsed.
const log = pino({ name: 'forum-post-maker', level: 'info' });

let parsedConfig: ParseResult;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const error of parsedConfig.errors) {
  log.error(error);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;
log.level = cfg.logLevel;

log.info(
  {
    sourceChannelIds: [...cfg.sourceChannelIds],
    routes: cfg.routing.routes,
    defaultForumIds: cfg.routing.defaultForumIds,
    timeZone: cfg.timeZone,
  },
  'Routing configuration loaded',
);

const links = new ThreadLinkStore({ filePath: cfg.threadLinksFile, log, metrics: globalMetrics });
await links.load();
log.info({ filePath: cfg.threadLinksFile, linkedMessages: links.size() }, 'Thread links ready');

const { client, orchestrator } = await startDiscordBot({
  token: cfg.token,
  sourceChannelIds: cfg.sourceChannelIds,
  routing: cfg.routing,
  timeZone: cfg.timeZone,
  links,
  metrics: globalMetrics,
  log,
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(
    { signal, pendingMessages: orchestrator.pendingMessages(), metrics: globalMetrics.snapshot() },
    'Shutting down',
  );
  await client.destroy();
  process.exit(0);
}
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

log.info('Forum post maker started');
