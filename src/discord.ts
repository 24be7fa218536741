import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import type { GuildMember, Message, PartialMessage } from 'discord.js';
import { DiscordForumPlatform } from './discord/platform.js';
import type { ThreadLinkStore } from './forums/link-store.js';
import { ThreadOrchestrator } from './forums/orchestrator.js';
import type { CreationTrigger, LoggerLike, RoutingTable } from './forums/types.js';
import type { MetricsRegistry } from './observability/metrics.js';

export type BotParams = {
  token: string;
  sourceChannelIds: ReadonlySet<string>;
  routing: RoutingTable;
  timeZone: string;
  links: ThreadLinkStore;
  metrics?: MetricsRegistry;
  log?: LoggerLike;
};

export type HandlerParams = {
  orchestrator: Pick<ThreadOrchestrator, 'handleCreation' | 'handleDeletion'>;
  sourceChannelIds: ReadonlySet<string>;
  log?: LoggerLike;
};

export function toCreationTrigger(message: Message<true>, member: GuildMember): CreationTrigger {
  return {
    messageId: message.id,
    guildId: message.guildId,
    channelId: message.channelId,
    channelName: message.channel.name,
    authorId: message.author.id,
    authorTag: message.author.tag,
    authorDisplayName: member.displayName,
    authorRoleIds: new Set(member.roles.cache.keys()),
    createdAt: message.createdAt,
    permalink: message.url,
  };
}

export function createMessageCreateHandler(params: HandlerParams): (message: Message) => Promise<void> {
  return async (message) => {
    try {
      if (message.author.bot || !message.inGuild()) return;
      if (!params.sourceChannelIds.has(message.channelId)) return;

      // The gateway normally includes the member; only fall back to a fetch
      // when it did not, so the common path enqueues before yielding.
      const member = message.member ?? (await message.guild.members.fetch(message.author.id));
      await params.orchestrator.handleCreation(toCreationTrigger(message, member));
    } catch (err) {
      params.log?.error({ err, messageId: message.id, channelId: message.channelId }, 'discord:messageCreate handler failed');
    }
  };
}

/** Fires for uncached messages too, since the client enables `Partials.Message`. */
export function createMessageDeleteHandler(
  params: HandlerParams,
): (message: Message | PartialMessage) => Promise<void> {
  return async (message) => {
    try {
      await params.orchestrator.handleDeletion({ messageId: message.id, channelId: message.channelId });
    } catch (err) {
      params.log?.error({ err, messageId: message.id }, 'discord:messageDelete handler failed');
    }
  };
}

export function createMessageDeleteBulkHandler(
  params: HandlerParams,
): (messages: ReadonlyMap<string, Message | PartialMessage>) => Promise<void> {
  const onDelete = createMessageDeleteHandler(params);
  return async (messages) => {
    await Promise.all([...messages.values()].map((m) => onDelete(m)));
  };
}

export async function startDiscordBot(params: BotParams): Promise<{ client: Client; orchestrator: ThreadOrchestrator }> {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.GuildMembers,
    ],
    partials: [Partials.Message],
  });

  const orchestrator = new ThreadOrchestrator({
    platform: new DiscordForumPlatform(client),
    links: params.links,
    routing: params.routing,
    timeZone: params.timeZone,
    metrics: params.metrics,
    log: params.log,
  });

  const handlerParams: HandlerParams = {
    orchestrator,
    sourceChannelIds: params.sourceChannelIds,
    log: params.log,
  };
  client.on(Events.MessageCreate, createMessageCreateHandler(handlerParams));
  client.on(Events.MessageDelete, createMessageDeleteHandler(handlerParams));
  client.on(Events.MessageBulkDelete, createMessageDeleteBulkHandler(handlerParams));

  await client.login(params.token);

  // Wait for the guild cache so forum lookups resolve on the first event.
  await new Promise<void>((resolve) => {
    if (client.isReady()) {
      resolve();
    } else {
      client.once(Events.ClientReady, () => resolve());
    }
  });

  params.log?.info(
    { userId: client.user?.id, tag: client.user?.tag, guilds: client.guilds.cache.size },
    'discord:ready',
  );
  return { client, orchestrator };
}
