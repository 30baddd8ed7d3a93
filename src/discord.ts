import { Client, GatewayIntentBits, Partials } from 'discord.js';
import { isAllowlisted } from './discord/allowlist.js';
import { handleCommand } from './discord/commands.js';
import type { CommandDeps } from './discord/commands.js';
import { createStatusPoster } from './discord/status-channel.js';
import type { StatusPoster, StatusRef } from './discord/status-channel.js';
import type { LoggerLike } from './timers/types.js';

const DISCORD_MESSAGE_LIMIT = 2000;

export type HandlerParams = {
  allowUserIds: Set<string>;
  commands: CommandDeps;
  log?: LoggerLike;
};

export type BotParams = HandlerParams & {
  token: string;
  statusChannel?: string;
  botDisplayName?: string;
};

/** The parts of a discord.js Message the handler reads. */
export type IncomingMessage = {
  author: { id: string; bot: boolean };
  channelId: string;
  content: string;
  reply(content: string): Promise<unknown>;
};

function clampReply(text: string): string {
  if (text.length <= DISCORD_MESSAGE_LIMIT) return text;
  return `${text.slice(0, DISCORD_MESSAGE_LIMIT - 4)}\n...`;
}

export function createMessageCreateHandler(params: HandlerParams, statusRef?: StatusRef) {
  return async (msg: IncomingMessage) => {
    try {
      if (msg.author.bot) return;
      if (!isAllowlisted(params.allowUserIds, msg.author.id)) return;

      const reply = await handleCommand(
        { userId: msg.author.id, channelId: msg.channelId, content: msg.content },
        params.commands,
      );
      if (reply === null) return;
      await msg.reply(clampReply(reply));
    } catch (err) {
      params.log?.error({ err, userId: msg.author.id }, 'discord:messageCreate failed');
      const command = msg.content.trim().split(/\s+/)[0] ?? '';
      await statusRef?.current?.handlerError({ userId: msg.author.id, command }, err);
    }
  };
}

export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    partials: [Partials.Channel],
  });
}

function resolveStatusChannel(client: Client, nameOrId: string, opts: { botDisplayName?: string; log?: LoggerLike }): StatusPoster | null {
  // Try by ID first, then by name across all guilds.
  const byId = client.channels.cache.get(nameOrId);
  if (byId?.isTextBased() && !byId.isDMBased()) return createStatusPoster(byId, opts);

  for (const guild of client.guilds.cache.values()) {
    const ch = guild.channels.cache.find(
      (c) => c.isTextBased() && c.name === nameOrId,
    );
    if (ch && ch.isTextBased()) return createStatusPoster(ch, opts);
  }
  return null;
}

/** Logs in, waits for ready, and resolves the status channel into `statusRef`. */
export async function startDiscordBot(client: Client, params: BotParams, statusRef: StatusRef): Promise<void> {
  client.on('messageCreate', createMessageCreateHandler(params, statusRef));

  await client.login(params.token);

  // Wait for cache to be ready before resolving the status channel.
  await new Promise<void>((resolve) => {
    if (client.isReady()) {
      resolve();
    } else {
      client.once('ready', () => resolve());
    }
  });
  params.log?.info({ user: client.user?.tag }, 'discord:ready');

  if (params.statusChannel) {
    statusRef.current = resolveStatusChannel(client, params.statusChannel, {
      botDisplayName: params.botDisplayName,
      log: params.log,
    });
    if (statusRef.current) {
      await statusRef.current.online();
    } else {
      params.log?.warn({ statusChannel: params.statusChannel }, 'status-channel: channel not found, status posting disabled');
    }
  }
}
