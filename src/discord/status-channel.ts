import { EmbedBuilder } from 'discord.js';
import type { ErrorReporter, LoggerLike, TimerErrorContext } from '../timers/types.js';

type Sendable = { send(opts: { embeds: EmbedBuilder[] }): Promise<unknown> };

export type StatusPoster = {
  online(): Promise<void>;
  offline(): Promise<void>;
  timerError(context: TimerErrorContext, err: unknown): Promise<void>;
  handlerError(context: { userId: string; command: string }, err: unknown): Promise<void>;
};

const Colors = {
  green: 0x57f287,
  gray: 0x95a5a6,
  red: 0xed4245,
  orange: 0xfee75c,
} as const;

export type StatusPosterOpts = {
  botDisplayName?: string;
  log?: LoggerLike;
};

function errorText(err: unknown): string {
  const text = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  return (text || '(unknown error)').slice(0, 4096);
}

export function createStatusPoster(channel: Sendable, opts?: StatusPosterOpts): StatusPoster {
  const name = opts?.botDisplayName ?? 'Bot';
  const log = opts?.log;
  const send = async (embed: EmbedBuilder) => {
    try {
      await channel.send({ embeds: [embed] });
    } catch (err) {
      log?.warn({ err }, 'status-channel: failed to post status embed');
    }
  };

  return {
    async online() {
      await send(
        new EmbedBuilder()
          .setColor(Colors.green)
          .setTitle('Bot Online')
          .setDescription(`${name} is connected and ready.`)
          .setTimestamp(),
      );
    },

    async offline() {
      await send(
        new EmbedBuilder()
          .setColor(Colors.gray)
          .setTitle('Bot Offline')
          .setDescription(`${name} is shutting down.`)
          .setTimestamp(),
      );
    },

    async timerError(context, err) {
      // A broken wait ends the job; a failed callback only skips one run.
      const color = context.phase === 'wait' ? Colors.red : Colors.orange;
      await send(
        new EmbedBuilder()
          .setColor(color)
          .setTitle('Timer Error')
          .setDescription(errorText(err))
          .addFields(
            { name: 'Job', value: `#${context.jobId}`, inline: true },
            { name: 'Phase', value: context.phase, inline: true },
            { name: 'Spec', value: context.spec.slice(0, 1024) },
          )
          .setTimestamp(),
      );
    },

    async handlerError(context, err) {
      await send(
        new EmbedBuilder()
          .setColor(Colors.red)
          .setTitle('Handler Failure')
          .setDescription(errorText(err))
          .addFields(
            { name: 'Command', value: context.command || '(unknown)', inline: true },
            { name: 'User', value: context.userId, inline: true },
          )
          .setTimestamp(),
      );
    },
  };
}

// Mutable ref: the poster only exists once the client is ready.
export type StatusRef = { current: StatusPoster | null };

/** Adapts the status channel to the scheduler's error sink. */
export function statusErrorReporter(ref: StatusRef, log?: LoggerLike): ErrorReporter {
  return async (err, context) => {
    log?.warn({ err, ...context }, 'timer:error reported');
    await ref.current?.timerError(context, err);
  };
}
