/**
 * Entry point: loads `.env`, then starts the Discord bot.
 */
import 'dotenv/config';
import pino from 'pino';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

log.info('component:discord starting');
await import('./index.js');
