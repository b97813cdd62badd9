import * as dotenv from 'dotenv';
import { ConfigError } from './errors';

dotenv.config();

const required = [
  'DISCORD_TOKEN',
  'GUILD_ID',
  'CHANNEL_ID',
  'LEADERBOARD_POST_CHANNEL_ID',
  'TZ',
] as const;

type RequiredKey = typeof required[number];

export type Env = Record<RequiredKey, string> & {
  ENABLE_INGEST: boolean;
  AUTO_POST_ENABLED: boolean;
  AUTO_POST_CRON: string;
  WORDLE_BOT_NAME: string;
  ROUND_EPOCH: string;
  DB_FILE: string;
  LEADERBOARD_LIMIT: number;
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const base: Record<RequiredKey, string> = {
    DISCORD_TOKEN: source.DISCORD_TOKEN ?? '',
    GUILD_ID: source.GUILD_ID ?? '',
    CHANNEL_ID: source.CHANNEL_ID ?? '',
    LEADERBOARD_POST_CHANNEL_ID: source.LEADERBOARD_POST_CHANNEL_ID ?? '',
    TZ: source.TZ ?? '',
  };

  for (const key of required) {
    if (!base[key]) {
      throw new ConfigError(`Missing env: ${key}`, key);
    }
  }

  const epoch = source.ROUND_EPOCH || '2021-06-19';
  if (!ISO_DATE.test(epoch)) {
    throw new ConfigError(`ROUND_EPOCH must be YYYY-MM-DD, got "${epoch}"`, 'ROUND_EPOCH');
  }

  const limit = Number(source.LEADERBOARD_LIMIT || 10);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ConfigError(`LEADERBOARD_LIMIT must be a positive integer, got "${source.LEADERBOARD_LIMIT}"`, 'LEADERBOARD_LIMIT');
  }

  const env: Env = {
    ...base,
    ENABLE_INGEST: flag(source.ENABLE_INGEST, false),
    AUTO_POST_ENABLED: flag(source.AUTO_POST_ENABLED, true),
    // Monday 00:01 in TZ
    AUTO_POST_CRON: source.AUTO_POST_CRON || '1 0 * * 1',
    WORDLE_BOT_NAME: (source.WORDLE_BOT_NAME || 'wordle').toLowerCase(),
    ROUND_EPOCH: epoch,
    DB_FILE: source.DB_FILE || 'data.sqlite',
    LEADERBOARD_LIMIT: limit,
  };

  return env;
}
