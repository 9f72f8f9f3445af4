import dotenv from 'dotenv';
import { ConfigError } from './errors';

dotenv.config();

export interface AppConfig {
  region: string;
  bucket?: string;
  pollIntervalMs: number;
  ffmpegPath: string;
}

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_POLL_INTERVAL_MS = 10000;
export const DEFAULT_LOG_LEVEL = 'info';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    region: env.AWS_REGION || DEFAULT_REGION,
    bucket: env.TRANSCRIBE_BUCKET || undefined,
    pollIntervalMs: parseNonNegativeInt(
      'TRANSCRIBE_POLL_INTERVAL_MS',
      env.TRANSCRIBE_POLL_INTERVAL_MS,
      DEFAULT_POLL_INTERVAL_MS
    ),
    ffmpegPath: env.FFMPEG_PATH || 'ffmpeg'
  };
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
}

function parseNonNegativeInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}
