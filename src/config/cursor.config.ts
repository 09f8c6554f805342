import { Logger } from '@nestjs/common';
import { registerAs } from '@nestjs/config';
import { parseDurationToSeconds } from '../common/utils/time.util';
import { DEFAULT_CURSOR_TTL_SECONDS } from '../modules/tasks/query/cursor-codec';

export interface CursorConfig {
  secret: string;
  ttlSeconds: number;
}

export const DEV_CURSOR_SECRET = 'dev-only-secret-change-me';

export const PLACEHOLDER_CURSOR_SECRETS: readonly string[] = [
  'default-secret-change-in-production',
  DEV_CURSOR_SECRET,
  'changeme',
  'change-me',
  'secret',
];

const PRODUCTION_LIKE = ['production', 'staging'];

const logger = new Logger('CursorConfig');

/**
 * Resolves the cursor signing secret once, at startup.
 * Production-like environments refuse to start without a real secret;
 * anywhere else a missing secret falls back to a development value.
 */
export function resolveCursorSecret(appEnv: string | undefined, raw: string | undefined): string {
  const secret = raw?.trim() ?? '';

  if (PRODUCTION_LIKE.includes(appEnv ?? '')) {
    if (secret === '') {
      throw new Error('CURSOR_SECRET must be set in production');
    }
    if (PLACEHOLDER_CURSOR_SECRETS.includes(secret)) {
      throw new Error('CURSOR_SECRET must not be a placeholder value in production');
    }
    return secret;
  }

  if (secret === '') {
    logger.warn('CURSOR_SECRET is not set, using the development default (not for production)');
    return DEV_CURSOR_SECRET;
  }
  return secret;
}

export default registerAs('cursor', (): CursorConfig => ({
  secret: resolveCursorSecret(process.env.APP_ENV ?? process.env.NODE_ENV, process.env.CURSOR_SECRET),
  ttlSeconds: parseDurationToSeconds(process.env.CURSOR_TTL, DEFAULT_CURSOR_TTL_SECONDS),
}));
