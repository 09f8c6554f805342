import { createHmac, timingSafeEqual } from 'node:crypto';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CursorPayloadDto } from '../dto/cursor-payload.dto';
import { parseMicrosecondTimestamp, toMicrosecondTimestamp } from '../../../common/utils/timestamp.util';
import { CursorError } from './task-query.errors';
import type { TaskCursor } from './task-query';

export const CURSOR_VERSION = 1;
export const DEFAULT_CURSOR_TTL_SECONDS = 24 * 60 * 60;

export type CursorSecret = string | Buffer;

export interface CursorPayload {
  v: number;
  /** RFC3339, UTC, microsecond precision. */
  createdAt: string;
  id: string;
  projectId: string;
  qhash: string;
  /** Issued-at, unix seconds. */
  iat: number;
}

export interface CursorExpectation {
  projectId: string;
  qhash: string;
  now: Date;
  ttlSeconds: number;
}

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

/**
 * `base64url(JSON(payload)) + "." + base64url(HMAC-SHA256(secret, encodedPayload))`,
 * both without padding.
 */
export function encodeCursor(payload: CursorPayload, secret: CursorSecret): string {
  assertSecret(secret);

  const document: CursorPayload = {
    v: payload.v,
    createdAt: toMicrosecondTimestamp(payload.createdAt),
    id: payload.id,
    projectId: payload.projectId,
    qhash: payload.qhash,
    iat: payload.iat,
  };
  const encodedPayload = Buffer.from(JSON.stringify(document), 'utf8').toString('base64url');

  return `${encodedPayload}.${sign(encodedPayload, secret)}`;
}

/**
 * Checks format and signature only. Expiry and query binding are checked by
 * {@link verifyCursor}, which needs the current request.
 */
export function decodeCursor(cursor: string, secret: CursorSecret): CursorPayload {
  assertSecret(secret);

  const segments = cursor.split('.');
  if (segments.length !== 2) {
    throw new CursorError('INVALID_FORMAT');
  }
  const [encodedPayload, signature] = segments;
  if (!BASE64URL_SEGMENT.test(encodedPayload) || !BASE64URL_SEGMENT.test(signature)) {
    throw new CursorError('INVALID_FORMAT');
  }

  // Compared as encoded text: the last base64url character carries padding
  // bits that a byte-level comparison would ignore.
  const expected = Buffer.from(sign(encodedPayload, secret), 'ascii');
  const received = Buffer.from(signature, 'ascii');
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new CursorError('INVALID_SIGNATURE');
  }

  return toPayload(parseDocument(encodedPayload));
}

export function verifyCursor(payload: CursorPayload, expectation: CursorExpectation): TaskCursor {
  const nowSeconds = Math.floor(expectation.now.getTime() / 1000);
  if (nowSeconds - payload.iat > expectation.ttlSeconds) {
    throw new CursorError('EXPIRED');
  }

  if (payload.projectId !== expectation.projectId || payload.qhash !== expectation.qhash) {
    throw new CursorError('QUERY_MISMATCH');
  }

  return {
    createdAt: payload.createdAt,
    id: payload.id,
    projectId: payload.projectId,
    qhash: payload.qhash,
    issuedAt: payload.iat,
  };
}

function sign(encodedPayload: string, secret: CursorSecret): string {
  return createHmac('sha256', secret).update(encodedPayload).digest('base64url');
}

function assertSecret(secret: CursorSecret): void {
  if (secret.length === 0) {
    throw new Error('Cursor secret must not be empty');
  }
}

function parseDocument(encodedPayload: string): unknown {
  try {
    return JSON.parse(Buffer.from(encodedPayload, 'base64url').toString('utf8'));
  } catch {
    throw new CursorError('INVALID_FORMAT');
  }
}

function toPayload(document: unknown): CursorPayload {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new CursorError('INVALID_FORMAT');
  }

  const dto = plainToInstance(CursorPayloadDto, document);
  if (validateSync(dto).length > 0 || dto.v !== CURSOR_VERSION) {
    throw new CursorError('INVALID_FORMAT');
  }

  const createdAt = parseMicrosecondTimestamp(dto.createdAt);
  if (createdAt === null) {
    throw new CursorError('INVALID_FORMAT');
  }

  return {
    v: dto.v,
    createdAt,
    id: dto.id,
    projectId: dto.projectId,
    qhash: dto.qhash,
    iat: dto.iat,
  };
}
