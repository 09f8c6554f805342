import { createHmac } from 'node:crypto';
import {
  CursorPayload,
  decodeCursor,
  DEFAULT_CURSOR_TTL_SECONDS,
  encodeCursor,
  verifyCursor,
} from '../src/modules/tasks/query/cursor-codec';
import { CursorError } from '../src/modules/tasks/query/task-query.errors';
import { CursorService } from '../src/modules/tasks/services/cursor.service';
import { FIXED_NOW, fixedClock, PROJECT_ID, TEST_SECRET } from './test-utils';

const NOW_SECONDS = 1767225600;

function payload(overrides: Partial<CursorPayload> = {}): CursorPayload {
  return {
    v: 1,
    createdAt: '2026-01-01T09:00:00.123456Z',
    id: 'task-001',
    projectId: PROJECT_ID,
    qhash: 'qhash-1',
    iat: NOW_SECONDS,
    ...overrides,
  };
}

function signed(document: unknown, secret: string = TEST_SECRET): string {
  const encoded = Buffer.from(JSON.stringify(document), 'utf8').toString('base64url');
  const signature = createHmac('sha256', secret).update(encoded).digest('base64url');
  return `${encoded}.${signature}`;
}

function cursorErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof CursorError) return error.code;
    throw error;
  }
  return undefined;
}

describe('cursor codec', () => {
  it('should decode what it encoded', () => {
    const cursor = encodeCursor(payload(), TEST_SECRET);

    expect(decodeCursor(cursor, TEST_SECRET)).toEqual(payload());
  });

  it('should normalize createdAt to UTC microseconds', () => {
    const cursor = encodeCursor(payload({ createdAt: '2026-01-01T10:00:00.123456789+01:00' }), TEST_SECRET);

    expect(decodeCursor(cursor, TEST_SECRET).createdAt).toBe('2026-01-01T09:00:00.123456Z');
  });

  it('should be two unpadded base64url segments', () => {
    const cursor = encodeCursor(payload(), TEST_SECRET);

    expect(cursor).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
  });

  it('should reject a change to any single character', () => {
    const cursor = encodeCursor(payload(), TEST_SECRET);

    for (let index = 0; index < cursor.length; index++) {
      if (cursor[index] === '.') continue;
      const replacement = cursor[index] === 'A' ? 'B' : 'A';
      const tampered = cursor.slice(0, index) + replacement + cursor.slice(index + 1);

      expect(cursorErrorCode(() => decodeCursor(tampered, TEST_SECRET))).toBe('INVALID_SIGNATURE');
    }
  });

  it('should reject a cursor signed with another secret', () => {
    const cursor = encodeCursor(payload(), 'another-secret');

    expect(cursorErrorCode(() => decodeCursor(cursor, TEST_SECRET))).toBe('INVALID_SIGNATURE');
  });

  it.each(['', 'abc', 'a.b.c', 'a+b.c', 'abc.', '.abc'])('should reject %p as malformed', (cursor) => {
    expect(cursorErrorCode(() => decodeCursor(cursor, TEST_SECRET))).toBe('INVALID_FORMAT');
  });

  it('should reject a signed payload that is not JSON', () => {
    const encoded = Buffer.from('not json', 'utf8').toString('base64url');
    const signature = createHmac('sha256', TEST_SECRET).update(encoded).digest('base64url');

    expect(cursorErrorCode(() => decodeCursor(`${encoded}.${signature}`, TEST_SECRET))).toBe('INVALID_FORMAT');
  });

  it('should reject a signed payload of another version', () => {
    expect(cursorErrorCode(() => decodeCursor(signed(payload({ v: 2 })), TEST_SECRET))).toBe('INVALID_FORMAT');
  });

  it('should reject a signed payload with a missing field', () => {
    const { qhash: _qhash, ...withoutQhash } = payload();

    expect(cursorErrorCode(() => decodeCursor(signed(withoutQhash), TEST_SECRET))).toBe('INVALID_FORMAT');
  });

  it('should reject a signed payload with an unparseable createdAt', () => {
    expect(
      cursorErrorCode(() => decodeCursor(signed(payload({ createdAt: 'yesterday' })), TEST_SECRET)),
    ).toBe('INVALID_FORMAT');
  });

  it('should refuse an empty secret', () => {
    expect(() => encodeCursor(payload(), '')).toThrow('Cursor secret must not be empty');
  });

  describe('verifyCursor', () => {
    const expectation = {
      projectId: PROJECT_ID,
      qhash: 'qhash-1',
      now: FIXED_NOW,
      ttlSeconds: DEFAULT_CURSOR_TTL_SECONDS,
    };

    it('should accept a cursor exactly at its TTL', () => {
      const cursor = verifyCursor(payload({ iat: NOW_SECONDS - 86400 }), expectation);

      expect(cursor).toEqual({
        createdAt: '2026-01-01T09:00:00.123456Z',
        id: 'task-001',
        projectId: PROJECT_ID,
        qhash: 'qhash-1',
        issuedAt: NOW_SECONDS - 86400,
      });
    });

    it('should reject a cursor one second past its TTL', () => {
      expect(cursorErrorCode(() => verifyCursor(payload({ iat: NOW_SECONDS - 86401 }), expectation))).toBe(
        'EXPIRED',
      );
    });

    it('should reject a cursor issued for another project', () => {
      expect(
        cursorErrorCode(() => verifyCursor(payload({ projectId: 'project-2' }), expectation)),
      ).toBe('QUERY_MISMATCH');
    });

    it('should reject a cursor issued for other filters', () => {
      expect(cursorErrorCode(() => verifyCursor(payload({ qhash: 'qhash-2' }), expectation))).toBe(
        'QUERY_MISMATCH',
      );
    });
  });
});

describe('CursorService', () => {
  const binding = { projectId: PROJECT_ID, qhash: 'qhash-1' };
  const row = { id: 'task-002', createdAt: '2026-01-01T09:01:00.000000Z' };

  it('should open a cursor it minted', () => {
    const service = new CursorService({ secret: TEST_SECRET, ttlSeconds: 60 }, fixedClock());

    const cursor = service.open(service.mint(row, binding), binding);

    expect(cursor).toEqual({ ...row, ...binding, issuedAt: NOW_SECONDS });
  });

  it('should stamp iat from the clock', () => {
    const service = new CursorService({ secret: TEST_SECRET, ttlSeconds: 60 }, fixedClock());

    expect(service.decode(service.mint(row, binding)).iat).toBe(NOW_SECONDS);
  });

  it('should expire cursors after the configured TTL', () => {
    const minter = new CursorService({ secret: TEST_SECRET, ttlSeconds: 60 }, fixedClock());
    const later = new CursorService(
      { secret: TEST_SECRET, ttlSeconds: 60 },
      fixedClock(new Date(FIXED_NOW.getTime() + 61_000)),
    );

    expect(cursorErrorCode(() => later.open(minter.mint(row, binding), binding))).toBe('EXPIRED');
  });

  it('should refuse to start without a secret', () => {
    expect(() => new CursorService({ secret: '', ttlSeconds: 60 }, fixedClock())).toThrow(
      'Cursor secret must not be empty',
    );
  });
});
