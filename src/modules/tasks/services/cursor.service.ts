import { Inject, Injectable } from '@nestjs/common';
import { CursorConfig } from '../../../config/cursor.config';
import { TaskRow } from '../interfaces/task-row.interface';
import {
  CURSOR_VERSION,
  CursorPayload,
  decodeCursor,
  encodeCursor,
  verifyCursor,
} from '../query/cursor-codec';
import { CursorBinding, CursorMinter } from '../query/pagination';
import { CursorOpener, TaskCursor } from '../query/task-query';
import { Clock, CLOCK, CURSOR_OPTIONS } from '../tasks.constants';

/**
 * Cursor codec bound to the process-wide signing secret, TTL and clock.
 */
@Injectable()
export class CursorService implements CursorOpener, CursorMinter {
  constructor(
    @Inject(CURSOR_OPTIONS)
    private readonly options: CursorConfig,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {
    if (options.secret.length === 0) {
      throw new Error('Cursor secret must not be empty');
    }
  }

  encode(payload: CursorPayload): string {
    return encodeCursor(payload, this.options.secret);
  }

  decode(cursor: string): CursorPayload {
    return decodeCursor(cursor, this.options.secret);
  }

  open(cursor: string, expected: CursorBinding): TaskCursor {
    return verifyCursor(this.decode(cursor), {
      ...expected,
      now: this.clock.now(),
      ttlSeconds: this.options.ttlSeconds,
    });
  }

  mint(row: Pick<TaskRow, 'id' | 'createdAt'>, binding: CursorBinding): string {
    return this.encode({
      v: CURSOR_VERSION,
      createdAt: row.createdAt,
      id: row.id,
      projectId: binding.projectId,
      qhash: binding.qhash,
      iat: Math.floor(this.clock.now().getTime() / 1000),
    });
  }
}
