import { TaskRow } from '../interfaces/task-row.interface';
import { computeFingerprint } from './query-fingerprint';
import type { TaskQuery } from './task-query';

export interface CursorBinding {
  projectId: string;
  qhash: string;
}

export interface CursorMinter {
  mint(row: Pick<TaskRow, 'id' | 'createdAt'>, binding: CursorBinding): string;
}

export interface TaskPage<T> {
  items: T[];
  limit: number;
  nextCursor?: string;
}

/**
 * Turns an over-fetched result (`limit + 1` rows) into one page.
 *
 * The next cursor points at `rows[limit - 1]`, the last row the caller
 * actually receives. The probe row at `rows[limit]` only signals that more
 * rows exist; seeking past it would skip it on the next page.
 */
export function paginate<T extends Pick<TaskRow, 'id' | 'createdAt'>>(
  rows: readonly T[],
  query: TaskQuery,
  projectId: string,
  minter: CursorMinter,
): TaskPage<T> {
  if (rows.length <= query.limit) {
    return { items: [...rows], limit: query.limit };
  }

  const lastReturned = rows[query.limit - 1];
  const nextCursor = minter.mint(lastReturned, {
    projectId,
    qhash: computeFingerprint(query, projectId),
  });

  return { items: rows.slice(0, query.limit), limit: query.limit, nextCursor };
}
