import { createHash } from 'node:crypto';
import type { TaskQuery } from './task-query';

export type TaskQueryFilters = Pick<
  TaskQuery,
  'statuses' | 'priorities' | 'assigneeId' | 'dueDateFrom' | 'dueDateTo' | 'freeText'
>;

/**
 * Hash of the filter dimensions and the project a query is scoped to.
 * Sort, limit and cursor are not part of it: they move through the result
 * set without changing which rows belong to it.
 *
 * Multi-valued filters are sorted first, so `todo,done` and `done,todo`
 * fingerprint the same. The digest only depends on its input, so cursors
 * stay valid across restarts.
 */
export function computeFingerprint(filters: TaskQueryFilters, projectId: string): string {
  const canonical = JSON.stringify({
    projectId,
    statuses: [...filters.statuses].sort(),
    priorities: [...filters.priorities].sort(),
    assigneeId: filters.assigneeId ?? null,
    dueDateFrom: filters.dueDateFrom?.day ?? null,
    dueDateTo: filters.dueDateTo?.day ?? null,
    q: filters.freeText ?? null,
  });

  return createHash('sha256').update(canonical).digest().subarray(0, 16).toString('base64url');
}
