import { TaskPriority } from '../enums/task-priority.enum';
import type { SortDirection, SortOrder, TaskQuery } from './task-query';

/**
 * Backend-neutral description of a task list query. The SQL builder compiles
 * it, the in-memory evaluator interprets it; neither decides ordering or
 * filtering on its own.
 */
export interface TaskQueryPlan {
  readonly filters: readonly FilterClause[];
  readonly order: readonly OrderTerm[];
  /** One row more than the page size, to learn whether a next page exists. */
  readonly fetchLimit: number;
}

export type OrderField = SortOrder['key'] | 'id';

export interface OrderTerm {
  readonly field: OrderField;
  readonly direction: SortDirection;
  readonly nulls?: 'FIRST' | 'LAST';
}

export type FilterClause =
  | { readonly kind: 'equals'; readonly field: 'projectId' | 'assigneeId'; readonly value: string }
  | { readonly kind: 'oneOf'; readonly field: 'status' | 'priority'; readonly values: readonly string[] }
  | { readonly kind: 'onOrAfterDay'; readonly field: 'dueDate'; readonly day: string }
  | { readonly kind: 'onOrBeforeDay'; readonly field: 'dueDate'; readonly day: string }
  | { readonly kind: 'contains'; readonly field: 'title'; readonly text: string }
  | { readonly kind: 'seekAfter'; readonly createdAt: string; readonly id: string };

/** Business rank of a priority; anything unrecognized sorts below `low`. */
export const PRIORITY_RANK: ReadonlyArray<readonly [TaskPriority, number]> = [
  [TaskPriority.HIGH, 3],
  [TaskPriority.MEDIUM, 2],
  [TaskPriority.LOW, 1],
];
export const UNKNOWN_PRIORITY_RANK = 0;

export const CURSOR_ORDER: readonly OrderTerm[] = [
  { field: 'createdAt', direction: 'ASC' },
  { field: 'id', direction: 'ASC' },
];

const DEFAULT_ORDER: readonly OrderTerm[] = [{ field: 'createdAt', direction: 'ASC' }];
const TIE_BREAK: OrderTerm = { field: 'id', direction: 'ASC' };

export function priorityRank(priority: string): number {
  const entry = PRIORITY_RANK.find(([value]) => value === priority);
  return entry ? entry[1] : UNKNOWN_PRIORITY_RANK;
}

export function planTaskQuery(projectId: string, query: TaskQuery): TaskQueryPlan {
  return {
    filters: planFilters(projectId, query),
    order: planOrder(query),
    fetchLimit: query.limit + 1,
  };
}

function planFilters(projectId: string, query: TaskQuery): FilterClause[] {
  const filters: FilterClause[] = [{ kind: 'equals', field: 'projectId', value: projectId }];

  if (query.statuses.length > 0) {
    filters.push({ kind: 'oneOf', field: 'status', values: query.statuses });
  }
  if (query.priorities.length > 0) {
    filters.push({ kind: 'oneOf', field: 'priority', values: query.priorities });
  }
  if (query.assigneeId !== undefined) {
    filters.push({ kind: 'equals', field: 'assigneeId', value: query.assigneeId });
  }
  if (query.dueDateFrom) {
    filters.push({ kind: 'onOrAfterDay', field: 'dueDate', day: query.dueDateFrom.day });
  }
  if (query.dueDateTo) {
    filters.push({ kind: 'onOrBeforeDay', field: 'dueDate', day: query.dueDateTo.day });
  }
  if (query.freeText !== undefined) {
    filters.push({ kind: 'contains', field: 'title', text: query.freeText });
  }
  if (query.cursor) {
    filters.push({ kind: 'seekAfter', createdAt: query.cursor.createdAt, id: query.cursor.id });
  }

  return filters;
}

function planOrder(query: TaskQuery): readonly OrderTerm[] {
  if (query.cursor) return CURSOR_ORDER;

  const requested: readonly OrderTerm[] =
    query.sortOrders.length > 0 ? query.sortOrders.map(toOrderTerm) : DEFAULT_ORDER;

  return [...requested, TIE_BREAK];
}

function toOrderTerm(order: SortOrder): OrderTerm {
  if (order.key === 'dueDate') {
    // An undated task ranks after every date: last ascending, first descending.
    return { field: 'dueDate', direction: order.direction, nulls: order.direction === 'ASC' ? 'LAST' : 'FIRST' };
  }
  return { field: order.key, direction: order.direction };
}
