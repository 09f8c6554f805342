import { TaskStatus } from '../enums/task-status.enum';
import { TaskPriority } from '../enums/task-priority.enum';
import { computeFingerprint, TaskQueryFilters } from './query-fingerprint';
import { QueryField, QueryValidationError } from './task-query.errors';

export const SORT_KEYS = ['sortOrder', 'createdAt', 'updatedAt', 'dueDate', 'priority'] as const;
export type SortKey = (typeof SORT_KEYS)[number];
export type SortDirection = 'ASC' | 'DESC';

export interface SortOrder {
  readonly key: SortKey;
  readonly direction: SortDirection;
}

export const DEFAULT_LIMIT = 200;
export const MAX_LIMIT = 200;

/** One end of the inclusive due-date window. */
export interface DueDateBound {
  /** Calendar day, `YYYY-MM-DD`. */
  readonly day: string;
  /** First (`from`) or last (`to`) instant of that day, UTC, nanosecond text. */
  readonly at: string;
}

/** Seek position carried by a verified cursor. */
export interface TaskCursor {
  readonly createdAt: string;
  readonly id: string;
  readonly projectId: string;
  readonly qhash: string;
  readonly issuedAt: number;
}

export interface TaskQuery {
  readonly statuses: readonly TaskStatus[];
  readonly priorities: readonly TaskPriority[];
  readonly assigneeId?: string;
  readonly dueDateFrom?: DueDateBound;
  readonly dueDateTo?: DueDateBound;
  readonly freeText?: string;
  /** Explicit sort only. The fixed cursor order lives in the query plan. */
  readonly sortOrders: readonly SortOrder[];
  readonly limit: number;
  readonly cursor?: TaskCursor;
}

/** Raw list options, named after the query parameters they come from. */
export interface TaskQueryOptions {
  status?: string;
  priority?: string;
  assigneeId?: string;
  dueDateFrom?: string;
  dueDateTo?: string;
  q?: string;
  sort?: string;
  limit?: number;
  cursor?: string;
}

export interface CursorOpener {
  open(cursor: string, expected: { projectId: string; qhash: string }): TaskCursor;
}

export interface CursorContext {
  projectId: string;
  cursors: CursorOpener;
}

const STATUS_ALIASES: Readonly<Record<string, TaskStatus>> = {
  todo: TaskStatus.TODO,
  doing: TaskStatus.IN_PROGRESS,
  in_progress: TaskStatus.IN_PROGRESS,
  done: TaskStatus.DONE,
};

const PRIORITIES: Readonly<Record<string, TaskPriority>> = {
  low: TaskPriority.LOW,
  medium: TaskPriority.MEDIUM,
  high: TaskPriority.HIGH,
};

const CALENDAR_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Builds a validated {@link TaskQuery} from raw list options.
 *
 * A cursor is decoded and checked against the fingerprint of the filters in
 * this same call, which is why `context` is required whenever `cursor` is set.
 *
 * @throws QueryValidationError for bad input
 * @throws CursorError for a cursor that cannot be used
 */
export function createTaskQuery(options: TaskQueryOptions = {}, context?: CursorContext): TaskQuery {
  const cursorToken = nonBlank(options.cursor);
  if (cursorToken !== undefined && nonBlank(options.sort) !== undefined) {
    throw new QueryValidationError('sort', 'INCOMPATIBLE_WITH_CURSOR', options.sort);
  }

  const filters: TaskQueryFilters = {
    statuses: parseTokens(options.status, 'status', STATUS_ALIASES),
    priorities: parseTokens(options.priority, 'priority', PRIORITIES),
    assigneeId: nonBlank(options.assigneeId),
    ...parseDueDateRange(options.dueDateFrom, options.dueDateTo),
    freeText: nonBlank(options.q),
  };
  const sortOrders = parseSort(options.sort);
  const limit = normalizeLimit(options.limit);

  if (cursorToken === undefined) {
    return { ...filters, sortOrders, limit };
  }

  if (!context) {
    throw new Error('A cursor context is required to open a cursor');
  }

  const cursor = context.cursors.open(cursorToken, {
    projectId: context.projectId,
    qhash: computeFingerprint(filters, context.projectId),
  });

  return { ...filters, sortOrders, limit, cursor };
}

/**
 * Re-checks the invariants of a query value, whether or not it came from
 * {@link createTaskQuery}.
 */
export function validateTaskQuery(query: TaskQuery): void {
  if (!Number.isInteger(query.limit) || query.limit < 1 || query.limit > MAX_LIMIT) {
    throw new QueryValidationError('limit', 'INVALID_RANGE', String(query.limit));
  }

  if (query.dueDateFrom && query.dueDateTo && query.dueDateFrom.day > query.dueDateTo.day) {
    throw new QueryValidationError('dueDateFrom', 'CONSTRAINT_VIOLATION', query.dueDateFrom.day);
  }

  if (query.cursor && query.sortOrders.length > 0) {
    throw new QueryValidationError('sort', 'INCOMPATIBLE_WITH_CURSOR');
  }
}

export function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

function parseTokens<T extends string>(
  raw: string | undefined,
  field: QueryField,
  allowed: Readonly<Record<string, T>>,
): T[] {
  const values: T[] = [];
  if (raw === undefined) return values;

  for (const part of raw.split(',')) {
    const token = part.trim();
    if (token === '') continue;

    const value = Object.prototype.hasOwnProperty.call(allowed, token) ? allowed[token] : undefined;
    if (value === undefined) {
      throw new QueryValidationError(field, 'INVALID_ENUM', token);
    }
    if (!values.includes(value)) {
      values.push(value);
    }
  }

  return values;
}

function parseDueDateRange(
  fromRaw: string | undefined,
  toRaw: string | undefined,
): Pick<TaskQuery, 'dueDateFrom' | 'dueDateTo'> {
  const fromDay = nonBlank(fromRaw);
  const toDay = nonBlank(toRaw);

  const dueDateFrom = fromDay === undefined ? undefined : parseDay(fromDay, 'dueDateFrom');
  const dueDateTo = toDay === undefined ? undefined : parseDay(toDay, 'dueDateTo');

  if (dueDateFrom && dueDateTo && dueDateFrom.day > dueDateTo.day) {
    throw new QueryValidationError('dueDateFrom', 'CONSTRAINT_VIOLATION', dueDateFrom.day);
  }

  return {
    dueDateFrom: dueDateFrom && { day: dueDateFrom.day, at: `${dueDateFrom.day}T00:00:00.000000000Z` },
    dueDateTo: dueDateTo && { day: dueDateTo.day, at: `${dueDateTo.day}T23:59:59.999999999Z` },
  };
}

function parseDay(value: string, field: 'dueDateFrom' | 'dueDateTo'): { day: string } {
  const match = CALENDAR_DAY.exec(value);
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day
    ) {
      return { day: value };
    }
  }
  throw new QueryValidationError(field, 'INVALID_FORMAT', value);
}

function parseSort(raw: string | undefined): SortOrder[] {
  const orders: SortOrder[] = [];
  if (raw === undefined) return orders;

  for (const part of raw.split(',')) {
    const token = part.trim();
    if (token === '') continue;

    const descending = token.startsWith('-');
    const key = descending ? token.slice(1) : token;
    if (!isSortKey(key)) {
      throw new QueryValidationError('sort', 'INVALID_ENUM', key);
    }
    orders.push({ key, direction: descending ? 'DESC' : 'ASC' });
  }

  return orders;
}

function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined) return DEFAULT_LIMIT;
  if (!Number.isInteger(limit)) {
    throw new QueryValidationError('limit', 'INVALID_FORMAT', String(limit));
  }
  return limit < 1 || limit > MAX_LIMIT ? DEFAULT_LIMIT : limit;
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
