import { TaskRow } from '../interfaces/task-row.interface';
import type { TaskQuery } from './task-query';
import { FilterClause, OrderField, OrderTerm, planTaskQuery, priorityRank, TaskQueryPlan } from './task-query-plan';

type SortValue = string | number | null;

/**
 * Applies a task query to rows held in memory, with the same filtering,
 * ordering and seek semantics as the compiled SQL.
 */
export function evaluateTaskQuery<T extends TaskRow>(
  rows: readonly T[],
  projectId: string,
  query: TaskQuery,
): T[] {
  return evaluateTaskQueryPlan(rows, planTaskQuery(projectId, query));
}

export function evaluateTaskQueryPlan<T extends TaskRow>(rows: readonly T[], plan: TaskQueryPlan): T[] {
  return rows
    .filter((row) => plan.filters.every((clause) => matchesClause(row, clause)))
    .sort(compareByPlan(plan.order))
    .slice(0, plan.fetchLimit);
}

export function matchesClause(row: TaskRow, clause: FilterClause): boolean {
  switch (clause.kind) {
    case 'equals':
      return row[clause.field] === clause.value;
    case 'oneOf':
      return clause.values.includes(row[clause.field]);
    case 'onOrAfterDay':
      return row.dueDate !== null && row.dueDate >= clause.day;
    case 'onOrBeforeDay':
      return row.dueDate !== null && row.dueDate <= clause.day;
    case 'contains':
      return row.title.toLowerCase().includes(clause.text.toLowerCase());
    case 'seekAfter':
      return row.createdAt > clause.createdAt || (row.createdAt === clause.createdAt && row.id > clause.id);
  }
}

export function compareByPlan(order: readonly OrderTerm[]): (a: TaskRow, b: TaskRow) => number {
  return (a, b) => {
    for (const term of order) {
      const result = compareTerm(sortValue(a, term.field), sortValue(b, term.field), term);
      if (result !== 0) return result;
    }
    return 0;
  };
}

function sortValue(row: TaskRow, field: OrderField): SortValue {
  switch (field) {
    case 'priority':
      return priorityRank(row.priority);
    case 'dueDate':
      return row.dueDate;
    default:
      return row[field];
  }
}

function compareTerm(a: SortValue, b: SortValue, term: OrderTerm): number {
  if (a === b) return 0;

  // PostgreSQL's default when NULLS is not spelled out: nulls rank highest.
  const nullsFirst = (term.nulls ?? (term.direction === 'ASC' ? 'LAST' : 'FIRST')) === 'FIRST';
  if (a === null) return nullsFirst ? -1 : 1;
  if (b === null) return nullsFirst ? 1 : -1;

  const ascending = compareValues(a, b);
  return term.direction === 'ASC' ? ascending : -ascending;
}

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
