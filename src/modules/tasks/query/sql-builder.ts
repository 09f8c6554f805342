import { TASK_COLUMNS, TASKS_TABLE } from '../entities/task.entity';
import type { TaskQuery } from './task-query';
import {
  FilterClause,
  OrderField,
  OrderTerm,
  PRIORITY_RANK,
  planTaskQuery,
  TaskQueryPlan,
  UNKNOWN_PRIORITY_RANK,
} from './task-query-plan';

export interface SqlStatement {
  text: string;
  parameters: unknown[];
}

const UTC_MICROS = `'YYYY-MM-DD"T"HH24:MI:SS.US"Z"'`;

const SELECT_LIST = [
  `${TASK_COLUMNS.id} AS "id"`,
  `${TASK_COLUMNS.projectId} AS "projectId"`,
  `${TASK_COLUMNS.title} AS "title"`,
  `${TASK_COLUMNS.description} AS "description"`,
  `${TASK_COLUMNS.status} AS "status"`,
  `${TASK_COLUMNS.priority} AS "priority"`,
  `${TASK_COLUMNS.assigneeId} AS "assigneeId"`,
  `to_char(${TASK_COLUMNS.dueDate}, 'YYYY-MM-DD') AS "dueDate"`,
  `${TASK_COLUMNS.sortOrder} AS "sortOrder"`,
  `to_char(${TASK_COLUMNS.createdAt} AT TIME ZONE 'UTC', ${UTC_MICROS}) AS "createdAt"`,
  `to_char(${TASK_COLUMNS.updatedAt} AT TIME ZONE 'UTC', ${UTC_MICROS}) AS "updatedAt"`,
].join(', ');

const PRIORITY_RANK_SQL =
  `CASE ${TASK_COLUMNS.priority} ` +
  PRIORITY_RANK.map(([priority, rank]) => `WHEN '${priority}' THEN ${rank} `).join('') +
  `ELSE ${UNKNOWN_PRIORITY_RANK} END`;

const ORDER_EXPRESSIONS: Readonly<Record<OrderField, string>> = {
  sortOrder: TASK_COLUMNS.sortOrder,
  createdAt: TASK_COLUMNS.createdAt,
  updatedAt: TASK_COLUMNS.updatedAt,
  dueDate: TASK_COLUMNS.dueDate,
  priority: PRIORITY_RANK_SQL,
  id: TASK_COLUMNS.id,
};

/** Positional `$n` parameters, numbered in the order they are added. */
class ParameterList {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

/**
 * Compiles a project-scoped task query into one PostgreSQL statement.
 * Every caller-supplied value travels as a parameter; the statement text is
 * assembled only from column names and fixed fragments.
 */
export function buildTaskSelect(projectId: string, query: TaskQuery): SqlStatement {
  return compileTaskQueryPlan(planTaskQuery(projectId, query));
}

export function compileTaskQueryPlan(plan: TaskQueryPlan): SqlStatement {
  const parameters = new ParameterList();

  const where = plan.filters.map((clause) => compileFilter(clause, parameters)).join(' AND ');
  const orderBy = plan.order.map(compileOrderTerm).join(', ');
  const limit = parameters.add(plan.fetchLimit);

  return {
    text: `SELECT ${SELECT_LIST} FROM ${TASKS_TABLE} WHERE ${where} ORDER BY ${orderBy} LIMIT ${limit}`,
    parameters: parameters.values,
  };
}

export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (character) => `\\${character}`);
}

function compileFilter(clause: FilterClause, parameters: ParameterList): string {
  switch (clause.kind) {
    case 'equals':
      return `${TASK_COLUMNS[clause.field]} = ${parameters.add(clause.value)}`;
    case 'oneOf': {
      const placeholders = clause.values.map((value) => parameters.add(value)).join(', ');
      return `${TASK_COLUMNS[clause.field]} IN (${placeholders})`;
    }
    case 'onOrAfterDay':
      return `${TASK_COLUMNS.dueDate} >= ${parameters.add(clause.day)}::date`;
    case 'onOrBeforeDay':
      return `${TASK_COLUMNS.dueDate} <= ${parameters.add(clause.day)}::date`;
    case 'contains':
      return `${TASK_COLUMNS.title} ILIKE ${parameters.add(`%${escapeLikePattern(clause.text)}%`)} ESCAPE '\\'`;
    case 'seekAfter': {
      const createdAt = parameters.add(clause.createdAt);
      const id = parameters.add(clause.id);
      return (
        `(${TASK_COLUMNS.createdAt} > ${createdAt}::timestamptz OR ` +
        `(${TASK_COLUMNS.createdAt} = ${createdAt}::timestamptz AND ${TASK_COLUMNS.id} > ${id}))`
      );
    }
  }
}

function compileOrderTerm(term: OrderTerm): string {
  const nulls = term.nulls ? ` NULLS ${term.nulls}` : '';
  return `${ORDER_EXPRESSIONS[term.field]} ${term.direction}${nulls}`;
}
