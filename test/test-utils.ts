// test-utils.ts
import { TaskRow } from '../src/modules/tasks/interfaces/task-row.interface';
import { createTaskQuery, TaskQuery, TaskQueryOptions } from '../src/modules/tasks/query/task-query';

export const PROJECT_ID = 'project-1';
export const OTHER_PROJECT_ID = 'project-2';
export const TEST_SECRET = 'test-secret';

/** 2026-01-01T00:00:00Z */
export const FIXED_NOW = new Date(Date.UTC(2026, 0, 1, 0, 0, 0));

export function fixedClock(now: Date = FIXED_NOW): { now(): Date } {
  return { now: () => now };
}

export function buildTask(overrides: Partial<TaskRow> = {}): TaskRow {
  return {
    id: 'task-001',
    projectId: PROJECT_ID,
    title: 'Write release notes',
    description: null,
    status: 'todo',
    priority: 'medium',
    assigneeId: null,
    dueDate: null,
    sortOrder: 0,
    createdAt: '2026-01-01T09:00:00.000000Z',
    updatedAt: '2026-01-01T09:00:00.000000Z',
    ...overrides,
  };
}

/** `task-001` … `task-00n`, one minute apart in creation order. */
export function buildSequentialTasks(count: number, projectId: string = PROJECT_ID): TaskRow[] {
  return Array.from({ length: count }, (_, index) => {
    const minute = String(index).padStart(2, '0');
    const createdAt = `2026-01-01T09:${minute}:00.000000Z`;
    return buildTask({
      id: `task-${String(index + 1).padStart(3, '0')}`,
      projectId,
      title: `Task ${index + 1}`,
      createdAt,
      updatedAt: createdAt,
    });
  });
}

/** Query without a cursor; cursors need a context and are built per test. */
export function query(options: TaskQueryOptions = {}): TaskQuery {
  return createTaskQuery(options);
}
