import { buildTaskSelect, escapeLikePattern } from '../src/modules/tasks/query/sql-builder';
import { TaskCursor } from '../src/modules/tasks/query/task-query';
import { PROJECT_ID, query } from './test-utils';

const CURSOR: TaskCursor = {
  createdAt: '2026-01-01T09:01:00.000000Z',
  id: 'task-002',
  projectId: PROJECT_ID,
  qhash: 'qhash-1',
  issuedAt: 1767225600,
};

/** Everything from FROM on; the select list is checked separately. */
function tail(text: string): string {
  return text.slice(text.indexOf(' FROM '));
}

describe('buildTaskSelect', () => {
  it('should scope to the project and fetch one row past the page', () => {
    const statement = buildTaskSelect(PROJECT_ID, query());

    expect(tail(statement.text)).toBe(' FROM tasks WHERE project_id = $1 ORDER BY created_at ASC, id ASC LIMIT $2');
    expect(statement.parameters).toEqual([PROJECT_ID, 201]);
  });

  it('should select camelCase aliases with microsecond UTC timestamps', () => {
    const { text } = buildTaskSelect(PROJECT_ID, query());

    expect(text.startsWith('SELECT id AS "id", project_id AS "projectId", title AS "title"')).toBe(true);
    expect(text).toContain(`to_char(due_date, 'YYYY-MM-DD') AS "dueDate"`);
    expect(text).toContain(`to_char(created_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS "createdAt"`);
    expect(text).toContain(`to_char(updated_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS "updatedAt"`);
  });

  it('should compile every filter with numbered parameters', () => {
    const statement = buildTaskSelect(
      PROJECT_ID,
      query({
        status: 'todo,done',
        priority: 'high',
        assigneeId: 'user-1',
        dueDateFrom: '2026-01-01',
        dueDateTo: '2026-01-31',
        q: 'notes',
        limit: 10,
      }),
    );

    expect(tail(statement.text)).toBe(
      ' FROM tasks WHERE project_id = $1 AND status IN ($2, $3) AND priority IN ($4) AND assignee_id = $5' +
        " AND due_date >= $6::date AND due_date <= $7::date AND title ILIKE $8 ESCAPE '\\'" +
        ' ORDER BY created_at ASC, id ASC LIMIT $9',
    );
    expect(statement.parameters).toEqual([
      PROJECT_ID,
      'todo',
      'done',
      'high',
      'user-1',
      '2026-01-01',
      '2026-01-31',
      '%notes%',
      11,
    ]);
  });

  it('should keep hostile text out of the statement', () => {
    const hostile = "x'; DROP TABLE tasks; --";

    const statement = buildTaskSelect(PROJECT_ID, query({ q: hostile, assigneeId: hostile }));

    expect(statement.text).not.toContain('DROP');
    expect(statement.parameters).toEqual([PROJECT_ID, hostile, `%${hostile}%`, 201]);
  });

  it('should match % and _ literally', () => {
    const statement = buildTaskSelect(PROJECT_ID, query({ q: '50%_off' }));

    expect(statement.parameters[1]).toBe('%50\\%\\_off%');
  });

  it('should rank priority by business order', () => {
    const { text } = buildTaskSelect(PROJECT_ID, query({ sort: '-priority' }));

    expect(tail(text)).toBe(
      " FROM tasks WHERE project_id = $1 ORDER BY CASE priority WHEN 'high' THEN 3 WHEN 'medium' THEN 2" +
        " WHEN 'low' THEN 1 ELSE 0 END DESC, id ASC LIMIT $2",
    );
  });

  it('should put undated tasks last ascending and first descending', () => {
    expect(tail(buildTaskSelect(PROJECT_ID, query({ sort: 'dueDate' })).text)).toContain(
      'ORDER BY due_date ASC NULLS LAST, id ASC',
    );
    expect(tail(buildTaskSelect(PROJECT_ID, query({ sort: '-dueDate' })).text)).toContain(
      'ORDER BY due_date DESC NULLS FIRST, id ASC',
    );
  });

  it('should map every sort key to its column', () => {
    const { text } = buildTaskSelect(PROJECT_ID, query({ sort: 'sortOrder,-updatedAt,createdAt' }));

    expect(tail(text)).toContain('ORDER BY sort_order ASC, updated_at DESC, created_at ASC, id ASC');
  });

  it('should seek past the cursor in creation order', () => {
    const statement = buildTaskSelect(PROJECT_ID, { ...query({ limit: 2 }), cursor: CURSOR });

    expect(tail(statement.text)).toBe(
      ' FROM tasks WHERE project_id = $1 AND (created_at > $2::timestamptz OR ' +
        '(created_at = $2::timestamptz AND id > $3)) ORDER BY created_at ASC, id ASC LIMIT $4',
    );
    expect(statement.parameters).toEqual([PROJECT_ID, CURSOR.createdAt, CURSOR.id, 3]);
  });
});

describe('escapeLikePattern', () => {
  it('should escape the escape character first', () => {
    expect(escapeLikePattern('a\\b%c_d')).toBe('a\\\\b\\%c\\_d');
  });
});
