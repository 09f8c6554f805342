import { TaskResponseDto } from '../dto/task-response.dto';
import { TaskRow } from '../interfaces/task-row.interface';

type RawRow = Record<string, unknown>;

export class TaskMapper {
  static toDto(row: TaskRow): TaskResponseDto {
    return {
      id: row.id,
      projectId: row.projectId,
      title: row.title,
      description: row.description,
      status: row.status,
      priority: row.priority,
      assigneeId: row.assigneeId,
      dueDate: row.dueDate,
      sortOrder: row.sortOrder,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  /**
   * Maps one row of the compiled select (aliased camelCase columns).
   */
  static fromRaw(raw: unknown): TaskRow {
    if (typeof raw !== 'object' || raw === null) {
      throw new TypeError('Expected a task row object');
    }
    const row: RawRow = { ...raw };

    return {
      id: text(row, 'id'),
      projectId: text(row, 'projectId'),
      title: text(row, 'title'),
      description: nullableText(row, 'description'),
      status: text(row, 'status'),
      priority: text(row, 'priority'),
      assigneeId: nullableText(row, 'assigneeId'),
      dueDate: nullableText(row, 'dueDate'),
      sortOrder: integer(row, 'sortOrder'),
      createdAt: text(row, 'createdAt'),
      updatedAt: text(row, 'updatedAt'),
    };
  }
}

function text(row: RawRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new TypeError(`Column ${column} is not text`);
  }
  return value;
}

function nullableText(row: RawRow, column: string): string | null {
  return row[column] === null || row[column] === undefined ? null : text(row, column);
}

function integer(row: RawRow, column: string): number {
  const value = row[column];
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return parseInt(value, 10);
  throw new TypeError(`Column ${column} is not an integer`);
}
