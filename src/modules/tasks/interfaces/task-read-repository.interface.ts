import { TaskQuery } from '../query/task-query';
import { TaskRow } from './task-row.interface';

/**
 * Read side of the task store. Implementations return at most
 * `query.limit + 1` rows of `projectId`, in query order.
 */
export interface TaskReadRepository {
  findByProject(projectId: string, query: TaskQuery, signal?: AbortSignal): Promise<TaskRow[]>;
}
