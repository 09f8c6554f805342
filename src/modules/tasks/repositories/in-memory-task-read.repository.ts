import { Injectable } from '@nestjs/common';
import { toMicrosecondTimestamp } from '../../../common/utils/timestamp.util';
import { TaskReadRepository } from '../interfaces/task-read-repository.interface';
import { TaskRow } from '../interfaces/task-row.interface';
import { evaluateTaskQuery } from '../query/memory-evaluator';
import { TaskQuery } from '../query/task-query';

/**
 * Task store held in process memory, for tests and single-node deployments
 * without a database. Pagination, cursors included, behaves as with SQL.
 */
@Injectable()
export class InMemoryTaskReadRepository implements TaskReadRepository {
  private rows: TaskRow[] = [];

  /**
   * Timestamps are stored as UTC microsecond text, the form the evaluator
   * compares and cursors carry.
   */
  seed(rows: readonly TaskRow[]): void {
    this.rows = rows.map((row) => ({
      ...row,
      createdAt: toMicrosecondTimestamp(row.createdAt),
      updatedAt: toMicrosecondTimestamp(row.updatedAt),
    }));
  }

  clear(): void {
    this.rows = [];
  }

  async findByProject(projectId: string, query: TaskQuery, signal?: AbortSignal): Promise<TaskRow[]> {
    signal?.throwIfAborted();
    return evaluateTaskQuery(this.rows, projectId, query).map((row) => ({ ...row }));
  }
}
