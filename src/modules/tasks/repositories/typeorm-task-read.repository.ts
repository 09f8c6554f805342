import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { abortable } from '../../../common/utils/abort.util';
import { TaskReadRepository } from '../interfaces/task-read-repository.interface';
import { TaskRow } from '../interfaces/task-row.interface';
import { TaskMapper } from '../mappers/task.mapper';
import { buildTaskSelect } from '../query/sql-builder';
import { TaskQuery } from '../query/task-query';

@Injectable()
export class TypeormTaskReadRepository implements TaskReadRepository {
  private readonly logger = new Logger(TypeormTaskReadRepository.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: Pick<DataSource, 'query'>,
  ) {}

  async findByProject(projectId: string, query: TaskQuery, signal?: AbortSignal): Promise<TaskRow[]> {
    signal?.throwIfAborted();

    const statement = buildTaskSelect(projectId, query);
    this.logger.debug(`Listing tasks of project ${projectId} (limit ${query.limit})`);

    const result: unknown = await abortable(
      this.dataSource.query(statement.text, statement.parameters),
      signal,
    );
    if (!Array.isArray(result)) {
      throw new Error('Task list query did not return rows');
    }

    return result.map((raw: unknown) => TaskMapper.fromRaw(raw));
  }
}
