import { BadRequestException, HttpException, HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { validationErrorBody } from '../../common/errors/validation-error.response';
import { TaskFilterDto } from './dto/task-filter.dto';
import { TaskListDto } from './dto/task-list.dto';
import { TaskReadRepository } from './interfaces/task-read-repository.interface';
import { TaskMapper } from './mappers/task.mapper';
import { toValidationIssue } from './mappers/validation-issue.mapper';
import { paginate } from './query/pagination';
import { createTaskQuery, TaskQuery, validateTaskQuery } from './query/task-query';
import { isTaskQueryError } from './query/task-query.errors';
import { CursorService } from './services/cursor.service';
import { TASK_READ_REPOSITORY } from './tasks.constants';

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    @Inject(TASK_READ_REPOSITORY)
    private readonly tasksRepository: TaskReadRepository,
    private readonly cursorService: CursorService,
  ) {}

  /**
   * Normalizes list parameters into a task query, opening the cursor if one
   * was sent. Query and cursor problems become a 400 with one issue.
   */
  buildQuery(projectId: string, filter: TaskFilterDto): TaskQuery {
    try {
      const query = createTaskQuery(
        {
          status: filter.status,
          priority: filter.priority,
          assigneeId: filter.assigneeId,
          dueDateFrom: filter.dueDateFrom,
          dueDateTo: filter.dueDateTo,
          q: filter.q,
          sort: filter.sort,
          limit: filter.limit === undefined ? undefined : parseInt(filter.limit, 10),
          cursor: filter.cursor,
        },
        { projectId, cursors: this.cursorService },
      );
      validateTaskQuery(query);
      return query;
    } catch (error) {
      if (isTaskQueryError(error)) {
        this.logger.warn(`Rejected task list query for project ${projectId}: ${error.message}`);
        throw new BadRequestException(validationErrorBody([toValidationIssue(error)]));
      }
      throw error;
    }
  }

  async listByProject(projectId: string, filter: TaskFilterDto, signal?: AbortSignal): Promise<TaskListDto> {
    const query = this.buildQuery(projectId, filter);

    try {
      const rows = await this.tasksRepository.findByProject(projectId, query, signal);
      const page = paginate(rows, query, projectId, this.cursorService);

      return {
        tasks: page.items.map((row) => TaskMapper.toDto(row)),
        page: { limit: page.limit, nextCursor: page.nextCursor },
      };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.error(
        `Failed to list tasks of project ${projectId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new HttpException('Failed to retrieve tasks', HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }
}
