import { Controller, Get, Param, Query, Res, UseFilters, UseInterceptors } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { HttpExceptionFilter } from '../../common/filters/http-exception.filter';
import { LoggingInterceptor } from '../../common/interceptors/logging.interceptor';
import { createQueryValidationPipe } from '../../common/pipes/query-validation.pipe';
import { HttpResponse } from '../../types/http-response.interface';
import { TaskFilterDto } from './dto/task-filter.dto';
import { TaskListDto } from './dto/task-list.dto';
import { TasksService } from './tasks.service';

@ApiTags('tasks')
@Controller('projects/:projectId/tasks')
@UseFilters(HttpExceptionFilter)
@UseInterceptors(LoggingInterceptor)
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Get()
  @ApiOperation({ summary: 'List tasks of a project with filtering, sorting & cursor pagination' })
  @ApiParam({ name: 'projectId', type: String, description: 'Project whose tasks are listed' })
  @ApiQuery({ name: 'status', type: String, required: false, description: 'todo, doing, in_progress, done (comma-separated)' })
  @ApiQuery({ name: 'priority', type: String, required: false, description: 'high, medium, low (comma-separated)' })
  @ApiQuery({ name: 'assigneeId', type: String, required: false, description: 'Exact assignee id' })
  @ApiQuery({ name: 'dueDateFrom', type: String, required: false, description: 'Due date (from), YYYY-MM-DD, inclusive' })
  @ApiQuery({ name: 'dueDateTo', type: String, required: false, description: 'Due date (to), YYYY-MM-DD, inclusive' })
  @ApiQuery({ name: 'q', type: String, required: false, description: 'Case-insensitive title substring' })
  @ApiQuery({ name: 'sort', type: String, required: false, description: 'e.g. -priority,createdAt; not allowed with cursor' })
  @ApiQuery({ name: 'limit', type: Number, required: false, description: 'Page size (default and max 200)', example: 50 })
  @ApiQuery({ name: 'cursor', type: String, required: false, description: 'nextCursor of the previous page' })
  @ApiResponse({ status: 200, description: 'One page of tasks', type: TaskListDto })
  @ApiResponse({ status: 400, description: 'Invalid query parameters or cursor' })
  @ApiResponse({ status: 500, description: 'Internal server error' })
  async findByProject(
    @Param('projectId') projectId: string,
    @Query(createQueryValidationPipe()) filter: TaskFilterDto,
    @Res({ passthrough: true }) response: Response,
  ): Promise<HttpResponse<TaskListDto>> {
    // Stop waiting on the store once the client has gone away.
    const controller = new AbortController();
    response.on('close', () => {
      if (!response.writableFinished) {
        controller.abort();
      }
    });

    const list = await this.tasksService.listByProject(projectId, filter, controller.signal);

    return {
      success: true,
      data: list,
      message: 'Tasks retrieved successfully',
    };
  }
}
