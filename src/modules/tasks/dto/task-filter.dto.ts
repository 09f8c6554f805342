import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Matches } from 'class-validator';

/**
 * Raw list query parameters. Values stay strings here; the task query
 * normalizer owns their parsing and reports field-level errors.
 */
export class TaskFilterDto {
  @ApiPropertyOptional({
    description: "Comma-separated statuses: todo, doing (alias of in_progress), in_progress, done",
    example: 'todo,in_progress',
  })
  @IsOptional()
  @IsString()
  status?: string;

  @ApiPropertyOptional({ description: 'Comma-separated priorities: high, medium, low', example: 'high,medium' })
  @IsOptional()
  @IsString()
  priority?: string;

  @ApiPropertyOptional({ description: 'Exact assignee id' })
  @IsOptional()
  @IsString()
  assigneeId?: string;

  @ApiPropertyOptional({ description: 'Due date (from), inclusive, YYYY-MM-DD', example: '2026-01-01' })
  @IsOptional()
  @IsString()
  dueDateFrom?: string;

  @ApiPropertyOptional({ description: 'Due date (to), inclusive, YYYY-MM-DD', example: '2026-01-31' })
  @IsOptional()
  @IsString()
  dueDateTo?: string;

  @ApiPropertyOptional({ description: 'Case-insensitive substring of the title' })
  @IsOptional()
  @IsString()
  q?: string;

  @ApiPropertyOptional({
    description: 'Comma-separated sort keys, "-" prefix for descending: sortOrder, createdAt, updatedAt, dueDate, priority',
    example: '-priority,createdAt',
  })
  @IsOptional()
  @IsString()
  sort?: string;

  @ApiPropertyOptional({ type: String, description: 'Page size; out-of-range values become 200', example: '50' })
  @IsOptional()
  @Matches(/^[+-]?\d+$/, { message: 'limit must be an integer' })
  limit?: string;

  @ApiPropertyOptional({ description: 'Opaque cursor from a previous page; cannot be combined with sort' })
  @IsOptional()
  @IsString()
  cursor?: string;
}
