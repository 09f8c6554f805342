import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { PageInfo } from '../../../types/pagination.interface';
import { TaskResponseDto } from './task-response.dto';

export class PageInfoDto implements PageInfo {
  @ApiProperty({ example: 50 })
  limit!: number;

  @ApiPropertyOptional({ description: 'Present only when another page exists' })
  nextCursor?: string;
}

export class TaskListDto {
  @ApiProperty({ type: [TaskResponseDto] })
  tasks!: TaskResponseDto[];

  @ApiProperty({ type: PageInfoDto })
  page!: PageInfoDto;
}
