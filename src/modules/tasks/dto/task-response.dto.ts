import { ApiProperty } from '@nestjs/swagger';

export class TaskResponseDto {
  @ApiProperty({ example: 'task-001' })
  id!: string;

  @ApiProperty({ example: 'project-1' })
  projectId!: string;

  @ApiProperty({ example: 'Write release notes' })
  title!: string;

  @ApiProperty({ type: String, nullable: true })
  description!: string | null;

  @ApiProperty({ example: 'in_progress' })
  status!: string;

  @ApiProperty({ example: 'high' })
  priority!: string;

  @ApiProperty({ type: String, nullable: true })
  assigneeId!: string | null;

  @ApiProperty({ type: String, nullable: true, example: '2026-01-10' })
  dueDate!: string | null;

  @ApiProperty({ example: 0 })
  sortOrder!: number;

  @ApiProperty({ example: '2026-01-01T09:00:00.000001Z' })
  createdAt!: string;

  @ApiProperty({ example: '2026-01-01T09:00:00.000001Z' })
  updatedAt!: string;
}
