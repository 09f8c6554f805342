import { Column, CreateDateColumn, Entity, Index, PrimaryColumn, UpdateDateColumn } from 'typeorm';

export const TASKS_TABLE = 'tasks';

export const TASK_COLUMNS = {
  id: 'id',
  projectId: 'project_id',
  title: 'title',
  description: 'description',
  status: 'status',
  priority: 'priority',
  assigneeId: 'assignee_id',
  dueDate: 'due_date',
  sortOrder: 'sort_order',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
} as const;

export type TaskColumnKey = keyof typeof TASK_COLUMNS;

@Entity(TASKS_TABLE)
@Index('idx_tasks_project_created_id', ['projectId', 'createdAt', 'id'])
@Index('idx_tasks_project_due_date', ['projectId', 'dueDate'])
export class Task {
  // "C" collation keeps id ordering byte-wise, matching the in-memory comparator.
  @PrimaryColumn({ name: TASK_COLUMNS.id, type: 'text', collation: 'C' })
  id!: string;

  @Column({ name: TASK_COLUMNS.projectId, type: 'text' })
  projectId!: string;

  @Column({ name: TASK_COLUMNS.title, type: 'text' })
  title!: string;

  @Column({ name: TASK_COLUMNS.description, type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: TASK_COLUMNS.status, type: 'text' })
  status!: string;

  @Column({ name: TASK_COLUMNS.priority, type: 'text' })
  priority!: string;

  @Column({ name: TASK_COLUMNS.assigneeId, type: 'text', nullable: true })
  assigneeId!: string | null;

  @Column({ name: TASK_COLUMNS.dueDate, type: 'date', nullable: true })
  dueDate!: string | null;

  @Column({ name: TASK_COLUMNS.sortOrder, type: 'integer', default: 0 })
  sortOrder!: number;

  @CreateDateColumn({ name: TASK_COLUMNS.createdAt, type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: TASK_COLUMNS.updatedAt, type: 'timestamptz' })
  updatedAt!: Date;
}
