/**
 * A task as the list query reads it. Timestamps are RFC3339 UTC text with
 * microsecond precision, so they compare correctly as strings.
 */
export interface TaskRow {
  id: string;
  projectId: string;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  assigneeId: string | null;
  /** `YYYY-MM-DD` */
  dueDate: string | null;
  sortOrder: number;
  createdAt: string;
  updatedAt: string;
}
