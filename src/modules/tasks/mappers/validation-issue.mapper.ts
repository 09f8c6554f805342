import { ValidationIssue } from '../../../common/errors/validation-error.response';
import { TaskQueryError } from '../query/task-query.errors';

const FALLBACK_MESSAGE = 'Invalid query parameters. Check the request and try again.';

const MESSAGES: Readonly<Record<string, string>> = {
  'status:INVALID_ENUM':
    "status must be a comma-separated list of 'todo', 'doing', 'in_progress', 'done' (e.g. status=todo,in_progress).",
  'priority:INVALID_ENUM':
    "priority must be a comma-separated list of 'high', 'medium', 'low' (e.g. priority=high,medium).",
  'dueDateFrom:INVALID_FORMAT': 'dueDateFrom must be a date in YYYY-MM-DD format (e.g. dueDateFrom=2026-01-10).',
  'dueDateTo:INVALID_FORMAT': 'dueDateTo must be a date in YYYY-MM-DD format (e.g. dueDateTo=2026-01-10).',
  'dueDateFrom:CONSTRAINT_VIOLATION':
    'dueDateFrom must not be after dueDateTo (e.g. dueDateFrom=2026-01-01&dueDateTo=2026-01-10).',
  'sort:INVALID_ENUM':
    "sort accepts only 'sortOrder', 'createdAt', 'updatedAt', 'dueDate', 'priority' (e.g. sort=-priority,createdAt).",
  'sort:INCOMPATIBLE_WITH_CURSOR': 'sort cannot be combined with cursor.',
  'limit:INVALID_FORMAT': 'limit must be an integer (e.g. limit=50).',
  'limit:INVALID_RANGE': 'limit must be between 1 and 200.',
  'cursor:INVALID_FORMAT': 'cursor is malformed.',
  'cursor:INVALID_SIGNATURE': 'cursor signature is invalid.',
  'cursor:EXPIRED': 'cursor has expired. Restart from the first page.',
  'cursor:QUERY_MISMATCH':
    'cursor was issued for different filters or another project. Restart from the first page.',
};

export function toValidationIssue(error: TaskQueryError): ValidationIssue {
  const issue: ValidationIssue = {
    location: 'query',
    field: error.field,
    code: error.code,
    message: MESSAGES[`${error.field}:${error.code}`] ?? FALLBACK_MESSAGE,
  };

  if (error.kind === 'validation' && error.rejectedValue !== undefined) {
    issue.rejectedValue = error.rejectedValue;
  }
  return issue;
}
