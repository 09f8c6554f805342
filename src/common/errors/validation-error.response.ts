export interface ValidationIssue {
  location: 'query' | 'path' | 'body';
  field: string;
  code: string;
  message: string;
  rejectedValue?: string;
}

export interface ValidationErrorBody {
  error: 'VALIDATION_ERROR';
  message: string;
  details: { issues: ValidationIssue[] };
}

export function validationErrorBody(issues: ValidationIssue[]): ValidationErrorBody {
  return {
    error: 'VALIDATION_ERROR',
    message: 'Invalid query parameters',
    details: { issues },
  };
}
