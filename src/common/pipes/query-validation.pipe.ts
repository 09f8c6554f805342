import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { validationErrorBody, ValidationIssue } from '../errors/validation-error.response';

/**
 * Validates query DTOs, reporting each failing property as an
 * `INVALID_FORMAT` issue that carries the value as received.
 */
export function createQueryValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors: ValidationError[]) =>
      new BadRequestException(validationErrorBody(errors.map(toIssue))),
  });
}

function toIssue(error: ValidationError): ValidationIssue {
  const messages = Object.values(error.constraints ?? {});
  return {
    location: 'query',
    field: error.property,
    code: 'INVALID_FORMAT',
    message: messages.length > 0 ? messages.join('; ') : `${error.property} is invalid`,
    rejectedValue: error.value === undefined ? undefined : String(error.value),
  };
}
