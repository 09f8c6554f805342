import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';

interface ErrorResponseBody {
  success: false;
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
  path: string;
  timestamp: string;
}

@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();

    // Client errors are operational; anything 5xx is ours.
    const isOperationalError = status < HttpStatus.INTERNAL_SERVER_ERROR;

    if (isOperationalError) {
      this.logger.warn(`Client Error: ${exception.message} Path: ${request.url}`);
    } else {
      this.logger.error(`Server Error: ${exception.message} Path: ${request.url}`, exception.stack);
    }

    const body: ErrorResponseBody = {
      success: false,
      statusCode: status,
      error: exception.name,
      message: exception.message,
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    if (typeof exceptionResponse === 'string') {
      body.message = exceptionResponse;
    } else if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
      if ('message' in exceptionResponse) {
        const message = exceptionResponse.message;
        if (typeof message === 'string') body.message = message;
        if (Array.isArray(message)) body.message = message.join(', ');
      }
      if ('error' in exceptionResponse && typeof exceptionResponse.error === 'string') {
        body.error = exceptionResponse.error;
      }
      if ('details' in exceptionResponse && exceptionResponse.details !== undefined) {
        body.details = exceptionResponse.details;
      }
    }

    if (process.env.NODE_ENV === 'production' && !isOperationalError) {
      body.message = 'Internal server error';
      delete body.details;
    }

    response.status(status).json(body);
  }
}
