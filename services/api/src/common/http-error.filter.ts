import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { ErrorResponse } from '@depin-compat/shared';
import type { Response } from 'express';
import type { Logger } from './logger.service';

interface ValidationIssue {
  path: string;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isValidationIssue(value: unknown): value is ValidationIssue {
  return isRecord(value) && typeof value.path === 'string' && typeof value.message === 'string';
}

export function toErrorResponse(exception: HttpException, now: Date = new Date()): ErrorResponse {
  const status = exception.getStatus();
  const body = exception.getResponse();

  if (!isRecord(body)) {
    return { error: String(body), code: status, timestamp: now.toISOString() };
  }

  const error = typeof body.message === 'string' ? body.message : exception.message;
  const issues = Array.isArray(body.issues) ? body.issues : undefined;
  const response: ErrorResponse = { error, code: status, timestamp: now.toISOString() };

  if (issues) {
    response.issues = issues;
    response.message = issues
      .filter(isValidationIssue)
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
  } else if (Array.isArray(body.message)) {
    response.message = body.message.join('; ');
  }

  return response;
}

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(private readonly logger: Logger) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      const payload = toErrorResponse(exception);
      response.status(payload.code).json(payload);
      return;
    }

    this.logger.error('Unhandled request error', {
      detail: exception instanceof Error ? exception.message : String(exception),
      stack: exception instanceof Error ? exception.stack : undefined,
    });

    const payload: ErrorResponse = {
      error: 'Internal server error',
      code: HttpStatus.INTERNAL_SERVER_ERROR,
      timestamp: new Date().toISOString(),
    };
    response.status(payload.code).json(payload);
  }
}
