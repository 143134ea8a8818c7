import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import * as Sentry from '@sentry/node';
import { RequestContextService } from '../context/request-context.service';
import { DomainError, ErrorCode, errorCodeForStatus, isErrorCode } from '../errors';

interface HttpExceptionBody {
  message?: unknown;
  code?: unknown;
  details?: unknown;
  errors?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Catch()
@Injectable()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly context: RequestContextService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const correlationId =
      this.context.correlationId() || (request.headers['x-correlation-id'] as string | undefined);

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let details: unknown;
    let code: ErrorCode = ErrorCode.INTERNAL_ERROR;

    if (exception instanceof DomainError) {
      status = exception.httpStatus;
      message = exception.userMessage;
      code = exception.code;
      details = exception.details;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      code = errorCodeForStatus(status);
      const res = exception.getResponse();
      if (typeof res === 'string') {
        message = res;
      } else if (isRecord(res)) {
        const body: HttpExceptionBody = res;
        if (Array.isArray(body.message)) {
          details = { errors: body.message };
          message = 'Validation failed';
        } else {
          details = body.details ?? body.errors;
          message = typeof body.message === 'string' && body.message ? body.message : exception.message;
        }
        if (isErrorCode(body.code)) {
          code = body.code;
        }
      } else {
        message = exception.message;
      }
    } else if (exception instanceof Error) {
      // upstream failures are echoed to the caller as-is
      message = exception.message;
    }

    if (status >= 500) {
      Sentry.captureException(exception, {
        tags: { correlationId: correlationId || '' },
        extra: { path: request.path, method: request.method },
      });
    }

    const logPayload = {
      correlationId,
      path: request.path,
      method: request.method,
      status,
      code,
    };
    if (status >= 500) {
      this.logger.error({ ...logPayload, message }, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn({ ...logPayload, message });
    }

    if (response.headersSent) {
      return;
    }

    response.status(status).json({
      error: message,
      code,
      details,
      correlationId,
    });
  }
}
