import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import {
  AssistantError,
  CollaboratorTimeoutError,
  CollaboratorUnavailableError,
  DesktopActionFailedError,
  StaleContextReferencedError,
  TurnCancelledError,
  UnresolvableIntentError,
} from './errors';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
}

export function statusForAssistantError(error: AssistantError): number {
  if (error instanceof UnresolvableIntentError) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  if (error instanceof CollaboratorTimeoutError) return HttpStatus.GATEWAY_TIMEOUT;
  if (error instanceof CollaboratorUnavailableError) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  if (error instanceof DesktopActionFailedError) return HttpStatus.BAD_GATEWAY;
  if (
    error instanceof StaleContextReferencedError ||
    error instanceof TurnCancelledError
  ) {
    return HttpStatus.CONFLICT;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request>();

    const body = this.toBody(exception, req.url);
    if (body.statusCode >= 500) {
      this.logger.error(
        `${req.method} ${req.url} → ${body.statusCode}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }
    res.status(body.statusCode).json(body);
  }

  toBody(exception: unknown, path: string): ErrorBody {
    const timestamp = new Date().toISOString();

    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      const message =
        typeof response === 'object' && 'message' in response
          ? this.messageOf(response.message, exception.message)
          : exception.message;
      return {
        statusCode: exception.getStatus(),
        error: exception.name,
        message,
        path,
        timestamp,
      };
    }

    if (exception instanceof AssistantError) {
      return {
        statusCode: statusForAssistantError(exception),
        error: exception.code,
        message: exception.message,
        path,
        timestamp,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'INTERNAL_ERROR',
      message: 'Internal server error',
      path,
      timestamp,
    };
  }

  private messageOf(value: unknown, fallback: string): string | string[] {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.map(String);
    return fallback;
  }
}
