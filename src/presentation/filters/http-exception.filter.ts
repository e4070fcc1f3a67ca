import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import {
  AuthorizationDenied,
  ConstraintViolation,
  DomainError,
  StoreUnavailable,
  ValidationError,
} from '@/domain/errors';
import { LoggerService } from '@/infrastructure/logger';

interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  timestamp: string;
  path: string;
  field?: string;
  value?: unknown;
}

/**
 * Maps HTTP status codes to standard error names (RFC 7231).
 */
const HTTP_STATUS_NAMES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.FORBIDDEN]: 'Forbidden',
  [HttpStatus.NOT_FOUND]: 'Not Found',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'Method Not Allowed',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
};

function domainStatus(error: DomainError): HttpStatus {
  if (error instanceof ValidationError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (error instanceof AuthorizationDenied) {
    return HttpStatus.FORBIDDEN;
  }
  if (error instanceof ConstraintViolation) {
    return HttpStatus.CONFLICT;
  }
  if (error instanceof StoreUnavailable) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function readMessage(source: object): string | string[] | undefined {
  const value: unknown = Reflect.get(source, 'message');
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  return undefined;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new LoggerService(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal server error';
    let error = 'Internal Server Error';
    let details: Pick<ErrorResponse, 'field' | 'value'> = {};

    if (exception instanceof DomainError) {
      status = domainStatus(exception);
      error = HTTP_STATUS_NAMES[status] ?? exception.name;
      // Store failures may carry driver text; keep it in the log only.
      message = exception instanceof StoreUnavailable ? 'Store unavailable' : exception.message;

      if (exception instanceof ValidationError) {
        details = { field: exception.field, value: exception.value };
      } else if (exception instanceof ConstraintViolation) {
        details = { field: exception.field };
      }
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
        error = HTTP_STATUS_NAMES[status] ?? exception.name;
      } else {
        message = readMessage(exceptionResponse) ?? exception.message;
        error = readString(exceptionResponse, 'error') ?? HTTP_STATUS_NAMES[status] ?? exception.name;
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      error = exception.name;
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...details,
    };

    if (status >= 500) {
      this.logger.error('Internal error', {
        error: errorResponse,
        cause: exception instanceof Error && exception.cause instanceof Error ? exception.cause.message : undefined,
        stack: exception instanceof Error ? exception.stack : undefined,
      });
    } else {
      this.logger.warn('Request error', { error: errorResponse });
    }

    // A streamed response that failed midway has nothing left to send.
    if (response.raw.headersSent) {
      return;
    }

    response.status(status).send(errorResponse);
  }
}
