/**
 * Pipeline Exception Filter
 * Maps pipeline errors to HTTP responses. HttpExceptions (including DTO
 * validation failures) keep Nest's own status and body.
 */

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  ConfigurationError,
  PipelineValidationError,
  UpstreamServiceError,
} from '../errors';

export interface ErrorResponse {
  status: number;
  body: object;
}

export function toErrorResponse(exception: unknown): ErrorResponse {
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const response = exception.getResponse();
    return {
      status,
      body:
        typeof response === 'string'
          ? { statusCode: status, message: response }
          : response,
    };
  }

  if (exception instanceof UpstreamServiceError) {
    return {
      status: HttpStatus.BAD_GATEWAY,
      body: {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'UpstreamServiceError',
        service: exception.service,
        message: exception.message,
      },
    };
  }

  if (exception instanceof PipelineValidationError) {
    return {
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      body: {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'ValidationError',
        message: exception.message,
      },
    };
  }

  if (exception instanceof ConfigurationError) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'ConfigurationError',
        message: exception.message,
      },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    },
  };
}

@Catch()
export class PipelineExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PipelineExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = toErrorResponse(exception);

    if (exception instanceof UpstreamServiceError) {
      this.logger.warn(
        `[Error] status=${status} service=${exception.service} upstream_status=${exception.status ?? 'n/a'} message=${exception.message}`,
      );
    } else if (status >= 500) {
      this.logger.error(
        `[Error] status=${status} message=${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json(body);
  }
}
