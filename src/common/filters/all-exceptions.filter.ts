import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { InsightsError, InsightsErrorKind } from '../errors/insights.errors';

const STATUS_BY_KIND: Record<InsightsErrorKind, HttpStatus> = {
  InvalidArgument: HttpStatus.BAD_REQUEST,
  AcquisitionTimeout: HttpStatus.GATEWAY_TIMEOUT,
  AcquisitionFailed: HttpStatus.BAD_GATEWAY,
  NotFound: HttpStatus.NOT_FOUND,
  TransientFailure: HttpStatus.CONFLICT,
  StorageFailure: HttpStatus.SERVICE_UNAVAILABLE,
};

const KIND_BY_STATUS: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'InvalidArgument',
  [HttpStatus.NOT_FOUND]: 'NotFound',
  [HttpStatus.CONFLICT]: 'TransientFailure',
};

export interface ErrorBody {
  success: false;
  error: { kind: string; message: string };
  path: string;
  timestamp: string;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const path = String(httpAdapter.getRequestUrl(ctx.getRequest()));

    const { status, kind, message } = this.describe(exception);
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${kind} on ${path}: ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const body: ErrorBody = {
      success: false,
      error: { kind, message },
      path,
      timestamp: new Date().toISOString(),
    };
    httpAdapter.reply(ctx.getResponse(), body, status);
  }

  describe(exception: unknown): { status: number; kind: string; message: string } {
    if (exception instanceof InsightsError) {
      return {
        status: STATUS_BY_KIND[exception.kind],
        kind: exception.kind,
        message: exception.message,
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        kind: KIND_BY_STATUS[status] ?? 'Http',
        message: this.httpMessage(exception),
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      kind: 'Internal',
      message: 'Internal server error',
    };
  }

  // ValidationPipe puts the individual constraint messages in an array.
  private httpMessage(exception: HttpException): string {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if ('message' in response) {
      const { message } = response;
      if (Array.isArray(message)) {
        return message.map(String).join('; ');
      }
      if (typeof message === 'string') {
        return message;
      }
    }
    return exception.message;
  }
}
