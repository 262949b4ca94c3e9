import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
  BadRequestException,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ThrottlerException } from '@nestjs/throttler';
import { ApiErrorDetails, createErrorResponse } from '../dto/api-response.dto';

interface HttpExceptionBody {
  message?: string | string[];
  error?: string;
}

function isExceptionBody(value: unknown): value is HttpExceptionBody {
  return typeof value === 'object' && value !== null;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();

    const httpStatus =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const { message, details } = this.describe(exception);

    if (httpStatus >= 500) {
      this.logger.error(exception);
    } else {
      this.logger.warn(`${httpStatus} ${message}`);
    }

    httpAdapter.reply(
      ctx.getResponse(),
      createErrorResponse(details, message, httpStatus),
      httpStatus
    );
  }

  /**
   * Message and details for the error envelope
   */
  describe(exception: unknown): { message: string; details: ApiErrorDetails } {
    if (exception instanceof ThrottlerException) {
      const message =
        'You have exceeded the rate limit for this action. Please, try again later.';
      return { message, details: message };
    }

    if (exception instanceof HttpException) {
      const body = exception.getResponse();

      if (typeof body === 'string') {
        return { message: body, details: body };
      }

      if (isExceptionBody(body) && Array.isArray(body.message)) {
        // class-validator failures arrive as a list of messages
        if (exception instanceof BadRequestException) {
          return {
            message: 'Validation failed',
            details: this.formatValidationErrors(body.message),
          };
        }
        const first = body.message[0] ?? exception.message;
        return { message: first, details: first };
      }

      if (isExceptionBody(body) && typeof body.message === 'string') {
        return { message: body.message, details: body.message };
      }

      return { message: exception.message, details: exception.message };
    }

    if (exception instanceof Error) {
      return { message: exception.message, details: 'Internal server error' };
    }

    return { message: 'An error occurred', details: 'Internal server error' };
  }

  /**
   * Group validation messages by the field they start with
   */
  private formatValidationErrors(messages: string[]): Record<string, string[]> {
    const errors: Record<string, string[]> = {};

    for (const message of messages) {
      const match = /^(\w+)\s/.exec(message);
      const field = match ? match[1] : 'general';

      if (!errors[field]) {
        errors[field] = [];
      }
      errors[field].push(message);
    }

    return errors;
  }
}
