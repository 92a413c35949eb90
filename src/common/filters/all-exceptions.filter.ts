import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { REQUEST_ID_HEADER } from '../middleware/request-id.middleware';

export interface ErrorResponseBody {
  statusCode: number;
  message: string;
  requestId?: string;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;
    const header = request.headers[REQUEST_ID_HEADER];
    const requestId = typeof header === 'string' ? header : undefined;

    const summary = `${request.method} ${request.url} -> ${status} [${requestId ?? 'no-request-id'}]`;
    if (status >= 500) {
      this.logger.error(summary, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(`${summary}: ${describeException(exception)}`);
    }

    if (response.headersSent) {
      return;
    }

    const body: ErrorResponseBody = {
      statusCode: status,
      message: describeException(exception),
      requestId,
    };
    response.status(status).json(body);
  }
}

/**
 * HttpException bodies are either a string or `{ message: string | string[] }`
 * (ValidationPipe sends one message per failed constraint).
 */
function describeException(exception: unknown): string {
  if (exception instanceof HttpException) {
    const body = exception.getResponse();
    if (typeof body === 'string') {
      return body;
    }
    if (typeof body === 'object' && body !== null && 'message' in body) {
      const { message } = body;
      if (typeof message === 'string') {
        return message;
      }
      if (Array.isArray(message)) {
        return message.join('; ');
      }
    }
    return exception.message;
  }

  // Unexpected errors are not echoed to the caller.
  return 'Internal server error';
}
