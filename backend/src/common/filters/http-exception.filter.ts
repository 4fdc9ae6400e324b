import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

import { readString, resolvePath } from '../utils/payload-reader';

const CONNECTIVITY_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', '57P01', '57P03', '53300']);

const isConnectivityError = (exception: Error): boolean => {
  const code = readString(exception, 'code');
  if (code && CONNECTIVITY_CODES.has(code)) {
    return true;
  }
  return /database query timeout|ECONNREFUSED|ENOTFOUND|connection terminated/i.test(exception.message);
};

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error: string | undefined = undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else {
        const detail = resolvePath(exceptionResponse, 'message');
        if (Array.isArray(detail)) {
          message = detail.map(String).join(', ');
        } else if (typeof detail === 'string') {
          message = detail;
        }
        error = readString(exceptionResponse, 'error');
      }
    } else if (exception instanceof Error && isConnectivityError(exception)) {
      status = HttpStatus.SERVICE_UNAVAILABLE;
      message = 'Database connection error. Please try again.';
    }

    // Internal detail stays in the log
    const logMessage = `${request.method} ${request.url} - ${status} - ${
      exception instanceof Error ? exception.message : message
    }`;
    if (status >= 500) {
      this.logger.error(logMessage, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(logMessage);
    }

    response.status(status).json({
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      message,
      ...(error && { error }),
    });
  }
}
