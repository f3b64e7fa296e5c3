import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { CustomerRevenueNotFoundException } from '../../revenue/domain/exceptions/customer-revenue-not-found.exception';
import { InvalidCsvException } from '../../revenue/domain/exceptions/invalid-csv.exception';
import { TransactionSourceUnavailableException } from '../../revenue/domain/exceptions/transaction-source-unavailable.exception';

interface ErrorDetail {
  field: string;
  constraints: Record<string, string>;
}

function statusForDomainError(exception: unknown): HttpStatus | null {
  if (exception instanceof CustomerRevenueNotFoundException) {
    return HttpStatus.NOT_FOUND;
  }
  if (exception instanceof InvalidCsvException) {
    return HttpStatus.BAD_REQUEST;
  }
  if (exception instanceof TransactionSourceUnavailableException) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  return null;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Let @nestjs/terminus health-check responses pass through unchanged
    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      if (
        typeof exceptionResponse === 'object' &&
        exceptionResponse !== null &&
        'status' in exceptionResponse &&
        ('info' in exceptionResponse || 'error' in exceptionResponse) &&
        'details' in exceptionResponse
      ) {
        response.status(exception.getStatus()).json(exceptionResponse);
        return;
      }
    }

    let statusCode = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let details: ErrorDetail[] = [];

    const domainStatus = statusForDomainError(exception);
    if (domainStatus !== null && exception instanceof Error) {
      statusCode = domainStatus;
      message = exception.message;
    } else if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const body: unknown =
          'message' in exceptionResponse ? exceptionResponse.message : null;
        message = typeof body === 'string' ? body : exception.message;

        // Handle class-validator errors
        if (Array.isArray(body)) {
          message = 'Validation failed';
          details = body.map((msg: unknown) => {
            const text = String(msg);
            return {
              field: text.split(' ')[0] || 'unknown',
              constraints: { validation: text },
            };
          });
        }
      } else {
        message = String(exceptionResponse);
      }
    } else if (exception instanceof Error) {
      message = exception.message;
    }

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} - ${statusCode}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - ${statusCode}: ${message}`,
      );
    }

    response.status(statusCode).json({
      success: false,
      error: {
        statusCode,
        message,
        details,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
