import {
  Catch,
  HttpException,
  HttpStatus,
  Inject,
  type ArgumentsHost,
  type ExceptionFilter,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  ConversionError,
  ConversionErrorKind,
  JobStateConflictError,
  QueueFullError,
  UploadRejectedError,
  type UploadRejectionReason,
} from '../../domain/errors/conversion.errors';
import { readCorrelationId } from '../../shared/logging/correlation-id.middleware';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export interface ErrorResponseBody {
  error: string;
  message: string;
  [key: string]: unknown;
}

export interface MappedError {
  status: number;
  body: ErrorResponseBody;
  headers?: Record<string, string>;
}

const UPLOAD_REJECTION_STATUS: Record<UploadRejectionReason, number> = {
  missing_file: HttpStatus.BAD_REQUEST,
  unsupported_extension: HttpStatus.BAD_REQUEST,
  invalid_options: HttpStatus.BAD_REQUEST,
  too_large: HttpStatus.PAYLOAD_TOO_LARGE,
};

/** Seconds a client should wait before retrying a refused submission. */
export const QUEUE_FULL_RETRY_AFTER_SECONDS = 5;

function hasStatusCode(error: unknown): error is Error & { statusCode: number; code?: string } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

/**
 * Maps an error thrown by a handler to the HTTP answer.
 */
export function mapError(exception: unknown): MappedError {
  if (exception instanceof UploadRejectedError) {
    return {
      status: UPLOAD_REJECTION_STATUS[exception.reason],
      body: { error: 'UploadRejected', reason: exception.reason, message: exception.message },
    };
  }

  if (exception instanceof JobStateConflictError) {
    return {
      status: HttpStatus.CONFLICT,
      body: {
        error: 'Conflict',
        message: exception.message,
        jobId: exception.jobId,
        status: exception.status,
        ...(exception.detail && { detail: exception.detail }),
      },
    };
  }

  if (exception instanceof QueueFullError) {
    return {
      status: HttpStatus.SERVICE_UNAVAILABLE,
      body: { error: 'QueueFull', message: exception.message },
      headers: { 'retry-after': String(QUEUE_FULL_RETRY_AFTER_SECONDS) },
    };
  }

  if (exception instanceof ConversionError) {
    // Only NotFound reaches the HTTP layer; job failures live on the job
    const status =
      exception.kind === ConversionErrorKind.NOT_FOUND
        ? HttpStatus.NOT_FOUND
        : HttpStatus.INTERNAL_SERVER_ERROR;
    return { status, body: { error: exception.kind, message: exception.message } };
  }

  if (exception instanceof HttpException) {
    return {
      status: exception.getStatus(),
      body: { error: exception.name.replace(/Exception$/, ''), message: exception.message },
    };
  }

  // Errors raised by Fastify or its plugins (body parsing, multipart limits)
  if (hasStatusCode(exception) && exception.statusCode >= 400 && exception.statusCode < 500) {
    if (exception.code === 'FST_REQ_FILE_TOO_LARGE') {
      return mapError(new UploadRejectedError('too_large', exception.message));
    }
    return {
      status: exception.statusCode,
      body: { error: 'BadRequest', message: exception.message },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { error: 'InternalError', message: 'Internal server error' },
  };
}

/**
 * Turns domain errors into JSON error responses.
 */
@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger: PinoLoggerService;

  constructor(@Inject(PinoLoggerService) logger: PinoLoggerService) {
    this.logger = logger.forContext(DomainExceptionFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const reply = http.getResponse<FastifyReply>();
    const correlationId = readCorrelationId(http.getRequest<FastifyRequest>().raw);
    const logger = correlationId ? this.logger.withCorrelationId(correlationId) : this.logger;
    const mapped = mapError(exception);

    if (mapped.status >= 500) {
      logger.error(
        {
          error: exception instanceof Error ? exception.message : String(exception),
          stack: exception instanceof Error ? exception.stack : undefined,
        },
        'Unhandled error',
      );
    } else {
      logger.debug({ status: mapped.status, error: mapped.body.error }, mapped.body.message);
    }

    reply.status(mapped.status).headers(mapped.headers ?? {}).send(mapped.body);
  }
}
