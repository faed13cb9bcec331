import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { SupportError, type SupportErrorCode } from './errors';

const STATUS_BY_CODE: Record<SupportErrorCode, number> = {
  INVALID_ARGUMENT: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INDEX_BUSY: HttpStatus.CONFLICT,
  INDEX_CORRUPT: HttpStatus.INTERNAL_SERVER_ERROR,
  EMBEDDING_FAILED: HttpStatus.BAD_GATEWAY,
  GENERATION_FAILED: HttpStatus.BAD_GATEWAY,
  GENERATION_TIMEOUT: HttpStatus.GATEWAY_TIMEOUT,
  GENERATION_RATE_LIMITED: HttpStatus.TOO_MANY_REQUESTS,
  REQUEST_TIMEOUT: HttpStatus.GATEWAY_TIMEOUT,
};

export function statusForError(err: SupportError): number {
  return STATUS_BY_CODE[err.code];
}

@Catch(SupportError)
export class SupportExceptionFilter implements ExceptionFilter<SupportError> {
  private readonly logger = new Logger(SupportExceptionFilter.name);

  catch(exception: SupportError, host: ArgumentsHost) {
    const status = statusForError(exception);
    if (status >= 500) {
      this.logger.error(exception.message, exception.stack);
    }

    const res = host.switchToHttp().getResponse<Response>();
    res.status(status).json({
      statusCode: status,
      error: exception.code,
      message: exception.message,
    });
  }
}
