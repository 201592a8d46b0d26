import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { EInvoiceError, EInvoiceErrorCode } from '@peppol-books/einvoice/peppol/errors';
import { PeppyrusApiError } from '@peppol-books/einvoice/peppyrus/peppyrus-client';

// Bad input from the caller is a 400; a received document we cannot accept is a 422
const STATUS_BY_CODE: Record<EInvoiceErrorCode, HttpStatus> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  INCOMPLETE_DOCUMENT: HttpStatus.BAD_REQUEST,
  MALFORMED_XML: HttpStatus.UNPROCESSABLE_ENTITY,
  SCHEMA_VIOLATION: HttpStatus.UNPROCESSABLE_ENTITY,
  UNSUPPORTED_VERSION: HttpStatus.UNPROCESSABLE_ENTITY,
  UNSUPPORTED_FEATURE: HttpStatus.UNPROCESSABLE_ENTITY,
  TOTALS_MISMATCH: HttpStatus.UNPROCESSABLE_ENTITY,
};

/**
 * Maps codec and access point errors to HTTP responses
 */
@Catch(EInvoiceError, PeppyrusApiError)
export class EInvoiceExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(EInvoiceExceptionFilter.name);

  catch(exception: EInvoiceError | PeppyrusApiError, host: ArgumentsHost) {
    // Routes that answer XML set their content type up front
    const response = host.switchToHttp().getResponse<Response>().type('application/json');

    if (exception instanceof PeppyrusApiError) {
      this.logger.error(exception.message);
      response.status(HttpStatus.BAD_GATEWAY).json({
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'ACCESS_POINT_ERROR',
        message: exception.message,
        details: { status: exception.status, body: exception.body },
      });
      return;
    }

    const statusCode = STATUS_BY_CODE[exception.code];
    this.logger.warn(`${exception.code}: ${exception.message}`);

    response.status(statusCode).json({
      statusCode,
      error: exception.code,
      message: exception.message,
      details: exception.details(),
    });
  }
}
