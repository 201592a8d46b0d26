import { InvoiceTotals, TotalsMismatch } from '@peppol-books/shared/types/peppol.types';

export type EInvoiceErrorCode =
  | 'VALIDATION_ERROR'
  | 'INCOMPLETE_DOCUMENT'
  | 'MALFORMED_XML'
  | 'SCHEMA_VIOLATION'
  | 'UNSUPPORTED_VERSION'
  | 'UNSUPPORTED_FEATURE'
  | 'TOTALS_MISMATCH';

/**
 * Base class of every error raised by the invoice codec.
 * `code` is stable and safe to switch on.
 */
export abstract class EInvoiceError extends Error {
  abstract readonly code: EInvoiceErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Structured details for API responses and logs
   */
  abstract details(): Record<string, unknown>;
}

/**
 * Bad input to the calculator or builder
 */
export class ValidationError extends EInvoiceError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly field: string,
    readonly lineIndex?: number,
  ) {
    super(lineIndex === undefined ? message : `Line ${lineIndex}: ${message}`);
  }

  details(): Record<string, unknown> {
    return { field: this.field, lineIndex: this.lineIndex };
  }
}

export class IncompleteDocumentError extends EInvoiceError {
  readonly code = 'INCOMPLETE_DOCUMENT';

  constructor(readonly missingFields: string[]) {
    super(`Invoice is missing mandatory data: ${missingFields.join(', ')}`);
  }

  details(): Record<string, unknown> {
    return { missingFields: this.missingFields };
  }
}

export class MalformedXMLError extends EInvoiceError {
  readonly code = 'MALFORMED_XML';

  constructor(readonly reason: string) {
    super(`Document is not well-formed XML: ${reason}`);
  }

  details(): Record<string, unknown> {
    return { reason: this.reason };
  }
}

export class SchemaViolationError extends EInvoiceError {
  readonly code = 'SCHEMA_VIOLATION';

  constructor(
    message: string,
    readonly path: string,
  ) {
    super(`${message} (${path})`);
  }

  details(): Record<string, unknown> {
    return { path: this.path };
  }
}

export class UnsupportedVersionError extends EInvoiceError {
  readonly code = 'UNSUPPORTED_VERSION';

  constructor(
    readonly element: string,
    readonly actual: string,
  ) {
    super(`Unsupported ${element}: ${actual}`);
  }

  details(): Record<string, unknown> {
    return { element: this.element, actual: this.actual };
  }
}

export class UnsupportedFeatureError extends EInvoiceError {
  readonly code = 'UNSUPPORTED_FEATURE';

  constructor(
    readonly feature: string,
    readonly path: string,
  ) {
    super(`Unsupported feature: ${feature} (${path})`);
  }

  details(): Record<string, unknown> {
    return { feature: this.feature, path: this.path };
  }
}

/**
 * Declared totals of a received document disagree with the recomputed ones
 */
export class TotalsMismatchError extends EInvoiceError {
  readonly code = 'TOTALS_MISMATCH';

  constructor(
    readonly declared: InvoiceTotals,
    readonly recomputed: InvoiceTotals,
    readonly mismatches: TotalsMismatch[],
  ) {
    super(
      'Declared totals do not match recomputed totals: ' +
        mismatches.map(m => `${m.field} declared ${m.declared} recomputed ${m.recomputed}`).join('; '),
    );
  }

  details(): Record<string, unknown> {
    return {
      declared: this.declared,
      recomputed: this.recomputed,
      mismatches: this.mismatches,
    };
  }
}
