import { PeppolInvoice, PeppolParty } from '@peppol-books/shared/types/peppol.types';
import { EInvoiceError, IncompleteDocumentError } from './errors';
import { UblParser } from './ubl-parser';

export interface UblValidationReport {
  valid: boolean;
  errors: string[];
  errorCode?: string;
  totalsVerified: boolean;
}

export class UblValidator {
  constructor(private readonly parser = new UblParser()) {}

  /**
   * Validate a received document without throwing for codec errors
   */
  validate(xml: string | Uint8Array): UblValidationReport {
    try {
      const { totalsCheck } = this.parser.parse(xml, { totalsCheck: 'report' });
      const errors = totalsCheck.mismatches.map(
        m => `Totals mismatch on ${m.field}: declared ${m.declared}, recomputed ${m.recomputed}`,
      );

      return {
        valid: totalsCheck.passed,
        errors,
        totalsVerified: totalsCheck.passed,
      };
    } catch (error) {
      if (!(error instanceof EInvoiceError)) {
        throw error;
      }

      return {
        valid: false,
        errors: [error.message],
        errorCode: error.code,
        totalsVerified: false,
      };
    }
  }

  /**
   * Mandatory data the serializer refuses to emit without
   */
  assertComplete(invoice: PeppolInvoice): void {
    const missing: string[] = [];

    if (!invoice.id) missing.push('id');
    if (!invoice.issueDate) missing.push('issueDate');
    if (!invoice.currency) missing.push('currency');

    this.checkParty(invoice.supplier, 'supplier', missing);
    this.checkParty(invoice.buyer, 'buyer', missing);

    if (!invoice.lines || invoice.lines.length === 0) missing.push('lines');
    if (!invoice.vatBreakdown || invoice.vatBreakdown.length === 0) missing.push('vatBreakdown');
    if (!invoice.totals) missing.push('totals');

    if (missing.length > 0) {
      throw new IncompleteDocumentError(missing);
    }
  }

  private checkParty(party: PeppolParty | undefined, role: string, missing: string[]): void {
    if (!party) {
      missing.push(role);
      return;
    }
    if (!party.peppolId) missing.push(`${role}.peppolId`);
    if (!party.name) missing.push(`${role}.name`);
    if (!party.address?.countryCode) missing.push(`${role}.address.countryCode`);
  }
}
