import {
  InvoiceTotals,
  PeppolInvoiceLine,
  TotalsMismatch,
  VAT_CATEGORY_CODES,
  VatBreakdownEntry,
  VatCategoryCode,
  VatExemptionReasons,
} from '@peppol-books/shared/types/peppol.types';
import Decimal from 'decimal.js';
import { ValidationError } from './errors';
import { amountsDiffer, formatPercent, multiply, roundHalfUp, sum } from './money';

// Categories that carry no VAT and therefore a 0 % rate
const ZERO_RATE_CATEGORIES: readonly VatCategoryCode[] = ['Z', 'E', 'AE', 'K', 'G', 'O'];

const TOTAL_FIELDS = [
  'lineExtensionAmount',
  'taxExclusiveAmount',
  'taxAmount',
  'taxInclusiveAmount',
  'payableAmount',
] as const;

export interface VatCalculationOptions {
  exemptionReasons?: VatExemptionReasons;
  prepaidAmount?: number;
}

export interface VatCalculation {
  vatBreakdown: VatBreakdownEntry[];
  totals: InvoiceTotals;
}

interface BreakdownAccumulator {
  category: VatCategoryCode;
  rate: number;
  taxable: Decimal; // sum of rounded line nets
  unroundedTax: Decimal; // sum of unrounded line VAT
}

export function isVatCategoryCode(code: string): code is VatCategoryCode {
  return VAT_CATEGORY_CODES.some(known => known === code);
}

/**
 * Monetary/VAT calculator for Peppol invoices.
 *
 * Line nets are rounded to the cent. VAT is accumulated from unrounded line
 * amounts and rounded once per breakdown entry, never per line, so that many
 * small lines do not drift away from the category total.
 */
export class VatCalculator {
  calculate(lines: readonly PeppolInvoiceLine[], options: VatCalculationOptions = {}): VatCalculation {
    const groups: BreakdownAccumulator[] = [];
    let lineExtensionTotal = new Decimal(0);

    lines.forEach((line, index) => {
      this.validateLine(line, index);

      const net = multiply(line.quantity, line.unitPrice);
      const roundedNet = roundHalfUp(net);

      let group = groups.find(g => g.category === line.vatCategory && g.rate === line.vatRate);
      if (!group) {
        group = {
          category: line.vatCategory,
          rate: line.vatRate,
          taxable: new Decimal(0),
          unroundedTax: new Decimal(0),
        };
        groups.push(group);
      }

      group.taxable = group.taxable.plus(roundedNet);
      group.unroundedTax = group.unroundedTax.plus(net.times(line.vatRate));
      lineExtensionTotal = lineExtensionTotal.plus(roundedNet);
    });

    const vatBreakdown = groups.map(group => {
      const entry: VatBreakdownEntry = {
        category: group.category,
        rate: group.rate,
        taxableAmount: roundHalfUp(group.taxable),
        taxAmount: roundHalfUp(group.unroundedTax),
      };
      const reason = options.exemptionReasons?.[group.category];
      if (reason) {
        entry.exemptionReason = reason;
      }
      return entry;
    });

    const lineExtensionAmount = roundHalfUp(lineExtensionTotal);
    const taxAmount = roundHalfUp(sum(vatBreakdown.map(entry => entry.taxAmount)));
    const taxInclusiveAmount = roundHalfUp(sum([lineExtensionAmount, taxAmount]));

    const totals: InvoiceTotals = {
      lineExtensionAmount,
      taxExclusiveAmount: lineExtensionAmount,
      taxAmount,
      taxInclusiveAmount,
      payableAmount: taxInclusiveAmount,
    };

    const prepaid = options.prepaidAmount;
    if (prepaid !== undefined && prepaid !== 0) {
      if (!Number.isFinite(prepaid) || prepaid < 0) {
        throw new ValidationError('prepaid amount must be a non-negative number', 'prepaidAmount');
      }
      totals.prepaidAmount = roundHalfUp(prepaid);
      totals.payableAmount = roundHalfUp(new Decimal(taxInclusiveAmount).minus(totals.prepaidAmount));
    }

    return { vatBreakdown, totals };
  }

  /**
   * Reject values no invoice line can carry
   */
  validateLine(line: PeppolInvoiceLine, index: number): void {
    if (!Number.isFinite(line.quantity) || line.quantity < 0) {
      throw new ValidationError(`quantity must be a non-negative number, got ${line.quantity}`, 'quantity', index);
    }
    if (!Number.isFinite(line.unitPrice) || line.unitPrice < 0) {
      throw new ValidationError(`unit price must be a non-negative number, got ${line.unitPrice}`, 'unitPrice', index);
    }
    if (!Number.isFinite(line.vatRate) || line.vatRate < 0 || line.vatRate > 1) {
      throw new ValidationError(`VAT rate must be between 0 and 1, got ${line.vatRate}`, 'vatRate', index);
    }
    if (!isVatCategoryCode(line.vatCategory)) {
      throw new ValidationError(`unknown VAT category ${line.vatCategory}`, 'vatCategory', index);
    }
    if (line.vatCategory === 'S' && line.vatRate === 0) {
      throw new ValidationError('standard rated (S) line needs a VAT rate above 0', 'vatRate', index);
    }
    if (ZERO_RATE_CATEGORIES.includes(line.vatCategory) && line.vatRate !== 0) {
      throw new ValidationError(
        `VAT category ${line.vatCategory} requires a 0 rate, got ${line.vatRate}`,
        'vatRate',
        index,
      );
    }
  }

  /**
   * List every declared total or breakdown amount that differs from the
   * recomputed one by more than a cent.
   */
  compare(declared: VatCalculation, recomputed: VatCalculation): TotalsMismatch[] {
    const mismatches: TotalsMismatch[] = [];

    for (const field of TOTAL_FIELDS) {
      if (amountsDiffer(declared.totals[field], recomputed.totals[field])) {
        mismatches.push({
          field,
          declared: declared.totals[field],
          recomputed: recomputed.totals[field],
        });
      }
    }

    for (const entry of recomputed.vatBreakdown) {
      const label = breakdownLabel(entry);
      const match = declared.vatBreakdown.find(d => sameBreakdownKey(d, entry));

      if (!match) {
        mismatches.push({ field: `${label}.taxableAmount`, declared: null, recomputed: entry.taxableAmount });
        mismatches.push({ field: `${label}.taxAmount`, declared: null, recomputed: entry.taxAmount });
        continue;
      }

      if (amountsDiffer(match.taxableAmount, entry.taxableAmount)) {
        mismatches.push({ field: `${label}.taxableAmount`, declared: match.taxableAmount, recomputed: entry.taxableAmount });
      }
      if (amountsDiffer(match.taxAmount, entry.taxAmount)) {
        mismatches.push({ field: `${label}.taxAmount`, declared: match.taxAmount, recomputed: entry.taxAmount });
      }
    }

    for (const entry of declared.vatBreakdown) {
      if (!recomputed.vatBreakdown.some(r => sameBreakdownKey(r, entry))) {
        const label = breakdownLabel(entry);
        mismatches.push({ field: `${label}.taxableAmount`, declared: entry.taxableAmount, recomputed: null });
        mismatches.push({ field: `${label}.taxAmount`, declared: entry.taxAmount, recomputed: null });
      }
    }

    return mismatches;
  }
}

function sameBreakdownKey(a: VatBreakdownEntry, b: VatBreakdownEntry): boolean {
  return a.category === b.category && formatPercent(a.rate) === formatPercent(b.rate);
}

function breakdownLabel(entry: VatBreakdownEntry): string {
  return `vatBreakdown[${entry.category}/${formatPercent(entry.rate)}]`;
}
