import { IncompleteDocumentError, ValidationError } from '@peppol-books/einvoice/peppol/errors';
import { buildInvoice } from '@peppol-books/einvoice/peppol/invoice-builder';
import { UblGenerator } from '@peppol-books/einvoice/peppol/ubl-generator';
import { UblParser } from '@peppol-books/einvoice/peppol/ubl-parser';
import { consultingInvoice } from './fixtures/sample-invoice';

describe('UblGenerator', () => {
  const generator = new UblGenerator();

  it('should produce a UTF-8 Peppol BIS Billing 3.0 invoice', () => {
    const xml = generator.generate(buildInvoice(consultingInvoice()));

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(xml).toContain('xmlns="urn:oasis:names:specification:ubl:schema:xsd:Invoice-2"');
    expect(xml).toContain(
      '<cbc:CustomizationID>urn:cen.eu:en16931:2017#compliant#urn:fdc:peppol.eu:2017:poacc:billing:3.0</cbc:CustomizationID>',
    );
    expect(xml).toContain('<cbc:ProfileID>urn:fdc:peppol.eu:2017:poacc:billing:01:1.0</cbc:ProfileID>');
    expect(xml).toContain('<cbc:EndpointID schemeID="0208">BE0123456789</cbc:EndpointID>');
    expect(xml).toContain('<cbc:EndpointID schemeID="0208">BE0987654321</cbc:EndpointID>');
  });

  it('should write the consulting scenario amounts with two decimals', () => {
    const xml = generator.generate(buildInvoice(consultingInvoice()));

    expect(xml).toContain('<cbc:InvoicedQuantity unitCode="C62">10</cbc:InvoicedQuantity>');
    expect(xml).toContain('<cbc:PriceAmount currencyID="EUR">75.00</cbc:PriceAmount>');
    expect(xml).toContain('<cbc:LineExtensionAmount currencyID="EUR">750.00</cbc:LineExtensionAmount>');
    expect(xml).toContain('<cbc:TaxAmount currencyID="EUR">157.50</cbc:TaxAmount>');
    expect(xml).toContain('<cbc:TaxInclusiveAmount currencyID="EUR">907.50</cbc:TaxInclusiveAmount>');
    expect(xml).toContain('<cbc:PayableAmount currencyID="EUR">907.50</cbc:PayableAmount>');
    expect(xml).toContain('<cbc:Percent>21.00</cbc:Percent>');
  });

  it('should emit blocks in the canonical order', () => {
    const xml = generator.generate(
      buildInvoice(consultingInvoice({ paymentMeans: { code: '30', payeeAccount: { iban: 'BE71096123456769' } } })),
    );

    const order = [
      '<cbc:CustomizationID>',
      '<cbc:ProfileID>',
      '<cbc:ID>INV-2025-001</cbc:ID>',
      '<cbc:IssueDate>',
      '<cbc:DueDate>',
      '<cbc:InvoiceTypeCode>',
      '<cbc:DocumentCurrencyCode>',
      '<cbc:BuyerReference>',
      '<cac:AccountingSupplierParty>',
      '<cac:AccountingCustomerParty>',
      '<cac:PaymentMeans>',
      '<cac:PaymentTerms>',
      '<cac:TaxTotal>',
      '<cac:LegalMonetaryTotal>',
      '<cac:InvoiceLine>',
    ].map(tag => xml.indexOf(tag));

    expect(order.every(position => position >= 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });

  it('should keep unit price precision beyond the cent', () => {
    const xml = generator.generate(
      buildInvoice(consultingInvoice({ items: [{ name: 'Screws', quantity: 3, unitPrice: 0.333, vatPct: 0.21 }] })),
    );

    expect(xml).toContain('<cbc:PriceAmount currencyID="EUR">0.333</cbc:PriceAmount>');
    expect(xml).toContain('<cbc:LineExtensionAmount currencyID="EUR">1.00</cbc:LineExtensionAmount>');
  });

  it('should write a zero amount for a zero rated breakdown entry', () => {
    const xml = generator.generate(
      buildInvoice(
        consultingInvoice({ items: [{ name: 'Export', quantity: 1, unitPrice: 200, vatPct: 0, vatCategory: 'Z' }] }),
      ),
    );

    expect(xml).toContain('<cbc:TaxAmount currencyID="EUR">0.00</cbc:TaxAmount>');
    expect(xml).toContain('<cbc:ID>Z</cbc:ID>');
    expect(xml).toContain('<cbc:Percent>0.00</cbc:Percent>');
  });

  it('should omit the rate for goods not subject to VAT', () => {
    const xml = generator.generate(
      buildInvoice(
        consultingInvoice({ items: [{ name: 'Deposit', quantity: 1, unitPrice: 10, vatPct: 0, vatCategory: 'O' }] }),
      ),
    );

    expect(xml).toContain('<cbc:ID>O</cbc:ID>');
    expect(xml).not.toContain('<cbc:Percent>');
  });

  it('should write exemption reasons on the breakdown entry', () => {
    const xml = generator.generate(
      buildInvoice(
        consultingInvoice({
          items: [{ name: 'Training', quantity: 1, unitPrice: 100, vatPct: 0, vatCategory: 'E' }],
          vatExemptionReasons: { E: 'Exempt under article 44' },
        }),
      ),
    );

    expect(xml).toContain('<cbc:TaxExemptionReason>Exempt under article 44</cbc:TaxExemptionReason>');
  });

  it('should escape markup in text content', () => {
    const xml = generator.generate(
      buildInvoice(consultingInvoice({ items: [{ name: 'R&D <phase 1>', quantity: 1, unitPrice: 10, vatPct: 0.21 }] })),
    );

    expect(xml).toContain('<cbc:Name>R&amp;D &lt;phase 1&gt;</cbc:Name>');
  });

  it('should produce byte-identical output for the same invoice', () => {
    const invoice = buildInvoice(consultingInvoice());

    expect(generator.serialize(invoice).equals(generator.serialize(invoice))).toBe(true);
  });

  it('should refuse an invoice without mandatory data', () => {
    const invoice = buildInvoice(consultingInvoice());
    invoice.buyer = { ...invoice.buyer, peppolId: '' };

    expect.assertions(2);
    try {
      generator.generate(invoice);
    } catch (error) {
      expect(error).toBeInstanceOf(IncompleteDocumentError);
      if (error instanceof IncompleteDocumentError) {
        expect(error.missingFields).toEqual(['buyer.peppolId']);
      }
    }
  });

  it('should derive totals from the lines as they are when written', () => {
    const invoice = buildInvoice(consultingInvoice());
    invoice.lines[0].quantity = 20;

    const xml = generator.generate(invoice);

    expect(xml).not.toContain('750.00');
    expect(xml).toContain('<cbc:TaxableAmount currencyID="EUR">1500.00</cbc:TaxableAmount>');
    expect(xml).toContain('<cbc:TaxAmount currencyID="EUR">315.00</cbc:TaxAmount>');
    expect(xml).toContain('<cbc:PayableAmount currencyID="EUR">1815.00</cbc:PayableAmount>');
    expect(new UblParser().parse(xml).totalsCheck.passed).toBe(true);
  });

  it('should validate line values when writing', () => {
    const invoice = buildInvoice(consultingInvoice());
    invoice.lines[0].quantity = -1;

    expect(() => generator.generate(invoice)).toThrow(
      new ValidationError('quantity must be a non-negative number, got -1', 'quantity', 0),
    );
  });
});
