import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { buildInvoice } from '@peppol-books/einvoice/peppol/invoice-builder';
import { UblGenerator } from '@peppol-books/einvoice/peppol/ubl-generator';
import { PEPPOL_TRANSPORT } from '@peppol-books/einvoice/peppyrus/peppyrus-client';
import { AppModule } from '../src/app.module';
import { PeppolService } from '../src/peppol/peppol.service';
import { FakeTransport } from './fake-transport';

/**
 * E2E tests for Peppol send, import and validation
 */
describe('Peppol (e2e)', () => {
  let app: INestApplication;
  let transport: FakeTransport;
  let buyerId: number;

  const incomingXml = new UblGenerator().generate(
    buildInvoice({
      id: 'ACME-42',
      issueDate: '2025-02-01',
      supplier: {
        peppolId: '0208:BE0555555555',
        name: 'Acme Supplies',
        vatNumber: 'BE0555555555',
        address: { street: 'Harbour Road 5', city: 'Antwerp', postalCode: '2000', countryCode: 'BE' },
      },
      buyer: {
        peppolId: '0208:BE0123456789',
        name: 'My Company',
        address: { countryCode: 'BE' },
      },
      items: [
        { name: 'Paper', quantity: 4, unitPrice: 25, vatPct: 0.21 },
        { name: 'Books', quantity: 1, unitPrice: 50, vatPct: 0.06 },
      ],
    }),
  );
  const tamperedXml = incomingXml
    .replace('<cbc:ID>ACME-42</cbc:ID>', '<cbc:ID>ACME-43</cbc:ID>')
    .replace(
      '<cbc:PayableAmount currencyID="EUR">174.00</cbc:PayableAmount>',
      '<cbc:PayableAmount currencyID="EUR">184.00</cbc:PayableAmount>',
    );

  const consulting = {
    invoiceId: 'INV-2025-001',
    issueDate: '2025-01-15',
    items: [{ name: 'Consulting', quantity: 10, unitPrice: 75, vatPct: 0.21 }],
  };

  beforeAll(async () => {
    transport = new FakeTransport();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(PEPPOL_TRANSPORT)
      .useValue(transport)
      .compile();

    app = moduleFixture.createNestApplication();
    app.setGlobalPrefix('api');
    app.useGlobalPipes(
      new ValidationPipe({
        transform: true,
        whitelist: true,
        forbidNonWhitelisted: true,
      }),
    );
    await app.init();

    const buyer = await request(app.getHttpServer())
      .post('/api/users')
      .send({
        company: 'Customer NV',
        vatNumber: 'BE0987654321',
        countryCode: 'BE',
        street: 'Other Street 2',
        city: 'Other City',
        postalCode: '2000',
        peppolId: '0208:BE0987654321',
      })
      .expect(201);
    buyerId = buyer.body.id;
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /peppol/invoices/xml', () => {
    it('should return the UBL document for the consulting scenario', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/peppol/invoices/xml')
        .send({ ...consulting, buyerId })
        .expect(200);

      expect(response.headers['content-type']).toContain('application/xml');
      expect(response.text).toContain('<cbc:LineExtensionAmount currencyID="EUR">750.00</cbc:LineExtensionAmount>');
      expect(response.text).toContain('<cbc:TaxAmount currencyID="EUR">157.50</cbc:TaxAmount>');
      expect(response.text).toContain('<cbc:TaxInclusiveAmount currencyID="EUR">907.50</cbc:TaxInclusiveAmount>');
      expect(response.text).toContain('<cbc:Name>My Company</cbc:Name>');
      expect(response.text).toContain('<cbc:CompanyID>BE0123456789</cbc:CompanyID>');
      expect(transport.sent).toHaveLength(0);
    });

    it('should map calculator errors to 400', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/peppol/invoices/xml')
        .send({ ...consulting, buyerId, items: [{ name: 'Books', quantity: 1, unitPrice: 20, vatPct: 0 }] })
        .expect(400);

      expect(response.headers['content-type']).toContain('application/json');
      expect(response.body).toEqual({
        statusCode: 400,
        error: 'VALIDATION_ERROR',
        message: 'Line 0: VAT category is required for a line without VAT',
        details: { field: 'vatCategory', lineIndex: 0 },
      });
    });

    it('should reject an unknown VAT category in the request', async () => {
      await request(app.getHttpServer())
        .post('/api/peppol/invoices/xml')
        .send({ ...consulting, buyerId, items: [{ ...consulting.items[0], vatCategory: 'XX' }] })
        .expect(400);
    });

    it('should reject a buyer without a Peppol identifier', async () => {
      const user = await request(app.getHttpServer()).post('/api/users').send({ company: 'Offline BV' }).expect(201);

      const response = await request(app.getHttpServer())
        .post('/api/peppol/invoices/xml')
        .send({ ...consulting, buyerId: user.body.id })
        .expect(400);

      expect(response.body.message).toBe('The buyer Offline BV has no Peppol identifier');
    });
  });

  describe('POST /peppol/invoices/send', () => {
    it('should send the invoice and record it as outgoing', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/peppol/invoices/send')
        .send({ ...consulting, buyerId })
        .expect(201);

      expect(response.body).toMatchObject({
        status: 200,
        messageId: 'out-1',
        invoiceId: 'INV-2025-001',
        totals: { lineExtensionAmount: 750, taxAmount: 157.5, taxInclusiveAmount: 907.5, payableAmount: 907.5 },
      });
      expect(transport.sent).toHaveLength(1);
      expect(transport.sent[0]).toContain('<cbc:ID>INV-2025-001</cbc:ID>');

      const invoices = await request(app.getHttpServer()).get('/api/invoices?direction=outgoing').expect(200);
      expect(invoices.body).toHaveLength(1);
      expect(invoices.body[0]).toMatchObject({
        externalId: 'INV-2025-001',
        peppolMessageId: 'out-1',
        direction: 'outgoing',
        buyerId,
        issueDate: '2025-01-15',
        totalAmount: 907.5,
        vatAmount: 157.5,
        transactionId: response.body.transactionId,
      });
    });

    it('should answer 502 when the access point refuses the invoice', async () => {
      transport.sendResult = { status: 500, body: 'internal error' };

      try {
        await request(app.getHttpServer())
          .post('/api/peppol/invoices/send')
          .send({ ...consulting, invoiceId: 'INV-2025-002', buyerId })
          .expect(502);
      } finally {
        transport.sendResult = { status: 200, body: '{"id":"out-1"}' };
      }

      const invoices = await request(app.getHttpServer()).get('/api/invoices?direction=outgoing').expect(200);
      expect(invoices.body).toHaveLength(1);
    });
  });

  describe('POST /peppol/inbox/import', () => {
    beforeAll(() => {
      transport.inbox = [
        { id: 'msg-1', sender: '0208:BE0555555555', date: '2025-02-01T10:00:00Z' },
        { id: 'msg-2' },
        { id: 'msg-3' },
        { id: 'msg-4' },
      ];
      transport.details.set('msg-1', { id: 'msg-1', document: Buffer.from(incomingXml).toString('base64') });
      transport.details.set('msg-2', { id: 'msg-2' });
      transport.details.set('msg-3', { id: 'msg-3', document: Buffer.from(tamperedXml).toString('base64') });
    });

    it('should import valid invoices and report the others', async () => {
      const response = await request(app.getHttpServer()).post('/api/peppol/inbox/import').expect(200);

      expect(response.body).toHaveLength(3);
      expect(response.body[0]).toMatchObject({
        messageId: 'msg-1',
        status: 'imported',
        invoiceId: 'ACME-42',
        supplier: 'Acme Supplies',
        buyer: 'My Company',
        date: '2025-02-01',
        total: 174,
        vat: 24,
      });
      expect(response.body[1]).toEqual({ messageId: 'msg-2', status: 'error', error: 'No document found' });
      expect(response.body[2]).toMatchObject({ messageId: 'msg-3', status: 'error', errorCode: 'TOTALS_MISMATCH' });

      const transactions = await request(app.getHttpServer()).get('/api/transactions').expect(200);
      const imported = transactions.body.find((t: { name: string }) => t.name === 'Invoice ACME-42');
      expect(imported).toMatchObject({
        value: 150,
        vat: 24,
        vatRecovery: 1,
        currency: 'EUR',
        start: '2025-02-01',
        annotation: 'Imported from Peppol message msg-1',
      });

      const users = await request(app.getHttpServer()).get('/api/users').expect(200);
      const supplier = users.body.find((u: { company: string }) => u.company === 'Acme Supplies');
      expect(supplier).toMatchObject({ peppolId: '0208:BE0555555555', vatNumber: 'BE0555555555', city: 'Antwerp' });
      expect(users.body.filter((u: { company: string }) => u.company === 'My Company')).toHaveLength(1);
    });

    it('should report an already imported message as a duplicate', async () => {
      const response = await request(app.getHttpServer()).post('/api/peppol/inbox/import').expect(200);

      expect(response.body[0]).toEqual({ messageId: 'msg-1', status: 'duplicate' });

      const invoices = await request(app.getHttpServer()).get('/api/invoices?direction=incoming').expect(200);
      expect(invoices.body).toHaveLength(1);
    });

    it('should store a message once when two imports run at the same time', async () => {
      const peppolService = app.get(PeppolService);
      const document = Buffer.from(incomingXml.replace('<cbc:ID>ACME-42</cbc:ID>', '<cbc:ID>ACME-44</cbc:ID>'));
      const detail = { id: 'msg-5', document: document.toString('base64') };

      const results = await Promise.all([
        peppolService.processIncomingInvoice({ id: 'msg-5' }, detail),
        peppolService.processIncomingInvoice({ id: 'msg-5' }, detail),
      ]);

      expect(results.map(result => result.status).sort()).toEqual(['duplicate', 'imported']);

      const invoices = await request(app.getHttpServer()).get('/api/invoices?direction=incoming').expect(200);
      expect(invoices.body.map((invoice: { externalId: string }) => invoice.externalId)).toEqual(['ACME-42', 'ACME-44']);
    });
  });

  describe('POST /peppol/documents/validate', () => {
    it('should validate a received document', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/peppol/documents/validate')
        .send({ document: Buffer.from(incomingXml).toString('base64') })
        .expect(200);

      expect(response.body).toEqual({ valid: true, errors: [], totalsVerified: true });
    });

    it('should report a document that is not XML', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/peppol/documents/validate')
        .send({ document: Buffer.from('this is not xml').toString('base64') })
        .expect(200);

      expect(response.body).toMatchObject({ valid: false, errorCode: 'MALFORMED_XML', totalsVerified: false });
    });

    it('should reject a body that is not base64', async () => {
      await request(app.getHttpServer())
        .post('/api/peppol/documents/validate')
        .send({ document: 'not base64!' })
        .expect(400);
    });
  });
});
