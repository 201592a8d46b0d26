import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import request from 'supertest';
import { PEPPOL_TRANSPORT } from '@peppol-books/einvoice/peppyrus/peppyrus-client';
import { AppModule } from '../src/app.module';
import { FakeTransport } from './fake-transport';

/**
 * E2E tests for users, transactions and invoice records
 */
describe('Bookkeeping (e2e)', () => {
  let app: INestApplication;
  let supplierId: number;
  let customerId: number;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(PEPPOL_TRANSPORT)
      .useValue(new FakeTransport())
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
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /users', () => {
    it('should create a user with defaults', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/users')
        .send({ company: 'Test Supplier BV', vatNumber: 'BE0111111111', peppolId: '0208:BE0111111111' })
        .expect(201);

      expect(response.body).toEqual({
        id: expect.any(Number),
        company: 'Test Supplier BV',
        name: null,
        vatNumber: 'BE0111111111',
        countryCode: 'BE',
        street: null,
        city: null,
        postalCode: null,
        peppolId: '0208:BE0111111111',
      });
      supplierId = response.body.id;

      const customer = await request(app.getHttpServer())
        .post('/api/users')
        .send({ company: 'Test Customer SA', countryCode: 'FR', city: 'Lille' })
        .expect(201);
      customerId = customer.body.id;
    });

    it('should reject an invalid country code', async () => {
      await request(app.getHttpServer())
        .post('/api/users')
        .send({ company: 'Nowhere Ltd', countryCode: 'France' })
        .expect(400);
    });

    it('should reject unknown fields', async () => {
      await request(app.getHttpServer())
        .post('/api/users')
        .send({ company: 'Extra Ltd', password: 'test-secret' })
        .expect(400);
    });

    it('should reject a malformed Peppol identifier', async () => {
      await request(app.getHttpServer())
        .post('/api/users')
        .send({ company: 'Colon Ltd', peppolId: 'BE0111111111' })
        .expect(400);
    });
  });

  describe('GET /users', () => {
    it('should list users in creation order', async () => {
      const response = await request(app.getHttpServer()).get('/api/users').expect(200);

      expect(response.body.map((user: { company: string }) => user.company)).toEqual([
        'Test Supplier BV',
        'Test Customer SA',
      ]);
    });

    it('should get one user', async () => {
      const response = await request(app.getHttpServer()).get(`/api/users/${customerId}`).expect(200);

      expect(response.body).toMatchObject({ company: 'Test Customer SA', countryCode: 'FR', city: 'Lille' });
    });

    it('should answer 404 for an unknown user', async () => {
      await request(app.getHttpServer()).get('/api/users/9999').expect(404);
    });

    it('should answer 400 for a non numeric id', async () => {
      await request(app.getHttpServer()).get('/api/users/abc').expect(400);
    });
  });

  describe('transactions', () => {
    it('should record a transaction between two users', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/transactions')
        .send({
          name: 'Office rent January',
          fromUserId: supplierId,
          toUserId: customerId,
          value: 1000,
          vat: 210,
          start: '2025-01-01',
          end: '2025-01-31',
          annotation: 'Monthly rent',
        })
        .expect(201);

      expect(response.body).toEqual({
        id: expect.any(Number),
        name: 'Office rent January',
        fromUserId: supplierId,
        toUserId: customerId,
        value: 1000,
        vat: 210,
        vatRecovery: 1,
        currency: 'EUR',
        start: '2025-01-01',
        end: '2025-01-31',
        intervat: false,
        annotation: 'Monthly rent',
        proof: null,
      });
    });

    it('should refuse a transaction with an unknown user', async () => {
      await request(app.getHttpServer())
        .post('/api/transactions')
        .send({ name: 'Ghost', fromUserId: supplierId, toUserId: 9999, value: 1, start: '2025-01-01' })
        .expect(404);
    });

    it('should refuse a recovery share above 1', async () => {
      await request(app.getHttpServer())
        .post('/api/transactions')
        .send({ name: 'Car', fromUserId: supplierId, toUserId: customerId, value: 1, vatRecovery: 1.5, start: '2025-01-01' })
        .expect(400);
    });

    it('should list transactions', async () => {
      const response = await request(app.getHttpServer()).get('/api/transactions').expect(200);

      expect(response.body).toHaveLength(1);
      expect(response.body[0].name).toBe('Office rent January');
    });
  });

  describe('GET /invoices', () => {
    it('should start empty', async () => {
      await request(app.getHttpServer()).get('/api/invoices').expect(200, []);
    });

    it('should reject an unknown direction', async () => {
      await request(app.getHttpServer()).get('/api/invoices?direction=sideways').expect(400);
    });
  });

  describe('GET /health', () => {
    it('should report the database as up', async () => {
      const response = await request(app.getHttpServer()).get('/api/health').expect(200);

      expect(response.body).toMatchObject({ status: 'healthy', checks: { database: 'up' } });
    });
  });
});
