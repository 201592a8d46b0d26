import { Injectable, NotFoundException } from '@nestjs/common';
import {
  CreateInvoiceRecordInput,
  CreateTransactionInput,
  CreateUserInput,
  InvoiceDirection,
  InvoiceRecord,
  TransactionRecord,
  UserRecord,
} from '@peppol-books/shared/types/bookkeeping.types';
import { DatabaseService } from '../database/database.service';

interface UserRow {
  id: number;
  company: string;
  name: string | null;
  vat_number: string | null;
  country_code: string;
  street: string | null;
  city: string | null;
  postal_code: string | null;
  peppol_id: string | null;
}

interface TransactionRow {
  id: number;
  name: string;
  from_user_id: number;
  to_user_id: number;
  value: number;
  vat: number;
  vat_recovery: number;
  currency: string;
  start_date: string;
  end_date: string | null;
  intervat: number;
  annotation: string | null;
  proof: string | null;
}

interface InvoiceRow {
  id: number;
  external_id: string;
  peppol_message_id: string | null;
  direction: InvoiceDirection;
  supplier_id: number;
  buyer_id: number;
  issue_date: string;
  currency: string;
  total_amount: number;
  vat_amount: number;
  transaction_id: number;
}

/**
 * Users, transactions and invoices of the bookkeeping store
 */
@Injectable()
export class BookkeepingService {
  constructor(private readonly db: DatabaseService) {}

  // Users

  async createUser(input: CreateUserInput): Promise<UserRecord> {
    const { lastID } = await this.db.run(
      `INSERT INTO users (company, name, vat_number, country_code, street, city, postal_code, peppol_id)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        input.company,
        input.name ?? null,
        input.vatNumber ?? null,
        input.countryCode ?? 'BE',
        input.street ?? null,
        input.city ?? null,
        input.postalCode ?? null,
        input.peppolId ?? null,
      ],
    );
    return this.getUser(lastID);
  }

  async listUsers(): Promise<UserRecord[]> {
    const rows = await this.db.all<UserRow>('SELECT * FROM users ORDER BY id');
    return rows.map(toUser);
  }

  async getUser(id: number): Promise<UserRecord> {
    const row = await this.db.get<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
    if (!row) {
      throw new NotFoundException(`User ${id} not found`);
    }
    return toUser(row);
  }

  /**
   * Users of received invoices are matched on company name only
   */
  async findOrCreateUserByCompany(company: string, details: Omit<CreateUserInput, 'company'> = {}): Promise<UserRecord> {
    const row = await this.db.get<UserRow>('SELECT * FROM users WHERE company = ? ORDER BY id LIMIT 1', [company]);
    if (row) {
      return toUser(row);
    }
    return this.createUser({ ...details, company });
  }

  // Transactions

  async createTransactionRecord(input: CreateTransactionInput): Promise<TransactionRecord> {
    const { lastID } = await this.db.run(
      `INSERT INTO transactions
         (name, from_user_id, to_user_id, value, vat, vat_recovery, currency, start_date, end_date, intervat, annotation, proof)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        input.name,
        input.fromUserId,
        input.toUserId,
        input.value,
        input.vat ?? 0,
        input.vatRecovery ?? 1,
        input.currency ?? 'EUR',
        input.start,
        input.end ?? null,
        input.intervat ? 1 : 0,
        input.annotation ?? null,
        input.proof ?? null,
      ],
    );

    const row = await this.db.get<TransactionRow>('SELECT * FROM transactions WHERE id = ?', [lastID]);
    if (!row) {
      throw new NotFoundException(`Transaction ${lastID} not found`);
    }
    return toTransaction(row);
  }

  async listTransactions(): Promise<TransactionRecord[]> {
    const rows = await this.db.all<TransactionRow>('SELECT * FROM transactions ORDER BY id');
    return rows.map(toTransaction);
  }

  // Invoices

  async createInvoiceRecord(input: CreateInvoiceRecordInput): Promise<InvoiceRecord> {
    const { lastID } = await this.db.run(
      `INSERT INTO invoices
         (external_id, peppol_message_id, direction, supplier_id, buyer_id, issue_date, currency, total_amount, vat_amount, transaction_id)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        input.externalId,
        input.peppolMessageId,
        input.direction,
        input.supplierId,
        input.buyerId,
        input.issueDate,
        input.currency,
        input.totalAmount,
        input.vatAmount,
        input.transactionId,
      ],
    );

    const row = await this.db.get<InvoiceRow>('SELECT * FROM invoices WHERE id = ?', [lastID]);
    if (!row) {
      throw new NotFoundException(`Invoice ${lastID} not found`);
    }
    return toInvoice(row);
  }

  async listInvoices(direction?: InvoiceDirection): Promise<InvoiceRecord[]> {
    const rows = direction
      ? await this.db.all<InvoiceRow>('SELECT * FROM invoices WHERE direction = ? ORDER BY id', [direction])
      : await this.db.all<InvoiceRow>('SELECT * FROM invoices ORDER BY id');
    return rows.map(toInvoice);
  }

  async findInvoiceByMessageId(peppolMessageId: string): Promise<InvoiceRecord | null> {
    const row = await this.db.get<InvoiceRow>('SELECT * FROM invoices WHERE peppol_message_id = ?', [peppolMessageId]);
    return row ? toInvoice(row) : null;
  }
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    company: row.company,
    name: row.name,
    vatNumber: row.vat_number,
    countryCode: row.country_code,
    street: row.street,
    city: row.city,
    postalCode: row.postal_code,
    peppolId: row.peppol_id,
  };
}

function toTransaction(row: TransactionRow): TransactionRecord {
  return {
    id: row.id,
    name: row.name,
    fromUserId: row.from_user_id,
    toUserId: row.to_user_id,
    value: row.value,
    vat: row.vat,
    vatRecovery: row.vat_recovery,
    currency: row.currency,
    start: row.start_date,
    end: row.end_date,
    intervat: row.intervat === 1,
    annotation: row.annotation,
    proof: row.proof,
  };
}

function toInvoice(row: InvoiceRow): InvoiceRecord {
  return {
    id: row.id,
    externalId: row.external_id,
    peppolMessageId: row.peppol_message_id,
    direction: row.direction,
    supplierId: row.supplier_id,
    buyerId: row.buyer_id,
    issueDate: row.issue_date,
    currency: row.currency,
    totalAmount: row.total_amount,
    vatAmount: row.vat_amount,
    transactionId: row.transaction_id,
  };
}
