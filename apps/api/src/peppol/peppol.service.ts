import { BadGatewayException, BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { UserRecord } from '@peppol-books/shared/types/bookkeeping.types';
import { PaymentMeans, PeppolInvoice, PeppolParty, ParsedInvoice } from '@peppol-books/shared/types/peppol.types';
import {
  ImportResult,
  PeppyrusMessageDetail,
  PeppyrusMessageSummary,
} from '@peppol-books/shared/types/peppyrus.types';
import { EInvoiceError } from '@peppol-books/einvoice/peppol/errors';
import { buildInvoice } from '@peppol-books/einvoice/peppol/invoice-builder';
import { UblGenerator } from '@peppol-books/einvoice/peppol/ubl-generator';
import { UblParser } from '@peppol-books/einvoice/peppol/ubl-parser';
import { UblValidationReport, UblValidator } from '@peppol-books/einvoice/peppol/ubl-validator';
import { PEPPOL_TRANSPORT, PeppolTransport, PeppyrusClient } from '@peppol-books/einvoice/peppyrus/peppyrus-client';
import { BookkeepingService } from '../bookkeeping/bookkeeping.service';
import { DatabaseService } from '../database/database.service';
import { SendInvoiceDto } from './dto/send-invoice.dto';

export interface GeneratedInvoice {
  invoice: PeppolInvoice;
  xml: string;
}

export interface SentInvoice {
  status: number;
  messageId: string | null;
  invoiceId: string;
  transactionId: number;
  invoiceDbId: number;
  totals: PeppolInvoice['totals'];
}

/**
 * Sends invoices through the access point and imports received ones into the books
 */
@Injectable()
export class PeppolService {
  private readonly logger = new Logger(PeppolService.name);
  private readonly generator = new UblGenerator();
  private readonly parser = new UblParser();
  private readonly validator = new UblValidator();

  constructor(
    private readonly bookkeeping: BookkeepingService,
    private readonly db: DatabaseService,
    private readonly config: ConfigService,
    @Inject(PEPPOL_TRANSPORT) private readonly transport: PeppolTransport,
  ) {}

  /**
   * Build and serialize an invoice between two bookkeeping users
   */
  async generateInvoiceXml(dto: SendInvoiceDto): Promise<GeneratedInvoice> {
    const buyer = toParty(await this.bookkeeping.getUser(dto.buyerId), 'buyer');
    const supplier = dto.supplierId !== undefined
      ? toParty(await this.bookkeeping.getUser(dto.supplierId), 'supplier')
      : this.senderParty();

    const invoice = buildInvoice({
      id: dto.invoiceId,
      issueDate: dto.issueDate ?? new Date(),
      dueDate: dto.dueDate,
      currency: dto.currency,
      buyerReference: dto.buyerReference,
      supplier,
      buyer,
      items: dto.items,
      paymentMeans: paymentMeansOf(dto),
      vatExemptionReasons: dto.vatExemptionReasons,
    });

    return { invoice, xml: this.generator.generate(invoice) };
  }

  async sendInvoice(dto: SendInvoiceDto): Promise<SentInvoice> {
    const { invoice, xml } = await this.generateInvoiceXml(dto);

    const result = await this.transport.sendInvoice(xml);
    if (result.status < 200 || result.status >= 300) {
      this.logger.error(`Access point rejected invoice ${invoice.id}: ${result.status} ${result.body}`);
      throw new BadGatewayException({
        message: `Access point rejected invoice ${invoice.id}`,
        status: result.status,
        body: result.body,
      });
    }

    const messageId = extractMessageId(result.body);
    const supplierId = dto.supplierId ?? (await this.senderUser()).id;

    const stored = await this.db.executeTransaction(async () => {
      const transaction = await this.bookkeeping.createTransactionRecord({
        name: `Invoice ${invoice.id}`,
        fromUserId: supplierId,
        toUserId: dto.buyerId,
        value: invoice.totals.taxExclusiveAmount,
        vat: invoice.totals.taxAmount,
        vatRecovery: 1,
        currency: invoice.currency,
        start: invoice.issueDate,
        annotation: messageId ? `Sent via Peppol message ${messageId}` : 'Sent via Peppol',
      });

      const record = await this.bookkeeping.createInvoiceRecord({
        externalId: invoice.id,
        peppolMessageId: messageId,
        direction: 'outgoing',
        supplierId,
        buyerId: dto.buyerId,
        issueDate: invoice.issueDate,
        currency: invoice.currency,
        totalAmount: invoice.totals.payableAmount,
        vatAmount: invoice.totals.taxAmount,
        transactionId: transaction.id,
      });

      return { transaction, record };
    });

    this.logger.log(`Sent invoice ${invoice.id} (message ${messageId ?? 'unknown'})`);

    return {
      status: result.status,
      messageId,
      invoiceId: invoice.id,
      transactionId: stored.transaction.id,
      invoiceDbId: stored.record.id,
      totals: invoice.totals,
    };
  }

  /**
   * Import every message waiting in the inbox, one after another
   */
  async receiveInvoices(): Promise<ImportResult[]> {
    const messages = await this.transport.listMessages('INBOX');
    const results: ImportResult[] = [];

    for (const message of messages) {
      const detail = await this.transport.getMessage(message.id);
      if (!detail) {
        continue;
      }
      results.push(await this.processIncomingInvoice(message, detail));
    }

    this.logger.log(`Processed ${results.length} of ${messages.length} inbox messages`);
    return results;
  }

  async processIncomingInvoice(meta: PeppyrusMessageSummary, detail: PeppyrusMessageDetail): Promise<ImportResult> {
    const document = PeppyrusClient.decodeDocument(detail);
    if (!document) {
      return { messageId: meta.id, status: 'error', error: 'No document found' };
    }

    if (await this.bookkeeping.findInvoiceByMessageId(meta.id)) {
      return { messageId: meta.id, status: 'duplicate' };
    }

    let parsed: ParsedInvoice;
    try {
      parsed = this.parser.parse(document);
    } catch (error) {
      if (error instanceof EInvoiceError) {
        this.logger.warn(`Message ${meta.id} not imported: ${error.message}`);
        return { messageId: meta.id, status: 'error', errorCode: error.code, error: error.message };
      }
      throw error;
    }

    const { invoice } = parsed;
    // Checked again inside the transaction: a concurrent import may have stored it meanwhile
    const stored = await this.db.executeTransaction(async () => {
      if (await this.bookkeeping.findInvoiceByMessageId(meta.id)) {
        return null;
      }

      const supplier = await this.bookkeeping.findOrCreateUserByCompany(invoice.supplier.name, userDetails(invoice.supplier));
      const buyer = await this.bookkeeping.findOrCreateUserByCompany(invoice.buyer.name, userDetails(invoice.buyer));

      const transaction = await this.bookkeeping.createTransactionRecord({
        name: `Invoice ${invoice.id}`,
        fromUserId: supplier.id,
        toUserId: buyer.id,
        value: invoice.totals.taxExclusiveAmount,
        vat: invoice.totals.taxAmount,
        vatRecovery: 1,
        currency: invoice.currency,
        start: invoice.issueDate,
        annotation: `Imported from Peppol message ${meta.id}`,
      });

      const record = await this.bookkeeping.createInvoiceRecord({
        externalId: invoice.id,
        peppolMessageId: meta.id,
        direction: 'incoming',
        supplierId: supplier.id,
        buyerId: buyer.id,
        issueDate: invoice.issueDate,
        currency: invoice.currency,
        totalAmount: invoice.totals.payableAmount,
        vatAmount: invoice.totals.taxAmount,
        transactionId: transaction.id,
      });

      return { transaction, record };
    });

    if (!stored) {
      return { messageId: meta.id, status: 'duplicate' };
    }

    this.logger.log(`Imported invoice ${invoice.id} from message ${meta.id}`);

    return {
      messageId: meta.id,
      status: 'imported',
      invoiceId: invoice.id,
      supplier: invoice.supplier.name,
      buyer: invoice.buyer.name,
      date: invoice.issueDate,
      total: invoice.totals.payableAmount,
      vat: invoice.totals.taxAmount,
      transactionId: stored.transaction.id,
      invoiceDbId: stored.record.id,
    };
  }

  validateDocument(base64: string): UblValidationReport {
    return this.validator.validate(Buffer.from(base64, 'base64'));
  }

  // Sender identity from configuration

  private senderParty(): PeppolParty {
    const peppolId = this.config.get<string>('PEPPOL_SENDER_ID', '');
    if (!peppolId) {
      throw new BadRequestException('PEPPOL_SENDER_ID is not configured');
    }

    return {
      peppolId,
      name: this.config.get<string>('SENDER_COMPANY', 'Example Supplier'),
      vatNumber: this.config.get<string>('SENDER_VAT', ''),
      address: {
        street: this.config.get<string>('SENDER_STREET', ''),
        city: this.config.get<string>('SENDER_CITY', ''),
        postalCode: this.config.get<string>('SENDER_POSTAL', ''),
        countryCode: this.config.get<string>('SENDER_COUNTRY_CODE', 'BE'),
      },
    };
  }

  private senderUser(): Promise<UserRecord> {
    const sender = this.senderParty();
    return this.bookkeeping.findOrCreateUserByCompany(sender.name, userDetails(sender));
  }
}

function toParty(user: UserRecord, role: 'supplier' | 'buyer'): PeppolParty {
  if (!user.peppolId) {
    throw new BadRequestException(`The ${role} ${user.company} has no Peppol identifier`);
  }

  const party: PeppolParty = {
    peppolId: user.peppolId,
    name: user.company,
    address: { countryCode: user.countryCode },
  };
  if (user.vatNumber) party.vatNumber = user.vatNumber;
  if (user.street) party.address.street = user.street;
  if (user.city) party.address.city = user.city;
  if (user.postalCode) party.address.postalCode = user.postalCode;

  return party;
}

function userDetails(party: PeppolParty) {
  return {
    vatNumber: party.vatNumber,
    countryCode: party.address.countryCode,
    street: party.address.street,
    city: party.address.city,
    postalCode: party.address.postalCode,
    peppolId: party.peppolId,
  };
}

// Credit transfer (UNCL4461 code 30) when an account is given
function paymentMeansOf(dto: SendInvoiceDto): PaymentMeans | undefined {
  if (!dto.iban) {
    return undefined;
  }

  const paymentMeans: PaymentMeans = { code: '30', payeeAccount: { iban: dto.iban } };
  if (dto.paymentReference) {
    paymentMeans.paymentId = dto.paymentReference;
  }
  return paymentMeans;
}

/**
 * The access point answers with a JSON message; its id is kept when present
 */
function extractMessageId(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  if (typeof parsed === 'object' && parsed !== null && 'id' in parsed && typeof parsed.id === 'string') {
    return parsed.id;
  }
  return null;
}
