#!/usr/bin/env node

/**
 * Send a test invoice through the Peppol access point
 *
 * Builds a one-line invoice from the sender identity in the environment,
 * serializes it to UBL and posts it to PEPPOL_ENDPOINT.
 *
 * Usage:
 *   tsx scripts/send-test-invoice.ts --to 0208:BE0987654321 [--name "Customer NV"] [--amount 100] [--dry-run]
 *
 * Exit codes:
 *   0 = Invoice accepted (or printed with --dry-run)
 *   1 = Access point refused the invoice
 *   2 = Error (configuration, validation, network)
 */

import 'dotenv/config';
import { EInvoiceError } from '../packages/einvoice/src/peppol/errors';
import { buildInvoice } from '../packages/einvoice/src/peppol/invoice-builder';
import { UblGenerator } from '../packages/einvoice/src/peppol/ubl-generator';
import { PeppyrusClient } from '../packages/einvoice/src/peppyrus/peppyrus-client';

interface CLIArgs {
  to: string;
  name: string;
  amount: number;
  dryRun: boolean;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const options = new Map<string, string>();
  let dryRun = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--dry-run') {
      dryRun = true;
    } else if (args[i].startsWith('--') && i + 1 < args.length) {
      options.set(args[i].slice(2), args[i + 1]);
      i++;
    }
  }

  const to = options.get('to');
  const amount = Number(options.get('amount') ?? '100');
  if (!to || !Number.isFinite(amount)) {
    console.error('Usage: send-test-invoice.ts --to <scheme:id> [--name <company>] [--amount <net>] [--dry-run]');
    process.exit(2);
  }

  return { to, name: options.get('name') ?? 'Test Customer', amount, dryRun };
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    console.error(`${name} is not set`);
    process.exit(2);
  }
  return value;
}

async function main(): Promise<number> {
  const args = parseArgs();

  const invoice = buildInvoice({
    id: `TEST-${Date.now()}`,
    issueDate: new Date(),
    supplier: {
      peppolId: requireEnv('PEPPOL_SENDER_ID'),
      name: process.env.SENDER_COMPANY ?? 'Example Supplier',
      vatNumber: process.env.SENDER_VAT?.replace(/[\s.]/g, ''),
      address: {
        street: process.env.SENDER_STREET,
        city: process.env.SENDER_CITY,
        postalCode: process.env.SENDER_POSTAL,
        countryCode: process.env.SENDER_COUNTRY_CODE ?? 'BE',
      },
    },
    buyer: {
      peppolId: args.to,
      name: args.name,
      address: { countryCode: args.to.split(':')[1]?.slice(0, 2) || 'BE' },
    },
    items: [{ name: 'Peppol connectivity test', quantity: 1, unitPrice: args.amount, vatPct: 0.21 }],
  });

  const xml = new UblGenerator().generate(invoice);
  console.log(`Invoice ${invoice.id}: net ${invoice.totals.taxExclusiveAmount}, VAT ${invoice.totals.taxAmount}, payable ${invoice.totals.payableAmount} ${invoice.currency}`);

  if (args.dryRun) {
    console.log(xml);
    return 0;
  }

  const client = new PeppyrusClient({
    endpoint: requireEnv('PEPPOL_ENDPOINT'),
    apiKey: requireEnv('PEPPOL_API_KEY'),
  });
  const result = await client.sendInvoice(xml);

  console.log(`Access point answered ${result.status}`);
  console.log(result.body);
  return result.status >= 200 && result.status < 300 ? 0 : 1;
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    if (error instanceof EInvoiceError) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      console.error(error);
    }
    process.exit(2);
  });
