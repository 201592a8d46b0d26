#!/usr/bin/env node

/**
 * List the access point inbox and check every received invoice
 *
 * Each document is decoded, parsed and its totals recomputed. Nothing is
 * written to the bookkeeping store; use POST /api/peppol/inbox/import for that.
 *
 * Usage:
 *   tsx scripts/receive-invoices.ts [--folder INBOX]
 */

import 'dotenv/config';
import { PeppyrusFolder } from '../packages/shared/src/types/peppyrus.types';
import { UblValidator } from '../packages/einvoice/src/peppol/ubl-validator';
import { UblParser } from '../packages/einvoice/src/peppol/ubl-parser';
import { PeppyrusClient } from '../packages/einvoice/src/peppyrus/peppyrus-client';

const FOLDERS: readonly PeppyrusFolder[] = ['INBOX', 'OUTBOX', 'SENT', 'FAILED'];

function parseFolder(): PeppyrusFolder {
  const args = process.argv.slice(2);
  const index = args.indexOf('--folder');
  if (index === -1) {
    return 'INBOX';
  }

  const folder = FOLDERS.find(candidate => candidate === args[index + 1]);
  if (!folder) {
    console.error(`Usage: receive-invoices.ts [--folder ${FOLDERS.join('|')}]`);
    process.exit(2);
  }
  return folder;
}

async function main(): Promise<void> {
  const endpoint = process.env.PEPPOL_ENDPOINT;
  const apiKey = process.env.PEPPOL_API_KEY;
  if (!endpoint || !apiKey) {
    console.error('PEPPOL_ENDPOINT and PEPPOL_API_KEY must be set');
    process.exit(2);
  }

  const client = new PeppyrusClient({ endpoint, apiKey });
  const parser = new UblParser();
  const validator = new UblValidator();

  const messages = await client.listMessages(parseFolder());
  console.log(`${messages.length} message(s)`);

  for (const message of messages) {
    const detail = await client.getMessage(message.id);
    const document = detail ? PeppyrusClient.decodeDocument(detail) : null;
    if (!document) {
      console.log(`- ${message.id}: no document`);
      continue;
    }

    const report = validator.validate(document);
    if (!report.valid) {
      console.log(`- ${message.id}: invalid (${report.errors.join('; ')})`);
      continue;
    }

    const { invoice } = parser.parse(document);
    console.log(
      `- ${message.id}: ${invoice.id} from ${invoice.supplier.name} dated ${invoice.issueDate}, ` +
        `${invoice.totals.payableAmount} ${invoice.currency} (VAT ${invoice.totals.taxAmount})`,
    );
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
