import { Body, Controller, Header, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { SendInvoiceDto } from './dto/send-invoice.dto';
import { ValidateDocumentDto } from './dto/validate-document.dto';
import { PeppolService } from './peppol.service';

/**
 * Controller for Peppol send, receive and validation
 */
@Controller('peppol')
export class PeppolController {
  constructor(private readonly peppolService: PeppolService) {}

  /**
   * UBL preview of an invoice, nothing is sent or stored
   */
  @Post('invoices/xml')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'application/xml')
  async generateXml(@Body() dto: SendInvoiceDto) {
    const { xml } = await this.peppolService.generateInvoiceXml(dto);
    return xml;
  }

  @Post('invoices/send')
  async send(@Body() dto: SendInvoiceDto) {
    return this.peppolService.sendInvoice(dto);
  }

  @Post('inbox/import')
  @HttpCode(HttpStatus.OK)
  async importInbox() {
    return this.peppolService.receiveInvoices();
  }

  @Post('documents/validate')
  @HttpCode(HttpStatus.OK)
  validate(@Body() dto: ValidateDocumentDto) {
    return this.peppolService.validateDocument(dto.document);
  }
}
