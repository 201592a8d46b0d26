import { Body, Controller, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { BookkeepingService } from './bookkeeping.service';
import { CreateTransactionDto } from './dto/create-transaction.dto';
import { CreateUserDto } from './dto/create-user.dto';
import { ListInvoicesQuery } from './dto/list-invoices.query';

/**
 * Controller for the bookkeeping store
 */
@Controller()
export class BookkeepingController {
  constructor(private readonly bookkeepingService: BookkeepingService) {}

  @Post('users')
  async createUser(@Body() dto: CreateUserDto) {
    return this.bookkeepingService.createUser(dto);
  }

  @Get('users')
  async listUsers() {
    return this.bookkeepingService.listUsers();
  }

  @Get('users/:id')
  async getUser(@Param('id', ParseIntPipe) id: number) {
    return this.bookkeepingService.getUser(id);
  }

  @Post('transactions')
  async createTransaction(@Body() dto: CreateTransactionDto) {
    await this.bookkeepingService.getUser(dto.fromUserId);
    await this.bookkeepingService.getUser(dto.toUserId);
    return this.bookkeepingService.createTransactionRecord(dto);
  }

  @Get('transactions')
  async listTransactions() {
    return this.bookkeepingService.listTransactions();
  }

  @Get('invoices')
  async listInvoices(@Query() query: ListInvoicesQuery) {
    return this.bookkeepingService.listInvoices(query.direction);
  }
}
