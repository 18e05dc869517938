// apps/api/src/customers/customers.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { CustomersService } from './customers.service';
import { CreateCustomerDto } from './dto/create-customer.dto';

@Controller('customers')
export class CustomersController {
  constructor(private readonly customersService: CustomersService) {}

  /** POST /api/v1/customers */
  @Post()
  @HttpCode(201)
  create(@Body() dto: CreateCustomerDto) {
    return this.customersService.create(dto);
  }

  /** GET /api/v1/customers (newest first) */
  @Get()
  list() {
    return this.customersService.list();
  }

  /** GET /api/v1/customers/:id */
  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.customersService.getById(id);
  }
}
