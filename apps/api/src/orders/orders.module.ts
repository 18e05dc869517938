import { Module } from '@nestjs/common';
import { CustomersModule } from '../customers/customers.module';
import { OrdersController } from './orders.controller';
import { OrdersService } from './orders.service';
import { OrderAssembler } from './order-assembler';

@Module({
  imports: [CustomersModule],
  controllers: [OrdersController],
  providers: [OrdersService, OrderAssembler],
  exports: [OrdersService],
})
export class OrdersModule {}
