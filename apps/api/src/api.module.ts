// apps/api/src/api.module.ts
import { Module } from '@nestjs/common';
import { CustomersModule } from './customers/customers.module';
import { MenuModule } from './menu/menu.module';
import { OrdersModule } from './orders/orders.module';
import { WebhookModule } from './webhook/webhook.module';

/**
 * Feature modules. They only depend on the global DatabaseService, so tests
 * can mount this module next to an in-memory database.
 */
@Module({
  imports: [MenuModule, CustomersModule, OrdersModule, WebhookModule],
})
export class ApiModule {}
