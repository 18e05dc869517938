import { Module } from '@nestjs/common';
import { MenuModule } from '../menu/menu.module';
import { OrdersModule } from '../orders/orders.module';
import { IntentRouterService } from './intent-router.service';
import { WebhookController } from './webhook.controller';

@Module({
  imports: [MenuModule, OrdersModule],
  controllers: [WebhookController],
  providers: [IntentRouterService],
})
export class WebhookModule {}
