// apps/api/src/webhook/intent-router.service.ts
import { Injectable } from '@nestjs/common';
import { AppLogger } from '../common/app-logger';
import { tagIntent } from '../common/log-context';
import { normalizePhone } from '../common/utils/phone';
import { MenuService } from '../menu/menu.service';
import { MenuItemUnavailableException } from '../orders/menu-item-unavailable.exception';
import { MAX_LINE_QUANTITY } from '../orders/order-assembler';
import { describeOrderStatus } from '../orders/order-status';
import { OrderTooLargeException } from '../orders/order-too-large.exception';
import { OrdersService } from '../orders/orders.service';
import type { OrderLineInput } from '../orders/types';
import { Replies } from './fulfillment';
import {
  IntentParameters,
  readAddress,
  readCustomerName,
  readOrderId,
  readPhone,
  readRequestedItems,
} from './intent-params';
import type { WebhookIntent } from './webhook-payload.schema';

export type IntentKind = 'welcome' | 'placeOrder' | 'trackOrder' | 'fallback';

const INTENT_ALIASES: ReadonlyArray<readonly [IntentKind, readonly string[]]> = [
  ['welcome', ['welcome', 'defaultwelcomeintent']],
  ['placeOrder', ['placeorder', 'orderadd']],
  ['trackOrder', ['trackorder', 'orderstatus']],
];

/** "Place Order", "place.order" and "PlaceOrder" all select the same branch. */
export function classifyIntent(name: string): IntentKind {
  const key = name.toLowerCase().replace(/[^a-z0-9]/g, '');
  const match = INTENT_ALIASES.find(([, aliases]) => aliases.includes(key));
  return match ? match[0] : 'fallback';
}

@Injectable()
export class IntentRouterService {
  private readonly logger = new AppLogger(IntentRouterService.name);

  constructor(
    private readonly menu: MenuService,
    private readonly orders: OrdersService,
  ) {}

  /** Answers one intent with the sentence the assistant should say. */
  async route(intent: WebhookIntent): Promise<string> {
    const kind = classifyIntent(intent.name);
    tagIntent(kind);
    this.logger.log(`intent "${intent.name}" -> ${kind}`);

    switch (kind) {
      case 'welcome':
        return Replies.welcome;
      case 'placeOrder':
        return this.placeOrder(intent.parameters);
      case 'trackOrder':
        return this.trackOrder(intent.parameters);
      case 'fallback':
        return Replies.fallback;
    }
  }

  private async placeOrder(params: IntentParameters): Promise<string> {
    const phone = normalizePhone(readPhone(params));
    if (!phone) return Replies.askPhone;

    const requested = readRequestedItems(params);
    if (requested.length === 0) return Replies.askItems;

    const lines: OrderLineInput[] = [];
    for (const item of requested) {
      const quantity = item.quantity ?? 1;
      if (quantity < 1 || quantity > MAX_LINE_QUANTITY) {
        return Replies.invalidQuantity;
      }

      const menuItem = await this.menu.findAvailableByName(item.name);
      if (!menuItem) return Replies.unresolvedItem(item.name);

      lines.push({ menuItemId: menuItem.id, quantity });
    }

    try {
      const order = await this.orders.placeOrder({
        phone,
        name: readCustomerName(params),
        address: readAddress(params),
        items: lines,
      });
      return Replies.orderPlaced(order.id, order.totalAmount);
    } catch (err: unknown) {
      if (err instanceof MenuItemUnavailableException) {
        this.logger.warn(
          `menu item ${err.menuItemId} went unavailable while ordering`,
        );
        return Replies.itemBecameUnavailable;
      }
      if (err instanceof OrderTooLargeException) {
        return Replies.invalidQuantity;
      }
      throw err;
    }
  }

  private async trackOrder(params: IntentParameters): Promise<string> {
    const orderId = readOrderId(params);
    if (orderId === 0) return Replies.askOrderId;

    const order = await this.orders.findById(orderId);
    if (!order) return Replies.orderNotFound(orderId);

    return Replies.orderStatus(order.id, describeOrderStatus(order.status));
  }
}
