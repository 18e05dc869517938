// apps/api/src/orders/order-assembler.ts
import { BadRequestException, Injectable } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { formatCents, MAX_MONEY_CENTS, toCents } from '../common/utils/money';
import {
  Customer,
  MenuItem,
  Order,
  OrderItem,
} from '../database/entities';
import { MenuItemUnavailableException } from './menu-item-unavailable.exception';
import { OrderStatus } from './order-status';
import { OrderTooLargeException } from './order-too-large.exception';
import type { OrderLineInput } from './types';

export const MAX_LINE_QUANTITY = 999;

function assertLines(lines: readonly OrderLineInput[]): void {
  if (lines.length === 0) {
    throw new BadRequestException({
      code: 'ORDER_EMPTY',
      message: 'An order needs at least one item',
    });
  }
  for (const line of lines) {
    if (
      !Number.isInteger(line.quantity) ||
      line.quantity < 1 ||
      line.quantity > MAX_LINE_QUANTITY
    ) {
      throw new BadRequestException({
        code: 'INVALID_QUANTITY',
        message: `Quantity for menu item ${line.menuItemId} must be a whole number from 1 to ${MAX_LINE_QUANTITY}`,
        menuItemId: line.menuItemId,
      });
    }
  }
}

/**
 * Turns a customer and a list of requested lines into a persisted order.
 *
 * Unit prices are copied from the menu at this moment and the total is the
 * exact cent sum of `unitPrice * quantity`; neither is touched again.
 * Must run inside the caller's transaction: a failing line throws and the
 * caller's rollback discards the order row already inserted.
 */
@Injectable()
export class OrderAssembler {
  async assemble(
    tx: EntityManager,
    customer: Customer,
    lines: readonly OrderLineInput[],
  ): Promise<Order> {
    assertLines(lines);

    const orders = tx.getRepository(Order);
    const menuItems = tx.getRepository(MenuItem);
    const orderItems = tx.getRepository(OrderItem);

    const order = await orders.save(
      orders.create({
        customerId: customer.id,
        status: OrderStatus.PLACED,
        totalAmount: formatCents(0),
      }),
    );

    const items: OrderItem[] = [];
    let totalCents = 0;

    for (const line of lines) {
      const menuItem = await menuItems.findOneBy({ id: line.menuItemId });
      if (!menuItem || !menuItem.isAvailable) {
        throw new MenuItemUnavailableException(line.menuItemId);
      }

      items.push(
        orderItems.create({
          orderId: order.id,
          menuItemId: menuItem.id,
          quantity: line.quantity,
          unitPrice: menuItem.price,
        }),
      );
      totalCents += toCents(menuItem.price) * line.quantity;
      if (totalCents > MAX_MONEY_CENTS) throw new OrderTooLargeException();
    }

    order.items = items;
    order.totalAmount = formatCents(totalCents);
    return orders.save(order);
  }
}
