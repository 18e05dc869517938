// apps/api/src/orders/dto/order.dto.ts
import type { Order, OrderItem } from '../../database/entities';
import type { OrderStatus } from '../order-status';

export type OrderItemDto = {
  id: number;
  menuItemId: number;
  quantity: number;
  unitPrice: string;
};

export type OrderDto = {
  id: number;
  customerId: number;
  status: OrderStatus;
  totalAmount: string;
  createdAt: Date;
  updatedAt: Date;
  items: OrderItemDto[];
};

export function toOrderItemDto(item: OrderItem): OrderItemDto {
  return {
    id: item.id,
    menuItemId: item.menuItemId,
    quantity: item.quantity,
    unitPrice: item.unitPrice,
  };
}

export function toOrderDto(order: Order): OrderDto {
  return {
    id: order.id,
    customerId: order.customerId,
    status: order.status,
    totalAmount: order.totalAmount,
    createdAt: order.createdAt,
    updatedAt: order.updatedAt,
    items: [...(order.items ?? [])]
      .sort((a, b) => a.id - b.id)
      .map(toOrderItemDto),
  };
}
