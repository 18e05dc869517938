// apps/api/src/orders/types.ts

export type OrderLineInput = {
  menuItemId: number;
  quantity: number;
};

export type PlaceOrderInput = {
  phone: string;
  name?: string | null;
  address?: string | null;
  items: OrderLineInput[];
};
