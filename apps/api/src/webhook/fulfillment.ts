// apps/api/src/webhook/fulfillment.ts

export type FulfillmentResponse = {
  fulfillmentText: string;
  fulfillmentMessages: Array<{ text: { text: string[] } }>;
};

/** Wraps a reply in the fulfillment shape the conversational platform reads. */
export function toFulfillment(message: string): FulfillmentResponse {
  return {
    fulfillmentText: message,
    fulfillmentMessages: [{ text: { text: [message] } }],
  };
}

export const Replies = {
  welcome:
    'Hi! Welcome to our kitchen. You can place an order or track an existing one.',
  fallback:
    "Sorry, I didn't get that. You can say things like \"two margherita pizzas\" or \"track order 12\".",
  askPhone: 'Please share your phone number so we can place your order.',
  askItems: 'What would you like to order?',
  invalidQuantity:
    'Quantities need to be whole numbers from 1 to 999, and one order can total at most 99999999.99.',
  itemBecameUnavailable:
    'Sorry, one of those items just became unavailable. Please try ordering again.',
  askOrderId: 'Please tell me your order number.',
  unresolvedItem: (name: string) =>
    `Sorry, we couldn't find "${name}" on our menu.`,
  orderPlaced: (id: number, total: string) =>
    `Your order #${id} has been placed. Total: ${total}.`,
  orderNotFound: (id: number) => `Sorry, I couldn't find order #${id}.`,
  orderStatus: (id: number, status: string) =>
    `Order #${id} is currently ${status}.`,
} as const;
