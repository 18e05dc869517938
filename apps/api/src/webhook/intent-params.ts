// apps/api/src/webhook/intent-params.ts
//
// Conversational platforms hand over loosely named parameters. Every field
// has an ordered alias list; the first alias holding a usable value wins.

export type IntentParameters = Record<string, unknown>;

export type RequestedItem = {
  name: string;
  /** `null` when the request names no quantity */
  quantity: number | null;
};

export const PHONE_KEYS = [
  'phone',
  'phone-number',
  'phone_number',
  'phoneNumber',
] as const;
export const ADDRESS_KEYS = [
  'address',
  'delivery_address',
  'street-address',
  'location',
] as const;
export const NAME_KEYS = ['name', 'person', 'given-name'] as const;
export const ITEM_LIST_KEYS = ['items', 'order_items', 'food_items'] as const;
export const ITEM_NAME_KEYS = [
  'food',
  'food_item',
  'item',
  'dish',
  'name',
] as const;
export const QUANTITY_KEYS = ['number', 'quantity', 'qty', 'count'] as const;
export const ORDER_ID_KEYS = [
  'order_id',
  'orderId',
  'order-id',
  'order_number',
  'number',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/** Value of the first alias in `keys` that carries something. */
export function pickParam(
  params: IntentParameters,
  keys: readonly string[],
): unknown {
  for (const key of keys) {
    if (isPresent(params[key])) return params[key];
  }
  return undefined;
}

function asText(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  // entity extractors sometimes wrap values: { name: "Sam" }
  if (isRecord(value)) {
    return asText(value.name ?? value['street-address']);
  }
  if (Array.isArray(value)) {
    return asText(value[0]);
  }
  return null;
}

/** Integer part of a number or numeric string; `null` when not numeric. */
export function asInteger(value: unknown): number | null {
  const raw: unknown = Array.isArray(value) ? value[0] : value;
  const num =
    typeof raw === 'number'
      ? raw
      : typeof raw === 'string' && raw.trim() !== ''
        ? Number(raw.trim())
        : Number.NaN;
  return Number.isFinite(num) ? Math.trunc(num) : null;
}

export function readPhone(params: IntentParameters): string | null {
  return asText(pickParam(params, PHONE_KEYS));
}

export function readAddress(params: IntentParameters): string | null {
  return asText(pickParam(params, ADDRESS_KEYS));
}

export function readCustomerName(params: IntentParameters): string | null {
  return asText(pickParam(params, NAME_KEYS));
}

/** Order id to track; 0 means none was given. */
export function readOrderId(params: IntentParameters): number {
  const id = asInteger(pickParam(params, ORDER_ID_KEYS));
  return id !== null && id > 0 ? id : 0;
}

function readItemObject(entry: unknown): RequestedItem | null {
  if (typeof entry === 'string') {
    const name = asText(entry);
    return name ? { name, quantity: null } : null;
  }
  if (!isRecord(entry)) return null;

  const name = asText(pickParam(entry, ITEM_NAME_KEYS));
  if (!name) return null;
  const rawQuantity = pickParam(entry, QUANTITY_KEYS);
  return {
    name,
    quantity: rawQuantity === undefined ? null : asInteger(rawQuantity),
  };
}

function toList(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Requested items in request order. An explicit item list wins; otherwise
 * parallel `food_item`/`food` and `number`/`quantity` lists are zipped.
 */
export function readRequestedItems(params: IntentParameters): RequestedItem[] {
  const list = pickParam(params, ITEM_LIST_KEYS);
  if (list !== undefined) {
    return toList(list)
      .map(readItemObject)
      .filter((item): item is RequestedItem => item !== null);
  }

  const names = toList(pickParam(params, ['food_item', 'food']));
  const quantities = toList(pickParam(params, ['number', 'quantity']));
  const items: RequestedItem[] = [];
  names.forEach((rawName, index) => {
    const name = asText(rawName);
    if (!name) return;
    const rawQuantity = quantities[index];
    items.push({
      name,
      quantity: rawQuantity === undefined ? null : asInteger(rawQuantity),
    });
  });
  return items;
}
