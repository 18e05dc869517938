// apps/api/src/common/utils/money.ts
// Prices live in numeric(10,2) columns, which pg hands back as strings.
// All arithmetic happens on integer cents.

/** Largest amount a numeric(10,2) column holds: 99,999,999.99. */
export const MAX_MONEY_CENTS = 9_999_999_999;
export const MAX_MONEY_AMOUNT = MAX_MONEY_CENTS / 100;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

export function toCents(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`Invalid money amount: ${value}`);
    }
    return Math.round(value * 100);
  }

  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid money amount: "${value}"`);
  }
  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? '').padEnd(2, '0'));
  return whole * 100 + fraction;
}

export function formatCents(cents: number): string {
  if (!Number.isSafeInteger(cents) || cents < 0) {
    throw new RangeError(`Invalid cents amount: ${cents}`);
  }
  const whole = Math.floor(cents / 100);
  const fraction = cents % 100;
  return `${whole}.${fraction.toString().padStart(2, '0')}`;
}

/** Normalizes any accepted amount to its two-decimal column form. */
export function normalizeMoney(value: string | number): string {
  return formatCents(toCents(value));
}
