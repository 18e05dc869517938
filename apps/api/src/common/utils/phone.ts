// apps/api/src/common/utils/phone.ts
const NON_DIGITS = /\D+/g;

/**
 * Customer identity key: the digits of `raw`, so "+91 99999-99999" and
 * "919999999999" name the same customer. Null when no digit is left.
 */
export function normalizePhone(raw?: string | number | null): string | null {
  if (raw === null || raw === undefined) return null;
  const digits = String(raw).replace(NON_DIGITS, '');
  return digits.length > 0 ? digits : null;
}
