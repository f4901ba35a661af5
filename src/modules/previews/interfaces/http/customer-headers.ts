export const SESSION_HEADER = 'x-session-id';
export const CUSTOMER_ID_HEADER = 'x-shopify-customer-id';
export const CUSTOMER_EMAIL_HEADER = 'x-shopify-customer-email';

const BLANK_VALUES = new Set(['', 'null', 'undefined']);

/** Storefront scripts send "null" or "undefined" for a logged-out visitor. */
export function headerValue(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed && !BLANK_VALUES.has(trimmed) ? trimmed : null;
}
