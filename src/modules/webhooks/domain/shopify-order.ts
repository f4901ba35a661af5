import { isRecord, readString } from '../../../common/utils/types';

const PREVIEW_ID_PROPERTY = 'preview_id';

export interface PaidOrderPayload {
  externalOrderId: string;
  orderNumber: string | null;
  customerEmail: string;
  customerName: string | null;
  previewId: string;
}

export type ParsedPaidOrder =
  | { ok: true; order: PaidOrderPayload }
  | { ok: false; reason: 'malformed' | 'missing_email' | 'missing_preview_id'; externalOrderId?: string };

/** Store ids arrive as JSON numbers; keep them as strings. */
export function readOrderId(body: unknown): string | null {
  if (!isRecord(body)) return null;
  const id = body.id;
  if (typeof id === 'number' && Number.isFinite(id)) return String(id);
  return typeof id === 'string' && id.length > 0 ? id : null;
}

function readOrderNumber(body: Record<string, unknown>): string | null {
  const value = body.order_number ?? body.name;
  if (typeof value === 'number') return String(value);
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/** The first `preview_id` line item property. */
export function findPreviewId(body: Record<string, unknown>): string | null {
  const lineItems = Array.isArray(body.line_items) ? body.line_items : [];

  for (const item of lineItems) {
    if (!isRecord(item) || !Array.isArray(item.properties)) continue;
    for (const property of item.properties) {
      if (isRecord(property) && property.name === PREVIEW_ID_PROPERTY) {
        const value = readString(property, 'value');
        if (value) return value.trim();
      }
    }
  }
  return null;
}

export function parsePaidOrder(body: unknown): ParsedPaidOrder {
  const externalOrderId = readOrderId(body);
  if (!isRecord(body) || !externalOrderId) {
    return { ok: false, reason: 'malformed' };
  }

  const customer = isRecord(body.customer) ? body.customer : {};
  const customerEmail = readString(customer, 'email') ?? readString(body, 'email');
  if (!customerEmail) {
    return { ok: false, reason: 'missing_email', externalOrderId };
  }

  const previewId = findPreviewId(body);
  if (!previewId) {
    return { ok: false, reason: 'missing_preview_id', externalOrderId };
  }

  const names = [readString(customer, 'first_name'), readString(customer, 'last_name')].filter(
    (part): part is string => part !== null,
  );

  return {
    ok: true,
    order: {
      externalOrderId,
      orderNumber: readOrderNumber(body),
      customerEmail,
      customerName: names.length > 0 ? names.join(' ') : null,
      previewId,
    },
  };
}
