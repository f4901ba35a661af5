import { parseLiteral } from '../../../../common/utils/types';

export const ORDER_STATUSES = ['paid', 'generating_pdf', 'completed', 'failed', 'refunded'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface Order {
  id: string;
  /** Order id assigned by the store. */
  externalOrderId: string;
  orderNumber: string | null;
  previewId: string;
  customerEmail: string | null;
  customerName: string | null;
  status: OrderStatus;
  retryCount: number;
  errorMessage: string | null;
  pdfUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
  expiresAt: Date;
}

export interface OrderRow {
  id: string;
  external_order_id: string;
  order_number: string | null;
  preview_id: string;
  customer_email: string | null;
  customer_name: string | null;
  status: string;
  retry_count: number;
  error_message: string | null;
  pdf_url: string | null;
  created_at: Date;
  updated_at: Date;
  completed_at: Date | null;
  expires_at: Date;
}

export interface OrderPatch {
  status?: OrderStatus;
  retryCount?: number;
  errorMessage?: string | null;
  pdfUrl?: string | null;
  completedAt?: Date | null;
}

export const isActiveOrderStatus = (status: OrderStatus) => status !== 'failed';

const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  paid: ['generating_pdf', 'completed', 'failed', 'refunded'],
  generating_pdf: ['completed', 'failed', 'refunded'],
  // An operator may re-run a failed completion.
  failed: ['generating_pdf', 'refunded'],
  completed: ['refunded'],
  refunded: [],
};

/** Writing the current status again is always allowed. */
export function canTransitionOrderStatus(from: OrderStatus, to: OrderStatus): boolean {
  return from === to || ORDER_TRANSITIONS[from].includes(to);
}

export function rowToOrder(row: OrderRow): Order {
  return {
    id: row.id,
    externalOrderId: row.external_order_id,
    orderNumber: row.order_number,
    previewId: row.preview_id,
    customerEmail: row.customer_email,
    customerName: row.customer_name,
    status: parseLiteral(ORDER_STATUSES, row.status, 'failed'),
    retryCount: row.retry_count,
    errorMessage: row.error_message,
    pdfUrl: row.pdf_url,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
    expiresAt: row.expires_at,
  };
}
