import type { Order, OrderPatch, OrderStatus } from './entities/order.entity';

export interface CreateOrderInput {
  externalOrderId: string;
  orderNumber: string | null;
  previewId: string;
  customerEmail: string | null;
  customerName: string | null;
  expiresAt: Date;
}

export interface IOrdersRepository {
  /** Rejects with a unique violation when the external id or an active preview order exists. */
  create(input: CreateOrderInput): Promise<Order>;
  findById(orderId: string): Promise<Order | null>;
  findByExternalOrderId(externalOrderId: string): Promise<Order | null>;
  /** The order for this preview that has not failed, if any. */
  findActiveByPreviewId(previewId: string): Promise<Order | null>;
  findLatestByPreviewId(previewId: string): Promise<Order | null>;
  update(orderId: string, patch: OrderPatch): Promise<void>;
  findByStatuses(params: { statuses: OrderStatus[]; createdAfter: Date }): Promise<Order[]>;
}

export const IOrdersRepositoryToken = Symbol('IOrdersRepository');
