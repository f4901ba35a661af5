import { Injectable } from '@nestjs/common';
import { PartialUpdateBuilder } from '../../../../../common/database/update-builder';
import { DatabaseService } from '../../../../database/infrastructure/database.service';
import {
  rowToOrder,
  type Order,
  type OrderPatch,
  type OrderRow,
  type OrderStatus,
} from '../../../domain/entities/order.entity';
import type {
  CreateOrderInput,
  IOrdersRepository,
} from '../../../domain/orders.repository.interface';

@Injectable()
export class OrdersRepository implements IOrdersRepository {
  constructor(private readonly db: DatabaseService) {}

  async create(input: CreateOrderInput): Promise<Order> {
    const rows = await this.db.query<OrderRow>(
      `INSERT INTO orders (
         external_order_id, order_number, preview_id, customer_email, customer_name,
         status, retry_count, expires_at
       )
       VALUES ($1, $2, $3, $4, $5, 'paid', 0, $6)
       RETURNING *`,
      [
        input.externalOrderId,
        input.orderNumber,
        input.previewId,
        input.customerEmail,
        input.customerName,
        input.expiresAt,
      ],
    );
    return rowToOrder(rows[0]);
  }

  async findById(orderId: string): Promise<Order | null> {
    const rows = await this.db.query<OrderRow>('SELECT * FROM orders WHERE id = $1 LIMIT 1', [
      orderId,
    ]);
    return rows[0] ? rowToOrder(rows[0]) : null;
  }

  async findByExternalOrderId(externalOrderId: string): Promise<Order | null> {
    const rows = await this.db.query<OrderRow>(
      'SELECT * FROM orders WHERE external_order_id = $1 LIMIT 1',
      [externalOrderId],
    );
    return rows[0] ? rowToOrder(rows[0]) : null;
  }

  async findActiveByPreviewId(previewId: string): Promise<Order | null> {
    const rows = await this.db.query<OrderRow>(
      `SELECT * FROM orders
       WHERE preview_id = $1 AND status <> 'failed'
       ORDER BY created_at DESC
       LIMIT 1`,
      [previewId],
    );
    return rows[0] ? rowToOrder(rows[0]) : null;
  }

  async findLatestByPreviewId(previewId: string): Promise<Order | null> {
    const rows = await this.db.query<OrderRow>(
      'SELECT * FROM orders WHERE preview_id = $1 ORDER BY created_at DESC LIMIT 1',
      [previewId],
    );
    return rows[0] ? rowToOrder(rows[0]) : null;
  }

  async update(orderId: string, patch: OrderPatch): Promise<void> {
    const statement = new PartialUpdateBuilder('orders')
      .set('status', patch.status)
      .set('retry_count', patch.retryCount)
      .set('error_message', patch.errorMessage)
      .set('pdf_url', patch.pdfUrl)
      .set('completed_at', patch.completedAt)
      .build(orderId, { touchUpdatedAt: true });

    if (statement) {
      await this.db.query(statement.text, statement.values);
    }
  }

  async findByStatuses(params: { statuses: OrderStatus[]; createdAfter: Date }): Promise<Order[]> {
    if (params.statuses.length === 0) return [];

    const rows = await this.db.query<OrderRow>(
      `SELECT * FROM orders
       WHERE status = ANY($1::text[]) AND created_at >= $2
       ORDER BY created_at ASC`,
      [params.statuses, params.createdAfter],
    );
    return rows.map(rowToOrder);
  }
}
