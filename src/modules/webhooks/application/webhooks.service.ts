import { Injectable, Logger } from '@nestjs/common';
import { OrdersService, type RegisterOrderResult } from '../../orders/application/orders.service';
import { parsePaidOrder, readOrderId } from '../domain/shopify-order';

export interface WebhookAck {
  success: true;
  message: string;
}

const REJECTION_MESSAGES: Record<Extract<RegisterOrderResult, { outcome: 'rejected' }>['reason'], string> = {
  preview_not_found: 'Preview not found',
  preview_not_ready: 'Preview is not ready for purchase',
  preview_expired: 'Preview has expired',
};

/**
 * Authentic webhooks are always acknowledged so the store does not keep
 * redelivering payloads that can never be processed.
 */
@Injectable()
export class WebhooksService {
  private readonly logger = new Logger(WebhooksService.name);

  constructor(private readonly ordersService: OrdersService) {}

  async handleOrderPaid(body: unknown): Promise<WebhookAck> {
    const parsed = parsePaidOrder(body);
    if (!parsed.ok) {
      this.logger.error(
        `Order paid webhook ignored (${parsed.reason})${parsed.externalOrderId ? ` for order ${parsed.externalOrderId}` : ''}`,
      );
      return { success: true, message: `Webhook received but ignored: ${parsed.reason}` };
    }

    const result = await this.ordersService.registerPaidOrder(parsed.order);
    switch (result.outcome) {
      case 'created':
        return { success: true, message: 'Webhook received and processed' };
      case 'duplicate':
        return { success: true, message: 'Order already processed' };
      case 'rejected':
        return { success: true, message: REJECTION_MESSAGES[result.reason] };
    }
  }

  async handleOrderCancelled(body: unknown): Promise<WebhookAck> {
    const externalOrderId = readOrderId(body);
    if (!externalOrderId) {
      this.logger.error('Order cancelled webhook without an order id');
      return { success: true, message: 'Webhook received but ignored: malformed' };
    }

    const refunded = await this.ordersService.markRefunded(externalOrderId);
    return {
      success: true,
      message: refunded ? 'Order cancellation processed' : 'Order not found',
    };
  }
}
