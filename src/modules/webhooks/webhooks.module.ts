import { Module } from '@nestjs/common';
import { OrdersModule } from '../orders/orders.module';
import { ShopifyWebhookVerifier } from './application/shopify-webhook-verifier.service';
import { WebhooksService } from './application/webhooks.service';
import { WebhooksController } from './interfaces/controllers/webhooks.controller';

@Module({
  imports: [OrdersModule],
  controllers: [WebhooksController],
  providers: [ShopifyWebhookVerifier, WebhooksService],
})
export class WebhooksModule {}
