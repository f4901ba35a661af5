import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  Logger,
  Post,
  Req,
  UnauthorizedException,
  type RawBodyRequest,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { ShopifyWebhookVerifier } from '../../application/shopify-webhook-verifier.service';
import { SkipRateLimit } from '../../../rate-limiter/interfaces/rate-limit.decorator';
import { WebhooksService, type WebhookAck } from '../../application/webhooks.service';

@SkipRateLimit()
@Controller('webhooks/shopify')
export class WebhooksController {
  private readonly logger = new Logger(WebhooksController.name);

  constructor(
    private readonly verifier: ShopifyWebhookVerifier,
    private readonly webhooksService: WebhooksService,
  ) {}

  @Post('order-paid')
  @HttpCode(200)
  async orderPaid(
    @Req() req: RawBodyRequest<FastifyRequest>,
    @Body() body: unknown,
    @Headers('x-shopify-hmac-sha256') signature?: string,
    @Headers('x-shopify-shop-domain') shopDomain?: string,
  ): Promise<WebhookAck> {
    this.authenticate(req, signature, shopDomain);
    return this.webhooksService.handleOrderPaid(body);
  }

  @Post('order-cancelled')
  @HttpCode(200)
  async orderCancelled(
    @Req() req: RawBodyRequest<FastifyRequest>,
    @Body() body: unknown,
    @Headers('x-shopify-hmac-sha256') signature?: string,
    @Headers('x-shopify-shop-domain') shopDomain?: string,
  ): Promise<WebhookAck> {
    this.authenticate(req, signature, shopDomain);
    return this.webhooksService.handleOrderCancelled(body);
  }

  private authenticate(
    req: RawBodyRequest<FastifyRequest>,
    signature: string | undefined,
    shopDomain: string | undefined,
  ) {
    if (!req.rawBody) {
      throw new BadRequestException('Missing request body');
    }

    const result = this.verifier.verify(req.rawBody, signature, shopDomain);
    if (!result.ok) {
      this.logger.warn(`Rejected webhook from ${shopDomain ?? 'unknown shop'}: ${result.reason}`);
      throw new UnauthorizedException('Invalid webhook signature');
    }
  }
}
