import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, timingSafeEqual } from 'crypto';

export type VerificationResult =
  | { ok: true }
  | { ok: false; reason: 'missing_signature' | 'invalid_signature' | 'wrong_shop' | 'not_configured' };

@Injectable()
export class ShopifyWebhookVerifier {
  private readonly logger = new Logger(ShopifyWebhookVerifier.name);
  private readonly secret: string | undefined;
  private readonly shopDomain: string | undefined;
  private readonly isProduction: boolean;

  constructor(private readonly configService: ConfigService) {
    this.secret = this.configService.get<string>('shopify.webhookSecret');
    this.shopDomain = this.configService.get<string>('shopify.shopDomain');
    this.isProduction = this.configService.get<string>('NODE_ENV') === 'production';
  }

  /**
   * Checks the base64 HMAC-SHA256 of the exact request bytes and, when a shop
   * is configured, the sending shop's domain.
   */
  verify(rawBody: Buffer, signature: string | undefined, shopDomain: string | undefined): VerificationResult {
    if (!this.secret) {
      if (this.isProduction) {
        this.logger.error('Webhook secret not configured; rejecting webhook');
        return { ok: false, reason: 'not_configured' };
      }
      this.logger.warn('Webhook secret not configured, skipping signature verification');
      return { ok: true };
    }

    if (!signature) {
      return { ok: false, reason: 'missing_signature' };
    }

    const expected = createHmac('sha256', this.secret).update(rawBody).digest();
    const received = Buffer.from(signature, 'base64');
    if (received.length !== expected.length || !timingSafeEqual(received, expected)) {
      return { ok: false, reason: 'invalid_signature' };
    }

    if (this.shopDomain && shopDomain !== this.shopDomain) {
      return { ok: false, reason: 'wrong_shop' };
    }

    return { ok: true };
  }
}
