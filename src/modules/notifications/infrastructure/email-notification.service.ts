import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toError } from '../../../common/utils/concurrency';
import { renderEmail } from '../domain/email-templates';
import type {
  NotificationDispatcher,
  NotificationKind,
  NotificationPayloads,
} from '../domain/notification-dispatcher.interface';

const RESEND_API_URL = 'https://api.resend.com/emails';

@Injectable()
export class EmailNotificationService implements NotificationDispatcher {
  private readonly logger = new Logger(EmailNotificationService.name);
  private readonly apiKey?: string;
  private readonly from: string;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('email.resendApiKey');
    this.from =
      this.configService.get<string>('email.fromAddress') || 'Storybook <books@example.com>';
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async send<K extends NotificationKind>(
    to: string,
    kind: K,
    payload: NotificationPayloads[K],
  ): Promise<boolean> {
    if (!this.apiKey) {
      this.logger.debug(`Email not configured; skipping ${kind} to ${to}`);
      return false;
    }

    const { subject, html } = renderEmail(kind, payload);

    try {
      const response = await fetch(RESEND_API_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ from: this.from, to: [to], subject, html }),
      });

      if (!response.ok) {
        this.logger.warn(`Email ${kind} to ${to} rejected with HTTP ${response.status}`);
        return false;
      }

      this.logger.log(`Sent ${kind} email to ${to}`);
      return true;
    } catch (error) {
      this.logger.warn(`Email ${kind} to ${to} failed: ${toError(error).message}`);
      return false;
    }
  }
}
