import { Module } from '@nestjs/common';
import { NOTIFICATION_DISPATCHER } from './domain/notification-dispatcher.interface';
import { EmailNotificationService } from './infrastructure/email-notification.service';

@Module({
  providers: [
    EmailNotificationService,
    { provide: NOTIFICATION_DISPATCHER, useExisting: EmailNotificationService },
  ],
  exports: [NOTIFICATION_DISPATCHER],
})
export class NotificationsModule {}
