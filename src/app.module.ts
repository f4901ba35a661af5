import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CleanupModule } from './modules/cleanup/cleanup.module';
import { ConfigModule } from './modules/config/config.module';
import { DatabaseModule } from './modules/database/database.module';
import { HealthModule } from './modules/health/health.module';
import { OrdersModule } from './modules/orders/orders.module';
import { PreviewsModule } from './modules/previews/previews.module';
import { QueueModule } from './modules/queue/queue.module';
import { RateLimiterModule } from './modules/rate-limiter/rate-limiter.module';
import { StoriesModule } from './modules/stories/stories.module';
import { UploadsModule } from './modules/uploads/uploads.module';
import { WebhooksModule } from './modules/webhooks/webhooks.module';

@Module({
  imports: [
    ConfigModule,
    ScheduleModule.forRoot(),
    DatabaseModule,
    QueueModule,
    RateLimiterModule,
    StoriesModule,
    UploadsModule,
    PreviewsModule,
    OrdersModule,
    WebhooksModule,
    CleanupModule,
    HealthModule,
  ],
})
export class AppModule {}
