import { Controller, Get, Headers, Post } from '@nestjs/common';
import { CreationsService } from '../../application/creations.service';
import type { PreviewOwner } from '../../domain/entities/preview.entity';
import { CUSTOMER_ID_HEADER, SESSION_HEADER, headerValue } from '../http/customer-headers';

const ownerFrom = (sessionId?: string, customerId?: string): PreviewOwner => ({
  sessionId: headerValue(sessionId),
  customerId: headerValue(customerId),
});

@Controller()
export class CreationsController {
  constructor(private readonly creationsService: CreationsService) {}

  @Get('my-creations')
  list(
    @Headers(SESSION_HEADER) sessionId?: string,
    @Headers(CUSTOMER_ID_HEADER) customerId?: string,
  ) {
    return this.creationsService.listCreations(ownerFrom(sessionId, customerId));
  }

  @Get('my-creations/count')
  count(
    @Headers(SESSION_HEADER) sessionId?: string,
    @Headers(CUSTOMER_ID_HEADER) customerId?: string,
  ) {
    return this.creationsService.countCreations(ownerFrom(sessionId, customerId));
  }

  @Post('link-session')
  linkSession(
    @Headers(SESSION_HEADER) sessionId?: string,
    @Headers(CUSTOMER_ID_HEADER) customerId?: string,
  ) {
    return this.creationsService.linkSession(ownerFrom(sessionId, customerId));
  }
}
