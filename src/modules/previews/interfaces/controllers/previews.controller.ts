import { Body, Controller, Get, Headers, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { RateLimit } from '../../../rate-limiter/interfaces/rate-limit.decorator';
import { PreviewsService } from '../../application/previews.service';
import { CreatePreviewDto } from '../dto/create-preview.dto';
import {
  CUSTOMER_EMAIL_HEADER,
  CUSTOMER_ID_HEADER,
  headerValue,
} from '../http/customer-headers';

const PREVIEW_REQUESTS_PER_MINUTE = 10;

@Controller('previews')
export class PreviewsController {
  constructor(private readonly previewsService: PreviewsService) {}

  /** Each preview starts a paid image generation run. */
  @RateLimit(PREVIEW_REQUESTS_PER_MINUTE)
  @Post()
  createPreview(
    @Body() dto: CreatePreviewDto,
    @Headers(CUSTOMER_ID_HEADER) customerId?: string,
    @Headers(CUSTOMER_EMAIL_HEADER) customerEmail?: string,
  ) {
    return this.previewsService.createPreview(dto, {
      customerId: headerValue(customerId),
      customerEmail: headerValue(customerEmail),
    });
  }

  @Get(':previewId')
  getPreview(@Param('previewId', ParseUUIDPipe) previewId: string) {
    return this.previewsService.getPreview(previewId);
  }
}
