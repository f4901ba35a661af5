import { Controller, Get, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { PreviewsService } from '../../application/previews.service';

@Controller('jobs')
export class JobsController {
  constructor(private readonly previewsService: PreviewsService) {}

  @Get(':jobId/status')
  status(@Param('jobId', ParseUUIDPipe) jobId: string) {
    return this.previewsService.getJobStatus(jobId);
  }

  /** Only failed preview jobs below their attempt limit. */
  @Post(':jobId/retry')
  retry(@Param('jobId', ParseUUIDPipe) jobId: string) {
    return this.previewsService.retryJob(jobId);
  }
}
