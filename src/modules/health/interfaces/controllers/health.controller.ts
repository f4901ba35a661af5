import { Controller, Get } from '@nestjs/common';
import { SkipRateLimit } from '../../../rate-limiter/interfaces/rate-limit.decorator';
import { HealthService } from '../../application/health.service';

@SkipRateLimit()
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  async getHealth() {
    return this.healthService.getHealth();
  }
}
