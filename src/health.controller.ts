import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { DomainGraphStoreService } from './domains/domain-graph-store.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private readonly store: DomainGraphStoreService) {}

  @Get()
  @ApiOperation({ summary: 'Health check' })
  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      domains: this.store.listDomains().map((summary) => summary.domain),
    };
  }
}
