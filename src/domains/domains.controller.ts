import {
  Controller,
  Delete,
  Get,
  MessageEvent,
  Param,
  Post,
  Sse,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { map, Observable } from 'rxjs';
import { DomainGraphStoreService } from './domain-graph-store.service';
import {
  DomainStatsResponseDto,
  DomainSummaryResponseDto,
  EvictResponseDto,
  LoadResultResponseDto,
} from './dto/domain-response.dto';
import {
  DomainStats,
  DomainSummary,
  LoadResult,
} from './types/domain-store.types';

@ApiTags('domains')
@Controller('api/domains')
export class DomainsController {
  constructor(private readonly store: DomainGraphStoreService) {}

  @Get()
  @ApiOperation({ summary: 'List domains with a published graph' })
  @ApiResponse({ type: [DomainSummaryResponseDto] })
  list(): DomainSummary[] {
    return this.store.listDomains();
  }

  @Sse('events')
  @ApiOperation({
    summary: 'Stream store notifications (SSE)',
    description: 'One event per load, build, failed build or eviction.',
  })
  events(): Observable<MessageEvent> {
    return this.store.events$.pipe(
      map((event): MessageEvent => ({ type: event.type, data: event })),
    );
  }

  @Get(':domain/stats')
  @ApiOperation({ summary: 'Node, edge and centrality statistics' })
  @ApiResponse({ type: DomainStatsResponseDto })
  stats(@Param('domain') domain: string): DomainStats {
    return this.store.getStats(domain);
  }

  @Post(':domain/reload')
  @ApiOperation({ summary: 'Reload a domain graph from its persisted file' })
  @ApiResponse({ type: LoadResultResponseDto })
  reload(@Param('domain') domain: string): Promise<LoadResult> {
    return this.store.loadPrebuilt(domain);
  }

  @Delete(':domain')
  @ApiOperation({ summary: 'Evict a domain graph from memory' })
  @ApiResponse({ type: EvictResponseDto })
  evict(@Param('domain') domain: string): EvictResponseDto {
    const { key } = this.store.resolve(domain);
    return { domain: key, evicted: this.store.evict(domain) };
  }
}
