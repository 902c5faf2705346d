import { Module } from '@nestjs/common';
import { GraphModule } from '../graph/graph.module';
import { TextModule } from '../text/text.module';
import { DomainGraphStoreService } from './domain-graph-store.service';
import { DomainsController } from './domains.controller';
import { GraphPersistenceService } from './graph-persistence.service';

@Module({
  imports: [GraphModule, TextModule],
  controllers: [DomainsController],
  providers: [GraphPersistenceService, DomainGraphStoreService],
  exports: [GraphPersistenceService, DomainGraphStoreService],
})
export class DomainsModule {}
