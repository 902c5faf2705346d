import { Module } from '@nestjs/common';
import { TextModule } from '../text/text.module';
import { CentralityRankerService } from './centrality-ranker.service';
import { GraphBuilderService } from './graph-builder.service';

@Module({
  imports: [TextModule],
  providers: [GraphBuilderService, CentralityRankerService],
  exports: [GraphBuilderService, CentralityRankerService],
})
export class GraphModule {}
