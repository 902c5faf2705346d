import { Module } from '@nestjs/common';
import { CoverImageModule } from '../cover-image/cover-image.module';
import { DomainsModule } from '../domains/domains.module';
import { GlossaryModule } from '../glossary/glossary.module';
import { GraphModule } from '../graph/graph.module';
import { KeywordsModule } from '../keywords/keywords.module';
import { ToolDispatchService } from './tool-dispatch.service';
import { ToolsController } from './tools.controller';

@Module({
  imports: [
    DomainsModule,
    GraphModule,
    KeywordsModule,
    GlossaryModule,
    CoverImageModule,
  ],
  controllers: [ToolsController],
  providers: [ToolDispatchService],
  exports: [ToolDispatchService],
})
export class ToolsModule {}
