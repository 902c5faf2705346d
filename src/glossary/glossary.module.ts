import { Module } from '@nestjs/common';
import { DomainsModule } from '../domains/domains.module';
import { GlossaryBuilderService } from './glossary-builder.service';

// Bind DEFINITION_PROVIDER here to have glossaries carry definitions.
@Module({
  imports: [DomainsModule],
  providers: [GlossaryBuilderService],
  exports: [GlossaryBuilderService],
})
export class GlossaryModule {}
