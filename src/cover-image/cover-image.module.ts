import { Module } from '@nestjs/common';
import { DomainsModule } from '../domains/domains.module';
import { KeywordsModule } from '../keywords/keywords.module';
import { TextModule } from '../text/text.module';
import { ConfiguredEngineAvailability } from './configured-engine-availability';
import { CoverImagePromptService } from './cover-image-prompt.service';
import { IMAGE_ENGINE_AVAILABILITY } from './image-engine.interface';

// Bind IMAGE_GENERATOR here to render images as well as prompts.
@Module({
  imports: [DomainsModule, KeywordsModule, TextModule],
  providers: [
    CoverImagePromptService,
    {
      provide: IMAGE_ENGINE_AVAILABILITY,
      useClass: ConfiguredEngineAvailability,
    },
  ],
  exports: [CoverImagePromptService],
})
export class CoverImageModule {}
