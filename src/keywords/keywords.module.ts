import { Module } from '@nestjs/common';
import { DomainsModule } from '../domains/domains.module';
import { TextModule } from '../text/text.module';
import { KeywordExtractorService } from './keyword-extractor.service';

@Module({
  imports: [DomainsModule, TextModule],
  providers: [KeywordExtractorService],
  exports: [KeywordExtractorService],
})
export class KeywordsModule {}
