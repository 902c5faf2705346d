import { Module } from '@nestjs/common';
import { TermExtractorService } from './term-extractor.service';

@Module({
  providers: [TermExtractorService],
  exports: [TermExtractorService],
})
export class TextModule {}
