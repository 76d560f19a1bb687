import { Module } from '@nestjs/common';
import { OCR_ENGINE } from '../tokens';
import { GeminiService } from './gemini.service';

@Module({
  providers: [GeminiService, { provide: OCR_ENGINE, useExisting: GeminiService }],
  exports: [OCR_ENGINE],
})
export class GeminiModule {}
