import { Module } from '@nestjs/common';
import { COMPLETION_CLIENT } from '../tokens';
import { GroqService } from './groq.service';

@Module({
  providers: [GroqService, { provide: COMPLETION_CLIENT, useExisting: GroqService }],
  exports: [COMPLETION_CLIENT],
})
export class GroqModule {}
