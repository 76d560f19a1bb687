import { Controller, Get, Query, Req } from '@nestjs/common';
import type { CorrelatedRequest } from '../http/correlation';
import { CopilotService, SearchResult } from './copilot.service';

@Controller()
export class CopilotController {
  constructor(private readonly copilotService: CopilotService) {}

  @Get('/search')
  async search(@Query('query') query: unknown, @Req() req: CorrelatedRequest): Promise<SearchResult> {
    return this.copilotService.answer(firstString(query), req.correlationId);
  }
}

/** `?query=a&query=b` arrives as an array; the first value wins. */
function firstString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : '';
  }
  return '';
}
