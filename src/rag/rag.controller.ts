import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { z } from 'zod';

import { parseBody } from '../common/validation';
import { RagService } from './rag.service';
import { SemanticIndexService } from './semantic-index.service';

const SearchSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  k: z.number().int().min(1).max(25).optional(),
});

@Controller('knowledge-base')
export class RagController {
  constructor(
    private readonly rag: RagService,
    private readonly index: SemanticIndexService,
  ) {}

  @Post('search')
  @HttpCode(200)
  async search(@Body() body: unknown) {
    const { query, k } = parseBody(SearchSchema, body);
    const results = await this.rag.search(query, k ?? this.rag.defaultK);
    return { query, results: this.rag.toCitations(results) };
  }

  @Get('stats')
  stats() {
    return this.index.stats();
  }
}
