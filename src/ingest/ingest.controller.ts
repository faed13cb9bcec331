import {
  Body,
  Controller,
  Delete,
  Inject,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { z } from 'zod';

import { parseBody } from '../common/validation';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { IngestService } from './ingest.service';

const IngestDocumentsSchema = z.object({
  documents: z
    .array(
      z
        .object({
          name: z.string().trim().min(1),
          text: z.string().optional(),
          pages: z.array(z.string()).optional(),
        })
        .refine((d) => d.text !== undefined || d.pages !== undefined, {
          message: 'either text or pages is required',
        }),
    )
    .min(1),
  clearExisting: z.boolean().default(false),
});

const InitializeSchema = z.object({
  clearExisting: z.boolean().default(false),
});

@Controller('knowledge-base')
export class IngestController {
  constructor(
    private readonly ingest: IngestService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  private ensureDev() {
    if (!this.config.devMode) {
      throw new ServiceUnavailableException('DEV_MODE is off.');
    }
  }

  @Post('documents')
  async ingestDocuments(@Body() body: unknown) {
    const { documents, clearExisting } = parseBody(IngestDocumentsSchema, body);
    return this.ingest.ingestDocuments(documents, { clearExisting });
  }

  @Post('initialize')
  async initialize(@Body() body: unknown) {
    const { clearExisting } = parseBody(InitializeSchema, body);
    return this.ingest.ingestDataFolder({ clearExisting });
  }

  @Delete()
  clear() {
    this.ensureDev();
    return this.ingest.clearKnowledgeBase();
  }
}
