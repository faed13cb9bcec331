import { Controller, Get, Inject } from '@nestjs/common';
import { FailureRecorder } from '../common/failure-recorder.service';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { SemanticIndexService } from '../rag/semantic-index.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly index: SemanticIndexService,
    private readonly failures: FailureRecorder,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Get()
  check() {
    return {
      status: 'ok',
      knowledgeBase: this.index.stats(),
      ingesting: this.index.isIngesting,
      embeddingProvider: this.config.embedding.provider,
      ticketStore: this.config.tickets.store,
      recentFailures: this.failures.recent().slice(-10),
    };
  }
}
