import { Module, type Provider } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { BedrockGenerationGateway } from './ai/bedrock-generation.gateway';
import { GENERATION_GATEWAY } from './ai/generation.gateway';
import { LangchainService } from './ai/langchain.service';
import { BedrockService } from './bedrock/bedrock.service';
import { ChatController } from './chat/chat.controller';
import { ChatService } from './chat/chat.service';
import { ConversationStore } from './chat/conversation-store.service';
import { FailureRecorder } from './common/failure-recorder.service';
import { SupportExceptionFilter } from './common/support-exception.filter';
import { APP_CONFIG, loadConfig, type AppConfig } from './config/app.config';
import { EMBEDDING_GATEWAY } from './embedding/embedding.gateway';
import { HashingEmbeddingGateway } from './embedding/hashing-embedding.gateway';
import { HealthController } from './health/health.controller';
import { DocumentChunker } from './ingest/chunker';
import { DocumentLoader } from './ingest/document-loader';
import { IngestController } from './ingest/ingest.controller';
import { IngestService } from './ingest/ingest.service';
import { RagController } from './rag/rag.controller';
import { RagService } from './rag/rag.service';
import { SemanticIndexService } from './rag/semantic-index.service';
import { SqlService } from './sql/sql.service';
import {
  InMemoryTicketProvider,
  loadTicketsFile,
} from './tickets/in-memory-ticket.provider';
import { PgTicketProvider } from './tickets/pg-ticket.provider';
import { TICKET_PROVIDER } from './tickets/ticket-provider';
import { TicketsController } from './tickets/tickets.controller';

const gatewayProviders: Provider[] = [
  {
    provide: EMBEDDING_GATEWAY,
    inject: [APP_CONFIG],
    useFactory: (config: AppConfig) =>
      config.embedding.provider === 'hashing'
        ? new HashingEmbeddingGateway(config.embedding.hashingDimensions)
        : new BedrockService(config),
  },
  {
    provide: GENERATION_GATEWAY,
    inject: [LangchainService],
    useFactory: (lc: LangchainService) => new BedrockGenerationGateway(lc),
  },
  {
    provide: SqlService,
    inject: [APP_CONFIG],
    useFactory: (config: AppConfig) =>
      new SqlService({ connectionString: config.tickets.databaseUrl }),
  },
  {
    provide: TICKET_PROVIDER,
    inject: [APP_CONFIG, SqlService],
    useFactory: (config: AppConfig, sql: SqlService) =>
      config.tickets.store === 'postgres'
        ? new PgTicketProvider(sql, config.tickets.table)
        : new InMemoryTicketProvider(loadTicketsFile()),
  },
];

@Module({
  controllers: [
    ChatController,
    IngestController,
    RagController,
    TicketsController,
    HealthController,
  ],
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadConfig() },
    { provide: APP_FILTER, useClass: SupportExceptionFilter },
    ...gatewayProviders,
    FailureRecorder,
    LangchainService,
    SemanticIndexService,
    RagService,
    DocumentChunker,
    DocumentLoader,
    IngestService,
    ConversationStore,
    ChatService,
  ],
})
export class AppModule {}
