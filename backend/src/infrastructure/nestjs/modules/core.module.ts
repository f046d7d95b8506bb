import { Module, Global, Inject, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { createDatabase } from '../../persistence/sqlite/database';
import { SqliteAnalysisJobRepository } from '../../persistence/sqlite/AnalysisJobRepository';
import { GitHubHostingClient, HOSTING_CLIENT, IHostingClient } from '../../github';
import { GeminiAiClient, AI_CLIENT, IAiClient } from '../../ai';
import { StaticTokenIdentityProvider, IDENTITY_PROVIDER } from '../../identity';
import { APP_CONFIG, AppConfig, loadConfig } from '../../config/config';
import { AnalysisOrchestrator } from '../../../application/services/AnalysisOrchestrator';
import { RepositoryService } from '../../../application/services/RepositoryService';
import { RetryPolicy } from '../../../application/retry/RetryPolicy';
// Domain repository symbols
import { ANALYSIS_JOB_REPOSITORY, IAnalysisJobRepository } from '../../../domain/repositories/IAnalysisJobRepository';
import { AnalysesController, HealthController, RepositoriesController } from '../controllers';
import { ApiTokenGuard } from '../guards';

const DATABASE_TOKEN = Symbol('DATABASE');

@Global()
@Module({
  controllers: [AnalysesController, RepositoriesController, HealthController],
  providers: [
    // Configuration
    {
      provide: APP_CONFIG,
      useFactory: () => loadConfig(),
    },

    // Database
    {
      provide: DATABASE_TOKEN,
      useFactory: (config: AppConfig) => createDatabase(config.databasePath),
      inject: [APP_CONFIG],
    },

    // Repositories
    {
      provide: ANALYSIS_JOB_REPOSITORY,
      useFactory: (db: Database.Database) => new SqliteAnalysisJobRepository(db),
      inject: [DATABASE_TOKEN],
    },

    // External services
    {
      provide: HOSTING_CLIENT,
      useFactory: (config: AppConfig) =>
        new GitHubHostingClient({
          token: config.githubToken,
          ...config.limits,
        }),
      inject: [APP_CONFIG],
    },
    {
      provide: AI_CLIENT,
      useFactory: (config: AppConfig) =>
        new GeminiAiClient({
          apiKey: config.geminiApiKey,
          model: config.geminiModel,
          timeoutMs: config.aiTimeoutMs,
        }),
      inject: [APP_CONFIG],
    },
    {
      provide: IDENTITY_PROVIDER,
      useFactory: (config: AppConfig) => new StaticTokenIdentityProvider(config.apiTokens),
      inject: [APP_CONFIG],
    },
    ApiTokenGuard,

    // Orchestrator
    {
      provide: AnalysisOrchestrator,
      useFactory: (
        config: AppConfig,
        jobRepo: IAnalysisJobRepository,
        hostingClient: IHostingClient,
        aiClient: IAiClient,
      ) => {
        const { invalidResponseMaxRetries, ...backoff } = config.retry;
        const retryPolicy = new RetryPolicy({
          ...backoff,
          kindRetryLimits: { InvalidResponse: invalidResponseMaxRetries },
        });
        return new AnalysisOrchestrator(jobRepo, hostingClient, aiClient, retryPolicy, {
          resultCacheTtlMs: config.resultCacheTtlMs,
        });
      },
      inject: [APP_CONFIG, ANALYSIS_JOB_REPOSITORY, HOSTING_CLIENT, AI_CLIENT],
    },
    {
      provide: RepositoryService,
      useFactory: (hostingClient: IHostingClient, orchestrator: AnalysisOrchestrator) =>
        new RepositoryService(hostingClient, orchestrator),
      inject: [HOSTING_CLIENT, AnalysisOrchestrator],
    },
  ],
  exports: [APP_CONFIG, DATABASE_TOKEN, ANALYSIS_JOB_REPOSITORY, HOSTING_CLIENT, AI_CLIENT, IDENTITY_PROVIDER, AnalysisOrchestrator, RepositoryService],
})
export class CoreModule implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CoreModule.name);

  constructor(
    private readonly orchestrator: AnalysisOrchestrator,
    @Inject(DATABASE_TOKEN)
    private readonly db: Database.Database,
  ) {}

  async onModuleInit() {
    const recovered = await this.orchestrator.recoverInterrupted();
    this.logger.log(`Orchestrator ready (${recovered} interrupted job${recovered === 1 ? '' : 's'} closed)`);
  }

  async onModuleDestroy() {
    await this.orchestrator.shutdown();
    this.db.close();
  }
}
