export * from './ai';
export * from './github';
export * from './identity';
export { APP_CONFIG, AppConfig, loadConfig } from './config/config';
export { SqliteAnalysisJobRepository } from './persistence/sqlite/AnalysisJobRepository';
export { createDatabase, createTestDatabase } from './persistence/sqlite/database';
