export { AnalysesController } from './analyses.controller';
export { HealthController } from './health.controller';
export { RepositoriesController } from './repositories.controller';
