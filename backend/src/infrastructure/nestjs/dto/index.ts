export * from './analysis.dto';
export * from './repository.dto';
