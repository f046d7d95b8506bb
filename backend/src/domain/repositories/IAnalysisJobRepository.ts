import { AnalysisJob, AnalysisJobState } from '../entities/AnalysisJob';
import { AnalysisKind } from '../value-objects/AnalysisKind';
import { JobStatusValue } from '../value-objects/JobStatus';
import { InputRef } from '../value-objects/InputRef';
import { AnalysisResult } from '../value-objects/AnalysisResult';

export interface JobFilter {
  kind?: AnalysisKind;
  status?: JobStatusValue;
  requestedBy?: string;
  limit?: number;
}

/**
 * Repository interface (port) for AnalysisJob persistence.
 * `update` writes status together with result or error in one step.
 */
export interface IAnalysisJobRepository {
  create(job: AnalysisJob): Promise<void>;
  update(id: string, fields: AnalysisJobState): Promise<void>;
  findById(id: string): Promise<AnalysisJob | null>;
  findInFlight(kind: AnalysisKind, inputRef: InputRef): Promise<AnalysisJob | null>;
  findByParentId(parentId: string): Promise<AnalysisJob[]>;
  findCachedResult(kind: AnalysisKind, contentHash: string, since: Date): Promise<AnalysisResult | null>;
  findNonTerminal(): Promise<AnalysisJob[]>;
  findAll(filter?: JobFilter): Promise<AnalysisJob[]>;
}

export const ANALYSIS_JOB_REPOSITORY = Symbol('IAnalysisJobRepository');
