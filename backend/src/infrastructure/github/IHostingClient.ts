import { InputRef } from '../../domain/value-objects/InputRef';
import { SkippedFile } from '../../domain/value-objects/AnalysisResult';

/**
 * Artifact content fetched from the code host. Lives only while one job is
 * being processed.
 */
export interface ExternalFetchResult {
  content: string;
  /** Byte length of the artifact before truncation */
  size: number;
  encoding: 'utf-8';
  truncated: boolean;
  /** Paths whose content is included */
  files: string[];
  skipped: SkippedFile[];
}

export interface ContentEntry {
  name: string;
  path: string;
  type: string;
  size: number;
  url: string | null;
}

export interface RepositorySummary {
  name: string;
  fullName: string;
  description: string | null;
  url: string;
  language: string | null;
  stars: number;
  forks: number;
}

export interface IssueDraft {
  title: string;
  body: string;
  labels?: string[];
}

export interface CreatedIssue {
  id: number;
  number: number;
  title: string;
  state: string;
  url: string;
}

/**
 * Port for the code-hosting API.
 * Fails with AnalysisError of kind NotFound, AuthFailure, RateLimited or TransientNetworkError.
 */
export interface IHostingClient {
  fetchArtifact(inputRef: InputRef, signal?: AbortSignal): Promise<ExternalFetchResult>;
  /** Entries at the referenced path; a file path yields a single entry. */
  listContents(inputRef: InputRef, signal?: AbortSignal): Promise<ContentEntry[]>;
  listUserRepositories(username: string, signal?: AbortSignal): Promise<RepositorySummary[]>;
  createIssue(inputRef: InputRef, draft: IssueDraft): Promise<CreatedIssue>;
}

export const HOSTING_CLIENT = Symbol('IHostingClient');
