import { Octokit } from '@octokit/rest';
import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { AnalysisError } from '../../domain/errors/AnalysisError';
import { InputRef } from '../../domain/value-objects/InputRef';
import { SkippedFile } from '../../domain/value-objects/AnalysisResult';
import {
  ContentEntry,
  CreatedIssue,
  ExternalFetchResult,
  IHostingClient,
  IssueDraft,
  RepositorySummary,
} from './IHostingClient';

export const SUPPORTED_EXTENSIONS = ['.py', '.js', '.java', '.cpp', '.c', '.go', '.rs', '.ts', '.jsx', '.tsx'];
const MAX_DEPTH = 10;
const FILE_SEPARATOR = '\n\n---\n\n';
const FILE_LIMIT_REASON = 'file limit reached';
const REPOS_PER_PAGE = 100;
const MAX_REPO_PAGES = 10;

// Type aliases rather than interfaces, so they satisfy Octokit's indexed parameter type.
type RequestOptions = {
  request?: { signal?: AbortSignal };
};

export type GetContentParams = RequestOptions & {
  owner: string;
  repo: string;
  path: string;
  ref?: string;
  mediaType?: { format?: string };
};

export type ListUserReposParams = RequestOptions & {
  username: string;
  sort?: 'created' | 'updated' | 'pushed' | 'full_name';
  per_page?: number;
  page?: number;
};

export type CreateIssueParams = RequestOptions & {
  owner: string;
  repo: string;
  title: string;
  body?: string;
  labels?: string[];
};

/**
 * The slice of the GitHub REST API this client needs.
 */
export interface GitHubApi {
  getContent(params: GetContentParams): Promise<{ data: unknown }>;
  listForUser(params: ListUserReposParams): Promise<{ data: unknown }>;
  createIssue(params: CreateIssueParams): Promise<{ data: unknown }>;
}

export function octokitApi(octokit: Octokit): GitHubApi {
  return {
    getContent: (params) => octokit.rest.repos.getContent(params),
    listForUser: (params) => octokit.rest.repos.listForUser(params),
    createIssue: (params) => octokit.rest.issues.create(params),
  };
}

export interface GitHubClientOptions {
  token?: string;
  maxArtifactBytes: number;
  maxFileBytes: number;
  maxFiles: number;
  api?: GitHubApi;
}

const fileSchema = z.object({
  type: z.literal('file'),
  name: z.string(),
  path: z.string(),
  size: z.number(),
  content: z.string().optional(),
  encoding: z.string().optional(),
});

const entrySchema = z.object({
  type: z.string(),
  name: z.string(),
  path: z.string(),
  size: z.number(),
  html_url: z.string().nullable().optional(),
});

const directorySchema = z.array(entrySchema);

const repositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  description: z.string().nullable().optional(),
  html_url: z.string(),
  language: z.string().nullable().optional(),
  stargazers_count: z.number().optional(),
  forks_count: z.number().optional(),
});

const issueSchema = z.object({
  id: z.number(),
  number: z.number(),
  title: z.string(),
  state: z.string(),
  html_url: z.string(),
});

type DirectoryEntry = z.infer<typeof entrySchema>;

interface CollectedFile {
  path: string;
  language: string;
  content: string;
}

/**
 * Talks to GitHub through the REST API.
 * A file path yields that file; a directory (or the repository root) yields the
 * supported source files under it, joined into one document.
 */
export class GitHubHostingClient implements IHostingClient {
  private readonly logger = new Logger(GitHubHostingClient.name);
  private readonly api: GitHubApi;

  constructor(private readonly options: GitHubClientOptions) {
    this.api = options.api || octokitApi(GitHubHostingClient.createOctokit(options.token));
  }

  private static createOctokit(token?: string): Octokit {
    if (token) {
      return new Octokit({ auth: token });
    }
    new Logger(GitHubHostingClient.name).warn('GITHUB_TOKEN not set, using unauthenticated access (60 req/hour)');
    return new Octokit();
  }

  async fetchArtifact(inputRef: InputRef, signal?: AbortSignal): Promise<ExternalFetchResult> {
    const data = await this.getContent(inputRef, inputRef.path, signal);

    if (Array.isArray(data)) {
      return this.fetchDirectory(inputRef, directorySchema.parse(data), signal);
    }

    const file = fileSchema.safeParse(data);
    if (!file.success) {
      throw new AnalysisError('NotFound', `${inputRef.toString()} is not a file or directory`);
    }

    const content = await this.readFile(inputRef, file.data, signal);
    return this.buildResult(content, [file.data.path], [], false);
  }

  async listContents(inputRef: InputRef, signal?: AbortSignal): Promise<ContentEntry[]> {
    const data = await this.getContent(inputRef, inputRef.path, signal);
    const parsed = directorySchema.safeParse(Array.isArray(data) ? data : [data]);
    if (!parsed.success) {
      throw new AnalysisError('Internal', `Unexpected content listing for ${inputRef.toString()}`);
    }
    return parsed.data.map((entry) => ({
      name: entry.name,
      path: entry.path,
      type: entry.type,
      size: entry.size,
      url: entry.html_url ?? null,
    }));
  }

  async listUserRepositories(username: string, signal?: AbortSignal): Promise<RepositorySummary[]> {
    const repositories: RepositorySummary[] = [];
    for (let page = 1; page <= MAX_REPO_PAGES; page++) {
      let data: unknown;
      try {
        const response = await this.api.listForUser({
          username,
          sort: 'updated',
          per_page: REPOS_PER_PAGE,
          page,
          request: { signal },
        });
        data = response.data;
      } catch (error) {
        throw toHostingError(error, `user ${username}`);
      }

      const parsed = z.array(repositorySchema).safeParse(data);
      if (!parsed.success) {
        throw new AnalysisError('Internal', `Unexpected repository list for user ${username}`);
      }
      for (const repo of parsed.data) {
        repositories.push({
          name: repo.name,
          fullName: repo.full_name,
          description: repo.description ?? null,
          url: repo.html_url,
          language: repo.language ?? null,
          stars: repo.stargazers_count ?? 0,
          forks: repo.forks_count ?? 0,
        });
      }
      if (parsed.data.length < REPOS_PER_PAGE) {
        break;
      }
    }
    return repositories;
  }

  async createIssue(inputRef: InputRef, draft: IssueDraft): Promise<CreatedIssue> {
    let data: unknown;
    try {
      const response = await this.api.createIssue({
        owner: inputRef.owner,
        repo: inputRef.repo,
        title: draft.title,
        body: draft.body,
        ...(draft.labels && draft.labels.length > 0 ? { labels: draft.labels } : {}),
      });
      data = response.data;
    } catch (error) {
      throw toHostingError(error, `${inputRef.fullName} issues`);
    }

    const parsed = issueSchema.safeParse(data);
    if (!parsed.success) {
      throw new AnalysisError('Internal', `Unexpected issue response for ${inputRef.fullName}`);
    }
    this.logger.log(`Created issue #${parsed.data.number} in ${inputRef.fullName}`);
    return {
      id: parsed.data.id,
      number: parsed.data.number,
      title: parsed.data.title,
      state: parsed.data.state,
      url: parsed.data.html_url,
    };
  }

  private async fetchDirectory(
    inputRef: InputRef,
    root: DirectoryEntry[],
    signal?: AbortSignal,
  ): Promise<ExternalFetchResult> {
    const collected: CollectedFile[] = [];
    const skipped: SkippedFile[] = [];
    let limitHit = false;

    const walk = async (entries: DirectoryEntry[], depth: number): Promise<void> => {
      for (const entry of entries) {
        const atLimit = collected.length >= this.options.maxFiles;

        if (entry.type === 'dir') {
          if (atLimit) {
            limitHit = true;
            skipped.push({ path: entry.path, reason: FILE_LIMIT_REASON });
            continue;
          }
          if (depth >= MAX_DEPTH) {
            skipped.push({ path: entry.path, reason: 'too deep' });
            continue;
          }
          const children = await this.readDirectory(inputRef, entry.path, signal);
          if (!children) {
            skipped.push({ path: entry.path, reason: 'not readable' });
            continue;
          }
          await walk(children, depth + 1);
          continue;
        }

        if (entry.type !== 'file' || !this.isSupported(entry.name)) {
          continue;
        }
        if (atLimit) {
          limitHit = true;
          skipped.push({ path: entry.path, reason: FILE_LIMIT_REASON });
          continue;
        }
        if (entry.size > this.options.maxFileBytes) {
          skipped.push({ path: entry.path, reason: 'too large' });
          continue;
        }

        try {
          const data = await this.getContent(inputRef, entry.path, signal);
          const content = await this.readFile(inputRef, fileSchema.parse(data), signal);
          collected.push({ path: entry.path, language: this.languageOf(entry.name), content });
        } catch (error) {
          if (error instanceof AnalysisError && error.kind === 'NotFound') {
            skipped.push({ path: entry.path, reason: 'not found' });
            continue;
          }
          throw error;
        }
      }
    };

    await walk(root, 0);

    if (collected.length === 0) {
      throw new AnalysisError('NotFound', `No supported source files found in ${inputRef.toString()}`);
    }

    this.logger.debug(`Collected ${collected.length} files from ${inputRef.toString()} (${skipped.length} skipped)`);

    const content = collected
      .map((f) => `File: ${f.path}\nLanguage: ${f.language}\n\n${f.content}`)
      .join(FILE_SEPARATOR);
    return this.buildResult(
      content,
      collected.map((f) => f.path),
      skipped,
      limitHit,
    );
  }

  /**
   * List a subdirectory during a walk. Returns null when it cannot be read;
   * rate limits and transient failures still fail the fetch.
   */
  private async readDirectory(
    inputRef: InputRef,
    path: string,
    signal?: AbortSignal,
  ): Promise<DirectoryEntry[] | null> {
    try {
      const parsed = directorySchema.safeParse(await this.getContent(inputRef, path, signal));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      if (error instanceof AnalysisError && (error.kind === 'NotFound' || error.kind === 'AuthFailure')) {
        this.logger.warn(`Skipping ${inputRef.fullName}/${path}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private async readFile(
    inputRef: InputRef,
    file: z.infer<typeof fileSchema>,
    signal?: AbortSignal,
  ): Promise<string> {
    if (file.content !== undefined && file.encoding === 'base64') {
      return Buffer.from(file.content, 'base64').toString('utf-8');
    }
    // Files over 1 MB come back without inline content.
    const raw = await this.getContent(inputRef, file.path, signal, 'raw');
    if (typeof raw !== 'string') {
      throw new AnalysisError('TransientNetworkError', `Unexpected raw content for ${file.path}`);
    }
    return raw;
  }

  private buildResult(
    content: string,
    files: string[],
    skipped: SkippedFile[],
    filesCut: boolean,
  ): ExternalFetchResult {
    const size = Buffer.byteLength(content, 'utf-8');
    const overCap = size > this.options.maxArtifactBytes;
    return {
      content: overCap ? truncateBytes(content, this.options.maxArtifactBytes) : content,
      size,
      encoding: 'utf-8',
      truncated: overCap || filesCut,
      files,
      skipped,
    };
  }

  private async getContent(
    inputRef: InputRef,
    path: string,
    signal?: AbortSignal,
    format?: 'raw',
  ): Promise<unknown> {
    try {
      const response = await this.api.getContent({
        owner: inputRef.owner,
        repo: inputRef.repo,
        path,
        ...(inputRef.revision ? { ref: inputRef.revision } : {}),
        ...(format ? { mediaType: { format } } : {}),
        request: { signal },
      });
      return response.data;
    } catch (error) {
      throw toHostingError(error, `${inputRef.fullName}/${path}`);
    }
  }

  private isSupported(name: string): boolean {
    return SUPPORTED_EXTENSIONS.some((ext) => name.endsWith(ext));
  }

  private languageOf(name: string): string {
    const dot = name.lastIndexOf('.');
    return dot >= 0 ? name.slice(dot + 1) : name;
  }
}

/**
 * Cut a string to at most `maxBytes` UTF-8 bytes without splitting a character.
 */
export function truncateBytes(content: string, maxBytes: number): string {
  const cut = Buffer.from(content, 'utf-8').subarray(0, maxBytes).toString('utf-8');
  return cut.endsWith('\uFFFD') ? cut.slice(0, -1) : cut;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (typeof headers !== 'object' || headers === null || !(name in headers)) {
    return undefined;
  }
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

/**
 * Map an Octokit RequestError (or a network failure) onto the error taxonomy.
 */
export function toHostingError(error: unknown, target: string): AnalysisError {
  if (error instanceof AnalysisError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;
  const headers =
    typeof error === 'object' && error !== null && 'response' in error && typeof error.response === 'object' && error.response !== null && 'headers' in error.response
      ? error.response.headers
      : undefined;

  if (status === undefined || status >= 500) {
    return new AnalysisError('TransientNetworkError', `GitHub request failed for ${target}: ${message}`, { cause: error });
  }
  if (status === 404) {
    return new AnalysisError('NotFound', `Not found on GitHub: ${target}`, { cause: error });
  }

  const retryAfter = headerValue(headers, 'retry-after');
  const retryAfterMs = retryAfter ? parseInt(retryAfter, 10) * 1000 : undefined;
  const rateLimitExhausted = headerValue(headers, 'x-ratelimit-remaining') === '0';

  if (status === 429 || (status === 403 && (rateLimitExhausted || retryAfter !== undefined || /rate limit/i.test(message)))) {
    return new AnalysisError('RateLimited', `GitHub rate limit exceeded for ${target}`, {
      cause: error,
      retryAfterMs: retryAfterMs !== undefined && !Number.isNaN(retryAfterMs) ? retryAfterMs : undefined,
    });
  }
  if (status === 401 || status === 403) {
    return new AnalysisError('AuthFailure', `GitHub denied access to ${target}: ${message}`, { cause: error });
  }
  return new AnalysisError('Internal', `GitHub request failed for ${target} (${status}): ${message}`, { cause: error });
}
