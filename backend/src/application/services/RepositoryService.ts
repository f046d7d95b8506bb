import { AnalysisJob, AnalysisResult, InputRef, SubAnalysisKind, isAggregateResult } from '../../domain';
import {
  ContentEntry,
  CreatedIssue,
  IHostingClient,
  IssueDraft,
  RepositorySummary,
} from '../../infrastructure/github/IHostingClient';
import { JobStateError } from '../errors';
import { AnalysisOrchestrator } from './AnalysisOrchestrator';

const KIND_TITLES: Record<SubAnalysisKind, string> = {
  'code-review': 'Code review',
  documentation: 'Documentation',
  'bug-detection': 'Bug detection',
};

export interface IssueFromAnalysisOptions {
  title?: string;
  labels?: string[];
}

/**
 * Repository browsing and issue filing on the code host.
 */
export class RepositoryService {
  constructor(
    private readonly hostingClient: IHostingClient,
    private readonly orchestrator: Pick<AnalysisOrchestrator, 'getStatus'>,
  ) {}

  async listUserRepositories(username: string): Promise<RepositorySummary[]> {
    return this.hostingClient.listUserRepositories(username);
  }

  async listContents(inputRef: InputRef): Promise<ContentEntry[]> {
    return this.hostingClient.listContents(inputRef);
  }

  async createIssue(inputRef: InputRef, draft: IssueDraft): Promise<CreatedIssue> {
    return this.hostingClient.createIssue(inputRef, draft);
  }

  /**
   * File the findings of a succeeded analysis as an issue on the analysed
   * repository. A full-repo-analysis files its bug-detection part.
   */
  async createIssueFromAnalysis(jobId: string, options: IssueFromAnalysisOptions = {}): Promise<CreatedIssue> {
    const job = await this.orchestrator.getStatus(jobId);
    const result = job.result;
    if (!job.status.isSucceeded || !result) {
      throw new JobStateError(`Cannot create an issue from a job in ${job.status.value} status`);
    }

    const kind: SubAnalysisKind = job.kind === 'full-repo-analysis' ? 'bug-detection' : job.kind;
    const report = isAggregateResult(result) ? result.parts['bug-detection'] : result;
    const count = report.findings.length;
    const title =
      options.title || `${KIND_TITLES[kind]}: ${count} finding${count === 1 ? '' : 's'} in ${job.inputRef.fullName}`;

    return this.hostingClient.createIssue(job.inputRef, {
      title,
      body: formatIssueBody(job, kind, report),
      labels: options.labels,
    });
  }
}

export function formatIssueBody(job: AnalysisJob, kind: SubAnalysisKind, report: AnalysisResult): string {
  const lines = [
    `${KIND_TITLES[kind]} of \`${job.inputRef.toString()}\`.`,
    '',
    '## Summary',
    '',
    report.summary,
    '',
  ];

  if (report.findings.length === 0) {
    lines.push('No findings.');
  } else {
    lines.push('## Findings', '');
    for (const finding of report.findings) {
      const location = finding.file
        ? ` (\`${finding.file}${finding.line !== undefined ? `:${finding.line}` : ''}\`)`
        : '';
      lines.push(`- **[${finding.severity}] ${finding.title}**${location}: ${finding.description}`);
      if (finding.suggestion) {
        lines.push(`  - Suggested fix: ${finding.suggestion}`);
      }
    }
  }

  const skipped = report.sources?.skipped.length ?? 0;
  if (skipped > 0) {
    lines.push('', `${skipped} file${skipped === 1 ? ' was' : 's were'} not analysed.`);
  }

  lines.push('', `Analysis job: ${job.id}`);
  return lines.join('\n');
}
