import Database from 'better-sqlite3';
import { AnalysisJob, AnalysisJobState } from '../../../domain/entities/AnalysisJob';
import { IAnalysisJobRepository, JobFilter } from '../../../domain/repositories/IAnalysisJobRepository';
import { JobStatus, NON_TERMINAL_STATUSES } from '../../../domain/value-objects/JobStatus';
import { InputRef } from '../../../domain/value-objects/InputRef';
import { AnalysisKind, isAnalysisKind } from '../../../domain/value-objects/AnalysisKind';
import { AnalysisResult, JobResult } from '../../../domain/value-objects/AnalysisResult';
import { JobError } from '../../../domain/errors/AnalysisError';
import { childIdsSchema, jobErrorSchema, jobResultSchema, storedAnalysisResultSchema } from '../../schemas/analysis.schema';

interface AnalysisJobRow {
  id: string;
  kind: string;
  repo_owner: string;
  repo_name: string;
  path: string;
  revision: string | null;
  input_key: string;
  status: string;
  result: string | null;
  error: string | null;
  parent_id: string | null;
  child_ids: string;
  requested_by: string | null;
  attempts: number;
  content_hash: string | null;
  created_at: string;
  updated_at: string;
}

const IN_FLIGHT_SQL = NON_TERMINAL_STATUSES.map((s) => `'${s}'`).join(', ');

export class SqliteAnalysisJobRepository implements IAnalysisJobRepository {
  constructor(private readonly db: Database.Database) {}

  async create(job: AnalysisJob): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO analysis_jobs (
        id, kind, repo_owner, repo_name, path, revision, input_key, status,
        result, error, parent_id, child_ids, requested_by, attempts, content_hash,
        created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      job.id,
      job.kind,
      job.inputRef.owner,
      job.inputRef.repo,
      job.inputRef.path,
      job.inputRef.revision,
      job.inputRef.key,
      job.status.value,
      job.result ? JSON.stringify(job.result) : null,
      job.error ? JSON.stringify(job.error) : null,
      job.parentId,
      JSON.stringify(job.childIds),
      job.requestedBy,
      job.attempts,
      job.contentHash,
      job.createdAt.toISOString(),
      job.updatedAt.toISOString(),
    );
  }

  async update(id: string, fields: AnalysisJobState): Promise<void> {
    // Terminal rows are never rewritten.
    const stmt = this.db.prepare(`
      UPDATE analysis_jobs SET
        status = ?,
        result = ?,
        error = ?,
        attempts = ?,
        content_hash = ?,
        child_ids = ?,
        updated_at = ?
      WHERE id = ? AND status IN (${IN_FLIGHT_SQL})
    `);

    const info = stmt.run(
      fields.status.value,
      fields.result ? JSON.stringify(fields.result) : null,
      fields.error ? JSON.stringify(fields.error) : null,
      fields.attempts,
      fields.contentHash,
      JSON.stringify(fields.childIds),
      fields.updatedAt.toISOString(),
      id,
    );

    if (info.changes === 0) {
      const existing = await this.findById(id);
      if (!existing) {
        throw new Error(`Job not found: ${id}`);
      }
      throw new Error(`Cannot update job ${id} in terminal status ${existing.status.value}`);
    }
  }

  async findById(id: string): Promise<AnalysisJob | null> {
    const stmt = this.db.prepare('SELECT * FROM analysis_jobs WHERE id = ?');
    const row = stmt.get(id) as AnalysisJobRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findInFlight(kind: AnalysisKind, inputRef: InputRef): Promise<AnalysisJob | null> {
    const stmt = this.db.prepare(`
      SELECT * FROM analysis_jobs
      WHERE kind = ? AND input_key = ? AND status IN (${IN_FLIGHT_SQL})
      ORDER BY created_at ASC LIMIT 1
    `);
    const row = stmt.get(kind, inputRef.key) as AnalysisJobRow | undefined;
    return row ? this.mapToEntity(row) : null;
  }

  async findByParentId(parentId: string): Promise<AnalysisJob[]> {
    const stmt = this.db.prepare('SELECT * FROM analysis_jobs WHERE parent_id = ? ORDER BY created_at ASC');
    const rows = stmt.all(parentId) as AnalysisJobRow[];
    return rows.map((row) => this.mapToEntity(row));
  }

  async findCachedResult(kind: AnalysisKind, contentHash: string, since: Date): Promise<AnalysisResult | null> {
    const stmt = this.db.prepare(`
      SELECT result FROM analysis_jobs
      WHERE kind = ? AND content_hash = ? AND status = 'succeeded' AND updated_at >= ?
      ORDER BY updated_at DESC LIMIT 1
    `);
    const row = stmt.get(kind, contentHash, since.toISOString()) as { result: string | null } | undefined;
    if (!row?.result) {
      return null;
    }
    const parsed = storedAnalysisResultSchema.safeParse(JSON.parse(row.result));
    return parsed.success ? parsed.data : null;
  }

  async findNonTerminal(): Promise<AnalysisJob[]> {
    const stmt = this.db.prepare(`SELECT * FROM analysis_jobs WHERE status IN (${IN_FLIGHT_SQL}) ORDER BY created_at ASC`);
    const rows = stmt.all() as AnalysisJobRow[];
    return rows.map((row) => this.mapToEntity(row));
  }

  async findAll(filter: JobFilter = {}): Promise<AnalysisJob[]> {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter.kind) {
      clauses.push('kind = ?');
      params.push(filter.kind);
    }
    if (filter.status) {
      clauses.push('status = ?');
      params.push(filter.status);
    }
    if (filter.requestedBy) {
      clauses.push('requested_by = ?');
      params.push(filter.requestedBy);
    }

    let sql = 'SELECT * FROM analysis_jobs';
    if (clauses.length > 0) sql += ` WHERE ${clauses.join(' AND ')}`;
    sql += ' ORDER BY created_at DESC';
    if (filter.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }

    const rows = this.db.prepare(sql).all(...params) as AnalysisJobRow[];
    return rows.map((row) => this.mapToEntity(row));
  }

  private mapToEntity(row: AnalysisJobRow): AnalysisJob {
    if (!isAnalysisKind(row.kind)) {
      throw new Error(`Unknown analysis kind in job ${row.id}: ${row.kind}`);
    }
    return AnalysisJob.reconstitute({
      id: row.id,
      kind: row.kind,
      inputRef: InputRef.create({
        owner: row.repo_owner,
        repo: row.repo_name,
        path: row.path,
        revision: row.revision,
      }),
      status: JobStatus.fromString(row.status),
      result: row.result ? this.parseResult(row.result) : null,
      error: row.error ? this.parseError(row.error) : null,
      parentId: row.parent_id,
      childIds: childIdsSchema.parse(JSON.parse(row.child_ids)),
      requestedBy: row.requested_by,
      attempts: row.attempts,
      contentHash: row.content_hash,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    });
  }

  private parseResult(raw: string): JobResult {
    return jobResultSchema.parse(JSON.parse(raw));
  }

  private parseError(raw: string): JobError {
    return jobErrorSchema.parse(JSON.parse(raw));
  }
}
