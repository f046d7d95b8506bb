const GITHUB_URL_PATTERN = /^https:\/\/github\.com\/([a-zA-Z0-9-]+)\/([a-zA-Z0-9_.-]+?)(?:\.git)?\/?$/;
const OWNER_PATTERN = /^[a-zA-Z0-9-]+$/;
const REPO_PATTERN = /^[a-zA-Z0-9_.-]+$/;

export interface InputRefProps {
  owner: string;
  repo: string;
  path?: string;
  revision?: string | null;
}

/**
 * Value object pointing at the artifact to analyze: a repository, a path inside
 * it (empty for the repository root) and an optional revision.
 */
export class InputRef {
  private constructor(
    private readonly _owner: string,
    private readonly _repo: string,
    private readonly _path: string,
    private readonly _revision: string | null,
  ) {}

  static create(props: InputRefProps): InputRef {
    if (!OWNER_PATTERN.test(props.owner)) {
      throw new Error(`Invalid repository owner: ${props.owner}`);
    }
    if (!REPO_PATTERN.test(props.repo)) {
      throw new Error(`Invalid repository name: ${props.repo}`);
    }
    const path = InputRef.normalizePath(props.path ?? '');
    if (path.split('/').includes('..')) {
      throw new Error(`Invalid path: ${props.path}`);
    }
    const revision = props.revision?.trim() || null;
    return new InputRef(props.owner, props.repo, path, revision);
  }

  /**
   * Build from a repository URL such as https://github.com/owner/repo
   */
  static fromGitHubUrl(url: string, path?: string, revision?: string | null): InputRef {
    const match = GITHUB_URL_PATTERN.exec(url.trim());
    if (!match) {
      throw new Error(`Invalid GitHub URL: ${url}`);
    }
    return InputRef.create({ owner: match[1], repo: match[2], path, revision });
  }

  /**
   * Build from an "owner/repo" string.
   */
  static fromFullName(fullName: string, path?: string, revision?: string | null): InputRef {
    const parts = fullName.trim().split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new Error('Invalid repo format. Expected "owner/repository-name"');
    }
    return InputRef.create({ owner: parts[0], repo: parts[1], path, revision });
  }

  static isGitHubUrl(url: string): boolean {
    return GITHUB_URL_PATTERN.test(url.trim());
  }

  private static normalizePath(path: string): string {
    return path
      .split('/')
      .filter((segment) => segment.length > 0 && segment !== '.')
      .join('/');
  }

  get owner(): string {
    return this._owner;
  }

  get repo(): string {
    return this._repo;
  }

  get fullName(): string {
    return `${this._owner}/${this._repo}`;
  }

  get path(): string {
    return this._path;
  }

  get revision(): string | null {
    return this._revision;
  }

  /**
   * Canonical form used for deduplication. GitHub owner and repository names
   * are case-insensitive, paths and revisions are not.
   */
  get key(): string {
    const base = `${this.fullName.toLowerCase()}:${this._path}`;
    return this._revision ? `${base}@${this._revision}` : base;
  }

  equals(other: InputRef): boolean {
    return this.key === other.key;
  }

  toString(): string {
    const base = `${this.fullName}:${this._path || '/'}`;
    return this._revision ? `${base}@${this._revision}` : base;
  }
}
