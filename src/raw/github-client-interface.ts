// Abstraction over the GitHub REST API used by the extract stage

export type RequestParams = Record<string, string | number>;

export interface GithubResponse {
  status: number;
  headers: Record<string, string | number | undefined>;
  data: unknown;
}

/**
 * Raw HTTP access to the API. Non-2xx responses reject with an
 * `@octokit/request-error` RequestError carrying the response.
 */
export interface GithubTransport {
  request(route: string, params: RequestParams): Promise<GithubResponse>;
}

export interface RepoRef {
  owner: string;
  name: string;
}

/** Last rate-limit window reported by the API */
export interface RateLimitInfo {
  limit: number | null;
  remaining: number | null;
  /** Unix timestamp (seconds) when the window resets */
  reset: number | null;
}

// Only the parts of GET /repos/{owner}/{repo}/commits items that we read
export interface RawGitSignature {
  name?: string | null;
  email?: string | null;
  date?: string | null; // ISO
}

export interface RawAccount {
  login?: string | null;
  id?: number | null;
}

export interface RawCommit {
  sha?: string | null;
  commit?: {
    author?: RawGitSignature | null;
    committer?: RawGitSignature | null;
    message?: string | null;
  } | null;
  // Platform accounts; null when the git identity is not linked to a user
  author?: RawAccount | null;
  committer?: RawAccount | null;
}

/** Subset of GET /repos/{owner}/{repo} surfaced in run summaries */
export interface RepositoryInfo {
  fullName: string;
  description: string | null;
  htmlUrl: string | null;
  createdAt: string | null;
}

export function isRawCommit(value: unknown): value is RawCommit {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRepoRef(identifier: string): RepoRef | null {
  const m = identifier.trim().match(/^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/);
  if (!m) return null;
  return { owner: m[1], name: m[2] };
}

export function formatRepoRef(repo: RepoRef): string {
  return `${repo.owner}/${repo.name}`;
}
