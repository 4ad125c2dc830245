import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  formatRepoRef,
  isRawCommit,
  type RawCommit,
  type RepoRef,
  type RepositoryInfo,
  type RequestParams,
} from './github-client-interface.js';
import { RateLimitedGithubClient } from './rate-limited-client.js';

export const PER_PAGE = 100;
const DAY_MS = 86_400_000;
const DAYS_PER_MONTH = 30;

/** ISO timestamp (no milliseconds) for `months` × 30 days before `now` */
export function sinceMonthsAgo(months: number, now: Date = new Date()): string {
  return new Date(now.getTime() - months * DAYS_PER_MONTH * DAY_MS)
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z');
}

@Injectable()
export class CommitFetcher {
  private readonly logger = new Logger(CommitFetcher.name);

  constructor(
    @Inject(RateLimitedGithubClient)
    private readonly client: Pick<RateLimitedGithubClient, 'get'>,
  ) {}

  async getRepository(repo: RepoRef): Promise<RepositoryInfo> {
    const data = await this.client.get(`/repos/${repo.owner}/${repo.name}`);
    if (typeof data !== 'object' || data === null) {
      throw new Error(`Unexpected payload for repository ${formatRepoRef(repo)}`);
    }
    const field = (key: string): string | null => {
      const value: unknown = Reflect.get(data, key);
      return typeof value === 'string' ? value : null;
    };
    return {
      fullName: field('full_name') ?? formatRepoRef(repo),
      description: field('description'),
      htmlUrl: field('html_url'),
      createdAt: field('created_at'),
    };
  }

  /**
   * Walks GET /repos/{owner}/{repo}/commits page by page, lazily.
   * Stops at the first empty page.
   */
  async *fetchCommits(repo: RepoRef, sinceIso: string, untilIso?: string): AsyncGenerator<RawCommit> {
    const route = `/repos/${repo.owner}/${repo.name}/commits`;

    for (let page = 1; ; page++) {
      const params: RequestParams = { since: sinceIso, per_page: PER_PAGE, page };
      if (untilIso) params.until = untilIso;

      const data = await this.client.get(route, params);
      if (!Array.isArray(data)) {
        throw new Error(`Unexpected payload for ${formatRepoRef(repo)} commits page ${page}: expected an array`);
      }
      if (data.length === 0) return;

      this.logger.debug(`Fetched page ${page} (${data.length} commits) for ${formatRepoRef(repo)}`);
      yield* data.filter(isRawCommit);
    }
  }

  async collectCommits(repo: RepoRef, sinceIso: string, untilIso?: string): Promise<RawCommit[]> {
    const out: RawCommit[] = [];
    for await (const commit of this.fetchCommits(repo, sinceIso, untilIso)) out.push(commit);
    this.logger.log(`Fetched ${out.length} commits for ${formatRepoRef(repo)} since ${sinceIso}`);
    return out;
  }
}
