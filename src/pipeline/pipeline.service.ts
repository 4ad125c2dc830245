import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';

import { AnalyticsReportService, type AnalyticsReport } from '../analytics/analytics-report.service.js';
import { PipelineStageError, type PipelineStage } from '../common/errors.js';
import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config.js';
import { TransformService } from '../normalized/transform.service.js';
import { CommitFetcher, sinceMonthsAgo } from '../raw/commit-fetcher.js';
import {
  formatRepoRef,
  parseRepoRef,
  type RateLimitInfo,
  type RepoRef,
  type RepositoryInfo,
} from '../raw/github-client-interface.js';
import { RateLimitedGithubClient } from '../raw/rate-limited-client.js';
import { CommitStoreLoader } from '../store/commit-store.loader.js';

/** What one run covers; never persisted */
export interface RunScope {
  repo: RepoRef;
  since: string;
  until?: string;
}

export interface RunRequest {
  repo?: string;
  monthsBack?: number;
}

export interface RunSummary {
  repo: string;
  repository: RepositoryInfo;
  since: string;
  until: string | null;
  fetched: number;
  skipped: number;
  identities: number;
  commitsLoaded: number;
  rateLimit: RateLimitInfo;
}

export interface PipelineResult {
  summary: RunSummary;
  report: AnalyticsReport | null;
}

const isoSeconds = (d: Date) => d.toISOString().replace(/\.\d{3}Z$/, 'Z');

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    @Inject(CommitFetcher) private readonly fetcher: Pick<CommitFetcher, 'getRepository' | 'collectCommits'>,
    @Inject(TransformService) private readonly transformer: Pick<TransformService, 'transform'>,
    @Inject(CommitStoreLoader) private readonly loader: Pick<CommitStoreLoader, 'load'>,
    @Inject(AnalyticsReportService)
    private readonly reports: Pick<AnalyticsReportService, 'buildReport'>,
    @Inject(RateLimitedGithubClient)
    private readonly client: Pick<RateLimitedGithubClient, 'getRateLimitInfo'>,
    @Inject(PIPELINE_CONFIG) private readonly config: Pick<PipelineConfig, 'repo' | 'monthsBack'>,
  ) {}

  /** Builds a run scope from request overrides and configured defaults */
  resolveScope(request: RunRequest = {}, now: Date = new Date()): RunScope {
    let repo = this.config.repo;
    if (request.repo !== undefined) {
      repo = parseRepoRef(request.repo);
      if (!repo) {
        throw new BadRequestException(
          `Invalid repository "${request.repo}", expected the format owner/repo_name`,
        );
      }
    }
    if (!repo) {
      throw new BadRequestException('No repository given and GITHUB_REPO is not set');
    }

    const months = request.monthsBack ?? this.config.monthsBack;
    if (!Number.isInteger(months) || months < 1) {
      throw new BadRequestException(`monthsBack must be a positive integer, got ${months}`);
    }

    return { repo, since: sinceMonthsAgo(months, now), until: isoSeconds(now) };
  }

  /** Extract → transform → load, then analyze unless told not to */
  async run(scope: RunScope, options: { analyze?: boolean } = {}): Promise<PipelineResult> {
    const repo = formatRepoRef(scope.repo);
    this.logger.log(`Starting pipeline for ${repo} since ${scope.since}`);

    const { repository, raw } = await this.stage('extract', async () => {
      const repository = await this.fetcher.getRepository(scope.repo);
      const raw = await this.fetcher.collectCommits(scope.repo, scope.since, scope.until);
      return { repository, raw };
    });
    const bundle = await this.stage('transform', async () => this.transformer.transform(raw));
    const commitsLoaded = await this.stage('load', () => this.loader.load(bundle));

    const report = options.analyze === false ? null : await this.analyze();

    this.logger.log(`Pipeline for ${repo} completed`);
    return {
      summary: {
        repo,
        repository,
        since: scope.since,
        until: scope.until ?? null,
        fetched: raw.length,
        skipped: bundle.skipped,
        identities: bundle.identities.length,
        commitsLoaded,
        rateLimit: this.client.getRateLimitInfo(),
      },
      report,
    };
  }

  /** Analysis over whatever the store currently holds */
  async analyze(): Promise<AnalyticsReport> {
    return this.stage('analyze', () => this.reports.buildReport());
  }

  private async stage<T>(name: PipelineStage, fn: () => Promise<T>): Promise<T> {
    const started = Date.now();
    try {
      const result = await fn();
      this.logger.log(`${name} stage finished in ${Date.now() - started}ms`);
      return result;
    } catch (error: unknown) {
      const failure = new PipelineStageError(name, error);
      this.logger.error(failure.message);
      throw failure;
    }
  }
}
