import { Inject, Injectable } from '@nestjs/common';
import { Octokit } from '@octokit/rest';

import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config.js';
import type { GithubResponse, GithubTransport, RequestParams } from './github-client-interface.js';

@Injectable()
export class OctokitTransport implements GithubTransport {
  private readonly octokit: Octokit;

  constructor(@Inject(PIPELINE_CONFIG) config: Pick<PipelineConfig, 'accessToken'>) {
    this.octokit = new Octokit({
      auth: config.accessToken ?? undefined,
      userAgent: 'commit-insights/1.0',
      request: { headers: { accept: 'application/vnd.github+json' } },
    });
  }

  async request(route: string, params: RequestParams): Promise<GithubResponse> {
    const { status, headers, data } = await this.octokit.request(route, params);
    return { status, headers, data };
  }
}
