import { Module } from '@nestjs/common';
import { GITHUB_TRANSPORT } from './github-client.token.js';
import { OctokitTransport } from './octokit-transport.js';
import { RateLimitedGithubClient } from './rate-limited-client.js';
import { CommitFetcher } from './commit-fetcher.js';

@Module({
  providers: [
    { provide: GITHUB_TRANSPORT, useClass: OctokitTransport },
    RateLimitedGithubClient,
    CommitFetcher,
  ],
  exports: [RateLimitedGithubClient, CommitFetcher],
})
export class RawModule {}
