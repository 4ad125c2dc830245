import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { RequestError } from '@octokit/request-error';

import { HttpError, RateLimitExceededError } from '../common/errors.js';
import type {
  GithubResponse,
  GithubTransport,
  RateLimitInfo,
  RequestParams,
} from './github-client-interface.js';
import { GITHUB_TRANSPORT, RATE_LIMIT_OPTIONS } from './github-client.token.js';

export interface RateLimitOptions {
  /** Rate-limit retries allowed per request before giving up */
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

type Headers = GithubResponse['headers'];

const DEFAULT_MAX_RETRIES = 3;
const RESET_MARGIN_MS = 1000;
const UNKNOWN_RESET_WAIT_MS = 60_000;
const RATE_LIMIT_RE = /rate limit|abuse/i;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * GET access to the GitHub API that honours the rate-limit window:
 * waits before a request when the quota is known to be spent, and
 * suspends and retries when the API answers with a rate-limit error.
 */
@Injectable()
export class RateLimitedGithubClient {
  private readonly logger = new Logger(RateLimitedGithubClient.name);
  private readonly maxRetries: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private window: RateLimitInfo = { limit: null, remaining: null, reset: null };

  constructor(
    @Inject(GITHUB_TRANSPORT) private readonly transport: GithubTransport,
    @Optional() @Inject(RATE_LIMIT_OPTIONS) options?: RateLimitOptions,
  ) {
    this.maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.sleep = options?.sleep ?? defaultSleep;
    this.now = options?.now ?? Date.now;
  }

  getRateLimitInfo(): RateLimitInfo {
    return { ...this.window };
  }

  async get(route: string, params: RequestParams = {}): Promise<unknown> {
    let attempts = 0;

    for (;;) {
      await this.waitForQuota();
      try {
        const res = await this.transport.request(`GET ${route}`, params);
        this.updateWindow(res.headers);
        return res.data;
      } catch (error: unknown) {
        if (!this.isRequestError(error)) throw error;
        // Octokit reports a failed fetch as a 500 with no response
        if (error.response === undefined) throw error;

        const headers = error.response.headers;
        this.updateWindow(headers);

        if (!this.isRateLimited(error)) {
          throw new HttpError(error.status, error.response.data ?? error.message, route);
        }

        attempts++;
        if (attempts > this.maxRetries) {
          throw new RateLimitExceededError(attempts, this.resetAt());
        }

        const delay = this.retryDelay(headers);
        this.logger.warn(
          `Rate limited on ${route} (attempt ${attempts}/${this.maxRetries}), waiting ${Math.ceil(delay / 1000)}s`,
        );
        await this.sleep(delay);
        this.window.remaining = null;
      }
    }
  }

  private isRequestError(error: unknown): error is RequestError {
    return error instanceof RequestError;
  }

  private isRateLimited(error: RequestError): boolean {
    if (error.status === 429) return true;
    if (error.status !== 403) return false;
    if (this.window.remaining === 0) return true;
    const data = error.response?.data;
    const bodyMessage =
      data && typeof data === 'object' && 'message' in data && typeof data.message === 'string'
        ? data.message
        : '';
    return RATE_LIMIT_RE.test(error.message) || RATE_LIMIT_RE.test(bodyMessage);
  }

  private async waitForQuota(): Promise<void> {
    if (this.window.remaining !== 0) return;
    const delay = this.untilReset() ?? UNKNOWN_RESET_WAIT_MS;
    this.logger.log(`Quota exhausted, sleeping ${Math.ceil(delay / 1000)}s until the window resets`);
    await this.sleep(delay);
    this.window.remaining = null;
  }

  private retryDelay(headers: Headers): number {
    const retryAfter = toNumber(headers['retry-after']);
    if (retryAfter !== null) return retryAfter * 1000;
    return this.untilReset() ?? UNKNOWN_RESET_WAIT_MS;
  }

  /** Milliseconds until the window resets plus a margin; null when unknown */
  private untilReset(): number | null {
    if (this.window.reset === null) return null;
    return Math.max(this.window.reset * 1000 - this.now(), 0) + RESET_MARGIN_MS;
  }

  private resetAt(): Date | null {
    return this.window.reset === null ? null : new Date(this.window.reset * 1000);
  }

  private updateWindow(headers: Headers): void {
    const limit = toNumber(headers['x-ratelimit-limit']);
    const remaining = toNumber(headers['x-ratelimit-remaining']);
    const reset = toNumber(headers['x-ratelimit-reset']);
    if (limit !== null) this.window.limit = limit;
    if (remaining !== null) this.window.remaining = remaining;
    if (reset !== null) this.window.reset = reset;
  }
}

function toNumber(value: string | number | undefined): number | null {
  if (value === undefined || value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}
