import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';

/** Requires X-API-Key (or a bearer token) matching API_KEY in production */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);

  canActivate(context: ExecutionContext): boolean {
    if (process.env.NODE_ENV !== 'production') return true;

    const expected = process.env.API_KEY;
    if (!expected) {
      this.logger.error('API_KEY is not configured; rejecting request');
      throw new UnauthorizedException('API key authentication is not configured');
    }

    const provided = this.extractApiKey(context.switchToHttp().getRequest<FastifyRequest>());
    if (!provided) throw new UnauthorizedException('Missing API key');
    if (!sameKey(provided, expected)) throw new UnauthorizedException('Invalid API key');

    return true;
  }

  private extractApiKey(request: FastifyRequest): string | undefined {
    const first = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

    const apiKey = first(request.headers['x-api-key'])?.trim();
    if (apiKey) return apiKey;

    const auth = first(request.headers['authorization']);
    if (auth?.startsWith('Bearer ')) return auth.slice(7).trim() || undefined;

    return undefined;
  }
}

function sameKey(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}
