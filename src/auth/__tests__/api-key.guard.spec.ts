import { UnauthorizedException, type ExecutionContext } from '@nestjs/common';
import { ApiKeyGuard } from '../api-key.guard.js';

const contextWith = (headers: Record<string, string>) =>
  ({
    switchToHttp: () => ({ getRequest: () => ({ headers }) }),
  }) as unknown as ExecutionContext;

describe('ApiKeyGuard', () => {
  const saved = { NODE_ENV: process.env.NODE_ENV, API_KEY: process.env.API_KEY };
  const guard = new ApiKeyGuard();

  afterEach(() => {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('lets everything through outside production', () => {
    process.env.NODE_ENV = 'development';
    expect(guard.canActivate(contextWith({}))).toBe(true);
  });

  describe('in production', () => {
    beforeEach(() => {
      process.env.NODE_ENV = 'production';
      process.env.API_KEY = 'test-secret';
    });

    it('accepts the X-API-Key header', () => {
      expect(guard.canActivate(contextWith({ 'x-api-key': 'test-secret' }))).toBe(true);
    });

    it('accepts a bearer token', () => {
      expect(guard.canActivate(contextWith({ authorization: 'Bearer test-secret' }))).toBe(true);
    });

    it('rejects a missing key', () => {
      expect(() => guard.canActivate(contextWith({}))).toThrow('Missing API key');
    });

    it('rejects a wrong key', () => {
      expect(() => guard.canActivate(contextWith({ 'x-api-key': 'other' }))).toThrow(UnauthorizedException);
    });
  });
});
