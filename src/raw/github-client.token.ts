export const GITHUB_TRANSPORT = Symbol('GITHUB_TRANSPORT');
export const RATE_LIMIT_OPTIONS = Symbol('RATE_LIMIT_OPTIONS');
