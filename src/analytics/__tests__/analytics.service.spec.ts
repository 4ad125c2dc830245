import type { DataSource } from 'typeorm';
import { AnalysisError } from '../../common/errors.js';
import type { Commit, Identity } from '../../normalized/types.js';
import { createTestDataSource } from '../../__tests__/support/pglite-data-source.js';
import { CommitStoreLoader } from '../../store/commit-store.loader.js';
import { AnalyticsService } from '../analytics.service.js';

const identity = (stableKey: string): Identity => ({ stableKey, login: stableKey, name: null, email: null });

let seq = 0;
const commit = (authorKey: string, authoredAt: string, committerKey = authorKey): Commit => ({
  sha: `sha-${++seq}`,
  authorKey,
  committerKey,
  authoredAt,
  committedAt: authoredAt,
  message: null,
});

const repeat = (n: number, make: () => Commit): Commit[] => Array.from({ length: n }, make);

describe('AnalyticsService', () => {
  let ds: DataSource;
  let analytics: AnalyticsService;

  const load = (identities: Identity[], commits: Commit[]) =>
    new CommitStoreLoader(ds).load({ identities, commits, skipped: 0 });

  beforeEach(async () => {
    ds = await createTestDataSource();
    analytics = new AnalyticsService(ds);
  });

  afterEach(async () => {
    await ds.destroy();
  });

  it('ranks authors by count and breaks ties by insertion order', async () => {
    await load(
      [identity('alice'), identity('bob'), identity('carol')],
      [
        ...repeat(3, () => commit('carol', '2024-01-02T09:00:00Z')),
        ...repeat(5, () => commit('bob', '2024-01-02T09:00:00Z')),
        ...repeat(5, () => commit('alice', '2024-01-02T09:00:00Z')),
      ],
    );

    await expect(analytics.topAuthors(2)).resolves.toEqual([
      { rank: 1, label: 'alice', commitCount: 5 },
      { rank: 2, label: 'bob', commitCount: 5 },
    ]);
  });

  it('ranks committers separately from authors', async () => {
    await load(
      [identity('alice'), identity('web-flow')],
      [
        commit('alice', '2024-01-02T09:00:00Z', 'web-flow'),
        commit('alice', '2024-01-02T10:00:00Z', 'web-flow'),
        commit('alice', '2024-01-02T11:00:00Z'),
      ],
    );

    await expect(analytics.topCommitters()).resolves.toEqual([
      { rank: 1, label: 'web-flow', commitCount: 2 },
      { rank: 2, label: 'alice', commitCount: 1 },
    ]);
  });

  it('finds the longest streak of UTC calendar days', async () => {
    await load(
      [identity('A'), identity('B')],
      [
        commit('A', '2024-01-01T08:00:00Z'),
        commit('A', '2024-01-02T08:00:00Z'),
        commit('A', '2024-01-03T08:00:00Z'),
        commit('A', '2024-01-05T08:00:00Z'),
        commit('B', '2024-01-01T23:30:00Z'),
        commit('B', '2024-01-02T00:15:00Z'),
        commit('B', '2024-01-02T12:00:00Z'),
        // 22:00 on the 3rd in UTC-05:00 is the 4th in UTC
        commit('B', '2024-01-03T22:00:00-05:00'),
        commit('B', '2024-01-03T10:00:00Z'),
      ],
    );

    await expect(analytics.longestStreak()).resolves.toEqual({
      label: 'B',
      streakStart: '2024-01-01',
      streakEnd: '2024-01-04',
      streakLength: 4,
    });
  });

  it('has no streak for an empty store', async () => {
    await load([], []);
    await expect(analytics.longestStreak()).resolves.toBeNull();
  });

  it('returns only populated heatmap cells', async () => {
    // 2024-01-07 is a Sunday
    await load([identity('alice')], [commit('alice', '2024-01-07T03:20:00Z')]);

    await expect(analytics.heatmap()).resolves.toEqual([{ dayOfWeek: 0, hour: 3, commitCount: 1 }]);
  });

  it('raises AnalysisError when the store was never loaded', async () => {
    const failure = analytics.topAuthors();
    await expect(failure).rejects.toBeInstanceOf(AnalysisError);
    await expect(failure).rejects.toMatchObject({ query: 'topAuthors', code: 'ANALYSIS_ERROR' });
  });

  it('rejects a non-positive limit', async () => {
    await expect(analytics.topAuthors(0)).rejects.toThrow('limit must be a positive integer, got 0');
  });

  it('rejects a limit beyond the safe integer range', async () => {
    await expect(analytics.topCommitters(1e20)).rejects.toBeInstanceOf(RangeError);
  });
});
