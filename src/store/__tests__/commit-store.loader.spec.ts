import type { DataSource } from 'typeorm';
import { LoadError } from '../../common/errors.js';
import type { Commit, Identity, NormalizedBundle } from '../../normalized/types.js';
import { createTestDataSource } from '../../__tests__/support/pglite-data-source.js';
import { CommitStoreLoader } from '../commit-store.loader.js';

const identity = (stableKey: string): Identity => ({
  stableKey,
  login: stableKey,
  name: null,
  email: null,
});

const commit = (sha: string, authorKey: string, message = `msg ${sha}`): Commit => ({
  sha,
  authorKey,
  committerKey: authorKey,
  authoredAt: '2024-01-01T10:00:00Z',
  committedAt: '2024-01-01T10:05:00Z',
  message,
});

const bundle = (identities: Identity[], commits: Commit[]): NormalizedBundle => ({
  identities,
  commits,
  skipped: 0,
});

describe('CommitStoreLoader', () => {
  let ds: DataSource;
  let loader: CommitStoreLoader;

  beforeEach(async () => {
    ds = await createTestDataSource();
    loader = new CommitStoreLoader(ds);
  });

  afterEach(async () => {
    await ds.destroy();
  });

  const count = async (table: 'commits' | 'identities'): Promise<number> => {
    const rows: Array<{ n: number }> = await ds.query(`SELECT COUNT(*)::int AS n FROM ${table}`);
    return rows[0].n;
  };

  it('stores each sha once and keeps the first occurrence', async () => {
    const inserted = await loader.load(
      bundle(
        [identity('alice'), identity('bob')],
        [commit('s1', 'alice', 'first'), commit('s2', 'bob'), commit('s1', 'bob', 'second')],
      ),
    );

    expect(inserted).toBe(2);
    const rows: Array<{ sha: string; message: string; author: string }> = await ds.query(
      `SELECT c.sha, c.message, i.stable_key AS author
       FROM commits c JOIN identities i ON i.id = c.author_id
       ORDER BY c.id`,
    );
    expect(rows).toEqual([
      { sha: 's1', message: 'first', author: 'alice' },
      { sha: 's2', message: 'msg s2', author: 'bob' },
    ]);
  });

  it('assigns identity ids in bundle order', async () => {
    await loader.load(bundle([identity('zed'), identity('amy')], []));

    const rows: Array<{ id: number; stable_key: string }> = await ds.query(
      'SELECT id, stable_key FROM identities ORDER BY id',
    );
    expect(rows).toEqual([
      { id: 1, stable_key: 'zed' },
      { id: 2, stable_key: 'amy' },
    ]);
  });

  it('recreates the store on every load', async () => {
    await loader.load(bundle([identity('alice')], [commit('s1', 'alice'), commit('s2', 'alice')]));
    await loader.load(bundle([identity('bob')], [commit('s9', 'bob')]));

    expect(await count('commits')).toBe(1);
    expect(await count('identities')).toBe(1);
  });

  it('rolls back and raises LoadError when a commit cannot be resolved', async () => {
    await loader.load(bundle([identity('alice')], [commit('s1', 'alice')]));

    const failure = loader.load(bundle([identity('bob')], [commit('s2', 'ghost')]));
    await expect(failure).rejects.toBeInstanceOf(LoadError);
    await expect(failure).rejects.toThrow(
      'Loading commits into the store failed: Commit s2 references unknown identity "ghost"',
    );

    expect(await count('commits')).toBe(1);
  });
});
