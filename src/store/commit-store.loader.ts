import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';

import { LoadError } from '../common/errors.js';
import type { Commit, Identity, NormalizedBundle, StableKey } from '../normalized/types.js';
import { CommitEntity } from './commit.entity.js';
import { CommitStoreSchema } from './commit-store.schema.js';
import { IdentityEntity } from './identity.entity.js';

// Keeps each multi-row insert well under the 65535 bind parameter limit
const CHUNK_SIZE = 1000;

type IdentityIdRow = { id: number; stable_key: string };

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

@Injectable()
export class CommitStoreLoader {
  private readonly logger = new Logger(CommitStoreLoader.name);
  private readonly schema = new CommitStoreSchema();

  constructor(@InjectDataSource() private readonly ds: DataSource) {}

  /**
   * Recreates the store and writes the bundle in one transaction.
   * Returns the number of commit rows inserted.
   */
  async load(bundle: NormalizedBundle): Promise<number> {
    const queryRunner = this.ds.createQueryRunner();

    try {
      await queryRunner.connect();
      await queryRunner.startTransaction();

      await this.schema.down(queryRunner);
      await this.schema.up(queryRunner);

      const ids = await this.insertIdentities(queryRunner.manager, bundle.identities);
      const inserted = await this.insertCommits(queryRunner.manager, bundle.commits, ids);

      await queryRunner.commitTransaction();
      this.logger.log(`Loaded ${ids.size} identities and ${inserted} commits`);
      return inserted;
    } catch (error: unknown) {
      if (queryRunner.isTransactionActive) await queryRunner.rollbackTransaction();
      throw new LoadError(error);
    } finally {
      await queryRunner.release();
    }
  }

  private async insertIdentities(
    manager: EntityManager,
    identities: Identity[],
  ): Promise<Map<StableKey, number>> {
    const ids = new Map<StableKey, number>();

    for (const batch of chunk(identities, CHUNK_SIZE)) {
      const result = await manager
        .createQueryBuilder()
        .insert()
        .into(IdentityEntity)
        .values(
          batch.map((i) => ({
            stableKey: i.stableKey,
            login: i.login,
            name: i.name,
            email: i.email,
          })),
        )
        .returning('id, stable_key')
        .updateEntity(false)
        .execute();

      const rows: IdentityIdRow[] = result.raw;
      for (const row of rows) ids.set(row.stable_key, Number(row.id));
    }

    return ids;
  }

  private async insertCommits(
    manager: EntityManager,
    commits: Commit[],
    ids: Map<StableKey, number>,
  ): Promise<number> {
    const seen = new Set<string>();
    const unique: Commit[] = [];
    for (const c of commits) {
      if (seen.has(c.sha)) continue;
      seen.add(c.sha);
      unique.push(c);
    }

    const resolve = (key: StableKey, sha: string): number => {
      const id = ids.get(key);
      if (id === undefined) throw new Error(`Commit ${sha} references unknown identity "${key}"`);
      return id;
    };

    let inserted = 0;
    for (const batch of chunk(unique, CHUNK_SIZE)) {
      const result = await manager
        .createQueryBuilder()
        .insert()
        .into(CommitEntity)
        .values(
          batch.map((c) => ({
            sha: c.sha,
            authorId: resolve(c.authorKey, c.sha),
            committerId: resolve(c.committerKey, c.sha),
            authoredAt: new Date(c.authoredAt),
            committedAt: new Date(c.committedAt),
            message: c.message,
          })),
        )
        .orIgnore()
        .returning('id')
        .updateEntity(false)
        .execute();

      const rows: unknown[] = result.raw;
      inserted += rows.length;
    }

    if (commits.length !== inserted) {
      this.logger.debug(`Dropped ${commits.length - inserted} duplicate commits`);
    }
    return inserted;
  }
}
