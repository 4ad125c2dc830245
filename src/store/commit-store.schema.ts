import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * DDL for the commit store. Applied from scratch on every load, so `down`
 * then `up` leaves an empty store for exactly one run.
 */
export class CommitStoreSchema implements MigrationInterface {
  name = 'CommitStoreSchema';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE TABLE identities (
      id          SERIAL PRIMARY KEY,
      stable_key  TEXT NOT NULL UNIQUE,
      login       TEXT,
      name        TEXT,
      email       TEXT
    )`);

    await queryRunner.query(`CREATE TABLE commits (
      id            SERIAL PRIMARY KEY,
      sha           TEXT NOT NULL UNIQUE,
      author_id     INTEGER NOT NULL REFERENCES identities (id),
      committer_id  INTEGER NOT NULL REFERENCES identities (id),
      authored_at   TIMESTAMPTZ NOT NULL,
      committed_at  TIMESTAMPTZ NOT NULL,
      message       TEXT
    )`);

    await queryRunner.query('CREATE INDEX ix_commits_author ON commits (author_id)');
    await queryRunner.query('CREATE INDEX ix_commits_committer ON commits (committer_id)');
    await queryRunner.query('CREATE INDEX ix_commits_authored_at ON commits (authored_at)');
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE IF EXISTS commits');
    await queryRunner.query('DROP TABLE IF EXISTS identities');
  }
}
