// src/database/data-source.ts
import type { DataSourceOptions } from 'typeorm';
import { IdentityEntity } from '../store/identity.entity.js';
import { CommitEntity } from '../store/commit.entity.js';

export const STORE_ENTITIES = [IdentityEntity, CommitEntity];

export function dataSourceOptions(url: string | undefined): DataSourceOptions {
  return {
    type: 'postgres',
    url,
    entities: STORE_ENTITIES,
    synchronize: false,
    migrationsRun: false,
    logging: false,
  };
}
