import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { IdentityEntity } from './identity.entity.js';
import { CommitEntity } from './commit.entity.js';
import { CommitStoreLoader } from './commit-store.loader.js';

@Module({
  imports: [TypeOrmModule.forFeature([IdentityEntity, CommitEntity])],
  providers: [CommitStoreLoader],
  exports: [CommitStoreLoader],
})
export class StoreModule {}
