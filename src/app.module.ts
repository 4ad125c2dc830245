// src/app.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { APP_GUARD } from '@nestjs/core';

import { dataSourceOptions } from './database/data-source.js';
import { AppController } from './app.controller.js';
import { PipelineConfigModule } from './config/config.module.js';
import { PIPELINE_CONFIG, type PipelineConfig } from './config/pipeline.config.js';
import { RawModule } from './raw/raw.module.js';
import { NormalizedModule } from './normalized/normalized.module.js';
import { StoreModule } from './store/store.module.js';
import { AnalyticsModule } from './analytics/analytics.module.js';
import { PipelineModule } from './pipeline/pipeline.module.js';
import { ApiKeyGuard } from './auth/api-key.guard.js';

@Module({
  imports: [
    PipelineConfigModule,
    TypeOrmModule.forRootAsync({
      imports: [PipelineConfigModule],
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) => ({
        ...dataSourceOptions(config.storeTarget),
        autoLoadEntities: true,
      }),
    }),
    RawModule,
    NormalizedModule,
    StoreModule,
    AnalyticsModule,
    PipelineModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
  ],
})
export class AppModule {}
