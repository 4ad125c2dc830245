import { Global, Logger, Module } from '@nestjs/common';
import { PIPELINE_CONFIG, describeConfig, loadPipelineConfig } from './pipeline.config.js';

@Global()
@Module({
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: () => {
        const config = loadPipelineConfig();
        const logger = new Logger('PipelineConfig');
        logger.log(`Configuration: ${JSON.stringify(describeConfig(config))}`);
        if (!config.accessToken) {
          logger.warn('No GitHub token provided. API rate limits will be restrictive.');
        }
        return config;
      },
    },
  ],
  exports: [PIPELINE_CONFIG],
})
export class PipelineConfigModule {}
