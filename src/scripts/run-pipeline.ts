import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module.js';
import { AnalyticsReportService } from '../analytics/analytics-report.service.js';
import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config.js';
import { PipelineService } from '../pipeline/pipeline.service.js';

const logger = new Logger('RunPipeline');

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const config = app.get<PipelineConfig>(PIPELINE_CONFIG);
    const pipeline = app.get(PipelineService);

    const scope = pipeline.resolveScope();
    const { summary, report } = await pipeline.run(scope, { analyze: config.runAnalysis });
    logger.log(
      `Loaded ${summary.commitsLoaded} of ${summary.fetched} fetched commits for ${summary.repo}`,
    );

    if (report) {
      await app.get(AnalyticsReportService).writeReport(report, config.outputDir);
    }
  } finally {
    await app.close();
  }
}

main().catch((e: unknown) => {
  logger.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
