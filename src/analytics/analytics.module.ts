import { Module } from '@nestjs/common';
import { AnalyticsService } from './analytics.service.js';
import { AnalyticsReportService } from './analytics-report.service.js';
import { AnalyticsController } from './analytics.controller.js';

@Module({
  controllers: [AnalyticsController],
  providers: [AnalyticsService, AnalyticsReportService],
  exports: [AnalyticsService, AnalyticsReportService],
})
export class AnalyticsModule {}
