import { BadRequestException, Controller, Get, Inject, Query } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiSecurity, ApiTags } from '@nestjs/swagger';

import { toHttpException } from '../common/http-errors.js';
import { AnalyticsReportService, type AnalyticsReport } from './analytics-report.service.js';
import { AnalyticsService, DEFAULT_TOP_LIMIT, type RankedIdentity } from './analytics.service.js';
import type { HeatmapCell } from './heatmap.js';
import type { AuthorStreak } from './streak.js';

function parseLimit(raw?: string): number {
  if (raw === undefined || raw === '') return DEFAULT_TOP_LIMIT;
  const limit = Number(raw);
  if (!Number.isSafeInteger(limit) || limit < 1) {
    throw new BadRequestException(`limit must be a positive integer, got "${raw}"`);
  }
  return limit;
}

async function mapped<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    throw toHttpException(error);
  }
}

@ApiTags('analytics')
@ApiSecurity('X-API-Key')
@Controller('analytics')
export class AnalyticsController {
  constructor(
    @Inject(AnalyticsService)
    private readonly analytics: Pick<
      AnalyticsService,
      'topAuthors' | 'topCommitters' | 'longestStreak' | 'heatmap'
    >,
    @Inject(AnalyticsReportService)
    private readonly reports: Pick<AnalyticsReportService, 'buildReport'>,
  ) {}

  @Get('top-authors')
  @ApiOperation({ summary: 'Identities ranked by authored commits' })
  @ApiQuery({ name: 'limit', required: false, type: Number })
  topAuthors(@Query('limit') limit?: string): Promise<RankedIdentity[]> {
    const n = parseLimit(limit);
    return mapped(() => this.analytics.topAuthors(n));
  }

  @Get('top-committers')
  @ApiOperation({ summary: 'Identities ranked by committed commits' })
  @ApiQuery({ name: 'limit', required: false, type: Number })
  topCommitters(@Query('limit') limit?: string): Promise<RankedIdentity[]> {
    const n = parseLimit(limit);
    return mapped(() => this.analytics.topCommitters(n));
  }

  @Get('streak')
  @ApiOperation({ summary: 'Author with the longest run of consecutive active UTC days' })
  longestStreak(): Promise<AuthorStreak | null> {
    return mapped(() => this.analytics.longestStreak());
  }

  @Get('heatmap')
  @ApiOperation({ summary: 'Commit counts by UTC day of week (0 = Sunday) and hour' })
  heatmap(): Promise<HeatmapCell[]> {
    return mapped(() => this.analytics.heatmap());
  }

  @Get('report')
  @ApiOperation({ summary: 'All analyses in one response' })
  report(): Promise<AnalyticsReport> {
    return mapped(() => this.reports.buildReport());
  }
}
