import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { AnalyticsService, DEFAULT_TOP_LIMIT, type RankedIdentity } from './analytics.service.js';
import { groupHeatmap, type HeatmapBlockRow, type HeatmapCell } from './heatmap.js';
import type { AuthorStreak } from './streak.js';
import { renderHeatmap, renderHeatmapBlocks, renderRanking, renderStreak } from './csv.js';

export interface AnalyticsReport {
  topAuthors: RankedIdentity[];
  topCommitters: RankedIdentity[];
  longestStreak: AuthorStreak | null;
  heatmap: HeatmapCell[];
  heatmapBlocks: HeatmapBlockRow[];
}

export const REPORT_FILES = {
  topAuthors: 'top_authors.csv',
  topCommitters: 'top_committers.csv',
  longestStreak: 'longest_author_streak.csv',
  heatmap: 'commit_heatmap.csv',
  heatmapBlocks: 'commit_heatmap_blocks.csv',
} as const;

@Injectable()
export class AnalyticsReportService {
  private readonly logger = new Logger(AnalyticsReportService.name);

  constructor(
    @Inject(AnalyticsService)
    private readonly analytics: Pick<
      AnalyticsService,
      'topAuthors' | 'topCommitters' | 'longestStreak' | 'heatmap'
    >,
  ) {}

  async buildReport(limit = DEFAULT_TOP_LIMIT): Promise<AnalyticsReport> {
    this.logger.log('Running all analyses');
    const topAuthors = await this.analytics.topAuthors(limit);
    const topCommitters = await this.analytics.topCommitters(limit);
    const longestStreak = await this.analytics.longestStreak();
    const heatmap = await this.analytics.heatmap();

    return {
      topAuthors,
      topCommitters,
      longestStreak,
      heatmap,
      heatmapBlocks: groupHeatmap(heatmap),
    };
  }

  /** File name → CSV content */
  async renderReport(report: AnalyticsReport): Promise<Record<string, string>> {
    return {
      [REPORT_FILES.topAuthors]: await renderRanking('author', report.topAuthors),
      [REPORT_FILES.topCommitters]: await renderRanking('committer', report.topCommitters),
      [REPORT_FILES.longestStreak]: await renderStreak(report.longestStreak),
      [REPORT_FILES.heatmap]: await renderHeatmap(report.heatmap),
      [REPORT_FILES.heatmapBlocks]: await renderHeatmapBlocks(report.heatmapBlocks),
    };
  }

  async writeReport(report: AnalyticsReport, outputDir: string): Promise<string[]> {
    await mkdir(outputDir, { recursive: true });
    const files = await this.renderReport(report);
    const written: string[] = [];
    for (const [file, content] of Object.entries(files)) {
      const target = path.join(outputDir, file);
      await writeFile(target, content, 'utf8');
      this.logger.log(`Saved ${target}`);
      written.push(target);
    }
    return written;
  }
}
