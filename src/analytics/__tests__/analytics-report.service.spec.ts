import { jest } from '@jest/globals';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AnalyticsReportService, REPORT_FILES } from '../analytics-report.service.js';
import type { AnalyticsService } from '../analytics.service.js';

const analyticsStub = () => ({
  topAuthors: jest.fn<AnalyticsService['topAuthors']>().mockResolvedValue([
    { rank: 1, label: 'alice', commitCount: 3 },
  ]),
  topCommitters: jest.fn<AnalyticsService['topCommitters']>().mockResolvedValue([
    { rank: 1, label: 'web-flow', commitCount: 3 },
  ]),
  longestStreak: jest.fn<AnalyticsService['longestStreak']>().mockResolvedValue({
    label: 'alice',
    streakStart: '2024-01-01',
    streakEnd: '2024-01-02',
    streakLength: 2,
  }),
  heatmap: jest.fn<AnalyticsService['heatmap']>().mockResolvedValue([
    { dayOfWeek: 1, hour: 10, commitCount: 3 },
  ]),
});

describe('AnalyticsReportService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'commit-insights-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs every analysis and rolls the heatmap into blocks', async () => {
    const analytics = analyticsStub();
    const service = new AnalyticsReportService(analytics);

    const report = await service.buildReport(3);

    expect(analytics.topAuthors).toHaveBeenCalledWith(3);
    expect(analytics.topCommitters).toHaveBeenCalledWith(3);
    expect(report.heatmapBlocks[0]).toEqual({ day: 'Mon', blocks: [0, 0, 0, 3, 0, 0, 0, 0] });
  });

  it('writes one CSV per analysis', async () => {
    const service = new AnalyticsReportService(analyticsStub());
    const report = await service.buildReport();
    const target = path.join(dir, 'nested');

    const written = await service.writeReport(report, target);

    expect(written).toHaveLength(5);
    expect((await readdir(target)).sort()).toEqual(Object.values(REPORT_FILES).sort());
    await expect(readFile(path.join(target, REPORT_FILES.longestStreak), 'utf8')).resolves.toBe(
      'author,streak_start,streak_end,streak_length\nalice,2024-01-01,2024-01-02,2\n',
    );
    await expect(readFile(path.join(target, REPORT_FILES.heatmap), 'utf8')).resolves.toBe(
      'day,hour,count\nMon,10,3\n',
    );
  });
});
