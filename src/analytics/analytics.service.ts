import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';

import { AnalysisError } from '../common/errors.js';
import type { HeatmapCell } from './heatmap.js';
import { longestStreak, type ActiveDay, type AuthorStreak } from './streak.js';

export const DEFAULT_TOP_LIMIT = 5;

export interface RankedIdentity {
  rank: number;
  label: string;
  commitCount: number;
}

type CountRow = { label: string; commit_count: number | string };
type ActiveDayRow = { author_id: number | string; label: string; day: string };
type HeatmapRow = { day_of_week: number | string; hour: number | string; commit_count: number | string };

// label: the identity's stable key
const TOP_BY_ROLE_SQL = (column: 'author_id' | 'committer_id') => `
  SELECT i.stable_key AS label, COUNT(*)::int AS commit_count
  FROM commits c
  JOIN identities i ON i.id = c.${column}
  GROUP BY i.id, i.stable_key
  ORDER BY commit_count DESC, i.id ASC
  LIMIT $1
`;

const ACTIVE_DAYS_SQL = `
  SELECT DISTINCT
    c.author_id AS author_id,
    i.stable_key AS label,
    to_char(c.authored_at AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day
  FROM commits c
  JOIN identities i ON i.id = c.author_id
  ORDER BY author_id, day
`;

const HEATMAP_SQL = `
  SELECT
    EXTRACT(DOW FROM c.authored_at AT TIME ZONE 'UTC')::int AS day_of_week,
    EXTRACT(HOUR FROM c.authored_at AT TIME ZONE 'UTC')::int AS hour,
    COUNT(*)::int AS commit_count
  FROM commits c
  GROUP BY 1, 2
  ORDER BY 1, 2
`;

/** Read-only questions over the loaded commit store */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(@InjectDataSource() private readonly ds: DataSource) {}

  async topAuthors(limit = DEFAULT_TOP_LIMIT): Promise<RankedIdentity[]> {
    return this.topByRole('topAuthors', 'author_id', limit);
  }

  async topCommitters(limit = DEFAULT_TOP_LIMIT): Promise<RankedIdentity[]> {
    return this.topByRole('topCommitters', 'committer_id', limit);
  }

  async longestStreak(): Promise<AuthorStreak | null> {
    const rows = await this.run<ActiveDayRow>('longestStreak', ACTIVE_DAYS_SQL);
    const days: ActiveDay[] = rows.map((r) => ({
      authorId: Number(r.author_id),
      label: r.label,
      day: r.day,
    }));
    const streak = longestStreak(days);
    if (!streak) this.logger.warn('No commit data found for streak analysis');
    return streak;
  }

  async heatmap(): Promise<HeatmapCell[]> {
    const rows = await this.run<HeatmapRow>('heatmap', HEATMAP_SQL);
    return rows.map((r) => ({
      dayOfWeek: Number(r.day_of_week),
      hour: Number(r.hour),
      commitCount: Number(r.commit_count),
    }));
  }

  private async topByRole(
    query: string,
    column: 'author_id' | 'committer_id',
    limit: number,
  ): Promise<RankedIdentity[]> {
    if (!Number.isSafeInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    const rows = await this.run<CountRow>(query, TOP_BY_ROLE_SQL(column), [limit]);
    return rows.map((r, i) => ({
      rank: i + 1,
      label: r.label,
      commitCount: Number(r.commit_count),
    }));
  }

  private async run<T>(query: string, sql: string, params: unknown[] = []): Promise<T[]> {
    try {
      return await this.ds.query(sql, params);
    } catch (error: unknown) {
      throw new AnalysisError(query, error);
    }
  }
}
