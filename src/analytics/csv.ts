import { promisify } from 'node:util';
import jsonexport from 'jsonexport';

import { BLOCK_LABELS, DAY_NAMES, type HeatmapBlockRow, type HeatmapCell } from './heatmap.js';
import type { RankedIdentity } from './analytics.service.js';
import type { AuthorStreak } from './streak.js';

type CsvRecord = Record<string, string | number>;

const json2csv = promisify<object | object[], jsonexport.UserOptionsWithHandlers, string>(jsonexport);

/**
 * Renders records under a fixed header. The header is written even when
 * there are no records; every file ends with a newline.
 */
export async function toCsv(headers: string[], records: CsvRecord[]): Promise<string> {
  const lines = [headers.join(',')];
  if (records.length > 0) {
    const body = await json2csv(records, {
      headers,
      includeHeaders: false,
      rowDelimiter: ',',
      endOfLine: '\n',
    });
    lines.push(body.replace(/\n$/, ''));
  }
  return lines.join('\n') + '\n';
}

export function renderRanking(role: 'author' | 'committer', rows: RankedIdentity[]): Promise<string> {
  return toCsv(
    ['rank', role, 'commit_count'],
    rows.map((r) => ({ rank: r.rank, [role]: r.label, commit_count: r.commitCount })),
  );
}

export function renderStreak(streak: AuthorStreak | null): Promise<string> {
  return toCsv(
    ['author', 'streak_start', 'streak_end', 'streak_length'],
    streak
      ? [
          {
            author: streak.label,
            streak_start: streak.streakStart,
            streak_end: streak.streakEnd,
            streak_length: streak.streakLength,
          },
        ]
      : [],
  );
}

export function renderHeatmap(cells: HeatmapCell[]): Promise<string> {
  return toCsv(
    ['day', 'hour', 'count'],
    cells.map((c) => ({ day: DAY_NAMES[c.dayOfWeek] ?? c.dayOfWeek, hour: c.hour, count: c.commitCount })),
  );
}

export function renderHeatmapBlocks(rows: HeatmapBlockRow[]): Promise<string> {
  return toCsv(
    ['day', ...BLOCK_LABELS],
    rows.map((r) => {
      const record: CsvRecord = { day: r.day };
      BLOCK_LABELS.forEach((label, i) => {
        record[label] = r.blocks[i] ?? 0;
      });
      return record;
    }),
  );
}
