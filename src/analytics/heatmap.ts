export interface HeatmapCell {
  /** 0 = Sunday */
  dayOfWeek: number;
  /** 0-23, UTC */
  hour: number;
  commitCount: number;
}

export interface HeatmapBlockRow {
  day: string;
  /** Eight 3-hour blocks, 00-03 through 21-24 */
  blocks: number[];
}

export const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const MONDAY_FIRST = [1, 2, 3, 4, 5, 6, 0];
const BLOCK_HOURS = 3;
const BLOCK_COUNT = 24 / BLOCK_HOURS;

const pad = (n: number) => String(n).padStart(2, '0');

export const BLOCK_LABELS: string[] = Array.from(
  { length: BLOCK_COUNT },
  (_, i) => `${pad(i * BLOCK_HOURS)}-${pad((i + 1) * BLOCK_HOURS)}`,
);

/** Rolls sparse cells up into a Monday-first 7 × 8 matrix with zero fill */
export function groupHeatmap(cells: HeatmapCell[]): HeatmapBlockRow[] {
  const matrix = DAY_NAMES.map(() => new Array<number>(BLOCK_COUNT).fill(0));
  for (const cell of cells) {
    const row = matrix[cell.dayOfWeek];
    if (!row || cell.hour < 0 || cell.hour > 23) continue;
    row[Math.floor(cell.hour / BLOCK_HOURS)] += cell.commitCount;
  }
  return MONDAY_FIRST.map((dow) => ({ day: DAY_NAMES[dow], blocks: matrix[dow] }));
}
