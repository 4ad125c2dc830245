/** One (author, UTC calendar day) pair with at least one authored commit */
export interface ActiveDay {
  authorId: number;
  label: string;
  /** YYYY-MM-DD */
  day: string;
}

export interface AuthorStreak {
  label: string;
  streakStart: string;
  streakEnd: string;
  streakLength: number;
}

const DAY_MS = 86_400_000;

export function dayNumber(day: string): number {
  const ms = Date.parse(`${day}T00:00:00Z`);
  if (Number.isNaN(ms)) throw new RangeError(`Invalid calendar day "${day}"`);
  return Math.round(ms / DAY_MS);
}

type Candidate = AuthorStreak & { authorId: number; startNumber: number };

function isBetter(a: Candidate, b: Candidate | null): boolean {
  if (!b) return true;
  if (a.streakLength !== b.streakLength) return a.streakLength > b.streakLength;
  if (a.startNumber !== b.startNumber) return a.startNumber < b.startNumber;
  return a.authorId < b.authorId;
}

/**
 * Longest run of consecutive active days for any author. Within an author,
 * days of one run share `dayNumber - rank`. Ties go to the earlier start,
 * then to the lower author id. Null when there are no active days.
 */
export function longestStreak(days: ActiveDay[]): AuthorStreak | null {
  const byAuthor = new Map<number, { label: string; numbers: Map<number, string> }>();
  for (const d of days) {
    let entry = byAuthor.get(d.authorId);
    if (!entry) {
      entry = { label: d.label, numbers: new Map() };
      byAuthor.set(d.authorId, entry);
    }
    entry.numbers.set(dayNumber(d.day), d.day);
  }

  let best: Candidate | null = null;

  for (const [authorId, { label, numbers }] of byAuthor) {
    const sorted = [...numbers.keys()].sort((a, b) => a - b);
    const groups = new Map<number, { start: number; end: number; length: number }>();

    sorted.forEach((n, index) => {
      const key = n - (index + 1);
      const group = groups.get(key);
      if (group) {
        group.end = n;
        group.length++;
      } else {
        groups.set(key, { start: n, end: n, length: 1 });
      }
    });

    for (const g of groups.values()) {
      const candidate: Candidate = {
        authorId,
        label,
        startNumber: g.start,
        streakStart: numbers.get(g.start) ?? '',
        streakEnd: numbers.get(g.end) ?? '',
        streakLength: g.length,
      };
      if (isBetter(candidate, best)) best = candidate;
    }
  }

  if (!best) return null;
  const { label, streakStart, streakEnd, streakLength } = best;
  return { label, streakStart, streakEnd, streakLength };
}
