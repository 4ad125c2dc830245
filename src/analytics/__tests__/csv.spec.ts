import { renderHeatmap, renderHeatmapBlocks, renderRanking, renderStreak } from '../csv.js';
import { groupHeatmap } from '../heatmap.js';

describe('csv rendering', () => {
  it('quotes fields holding commas, quotes or newlines', async () => {
    const rows = [
      { rank: 1, label: 'plain', commitCount: 4 },
      { rank: 2, label: 'Doe, Jane', commitCount: 3 },
      { rank: 3, label: 'say "hi"', commitCount: 2 },
      { rank: 4, label: 'two\nlines', commitCount: 1 },
    ];

    await expect(renderRanking('author', rows)).resolves.toBe(
      'rank,author,commit_count\n1,plain,4\n2,"Doe, Jane",3\n3,"say ""hi""",2\n4,"two\nlines",1\n',
    );
  });

  it('renders rankings with a role-specific header', async () => {
    await expect(
      renderRanking('committer', [{ rank: 1, label: 'web-flow', commitCount: 7 }]),
    ).resolves.toBe('rank,committer,commit_count\n1,web-flow,7\n');
    await expect(renderRanking('committer', [])).resolves.toBe('rank,committer,commit_count\n');
  });

  it('renders the streak, or only the header when there is none', async () => {
    await expect(
      renderStreak({ label: 'B', streakStart: '2024-01-01', streakEnd: '2024-01-04', streakLength: 4 }),
    ).resolves.toBe('author,streak_start,streak_end,streak_length\nB,2024-01-01,2024-01-04,4\n');
    await expect(renderStreak(null)).resolves.toBe('author,streak_start,streak_end,streak_length\n');
  });

  it('renders sparse heatmap cells with day names', async () => {
    await expect(renderHeatmap([{ dayOfWeek: 0, hour: 3, commitCount: 1 }])).resolves.toBe(
      'day,hour,count\nSun,3,1\n',
    );
  });

  it('renders the block rollup Monday first', async () => {
    const csv = await renderHeatmapBlocks(groupHeatmap([{ dayOfWeek: 1, hour: 22, commitCount: 2 }]));
    const lines = csv.trimEnd().split('\n');

    expect(lines[0]).toBe('day,00-03,03-06,06-09,09-12,12-15,15-18,18-21,21-24');
    expect(lines[1]).toBe('Mon,0,0,0,0,0,0,0,2');
    expect(lines[7]).toBe('Sun,0,0,0,0,0,0,0,0');
    expect(lines).toHaveLength(8);
  });
});

describe('groupHeatmap', () => {
  it('sums hours into 3-hour blocks and fills empty blocks with zero', () => {
    const rows = groupHeatmap([
      { dayOfWeek: 0, hour: 0, commitCount: 1 },
      { dayOfWeek: 0, hour: 2, commitCount: 2 },
      { dayOfWeek: 0, hour: 3, commitCount: 4 },
      { dayOfWeek: 5, hour: 23, commitCount: 1 },
    ]);

    expect(rows.map((r) => r.day)).toEqual(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);
    expect(rows[6].blocks).toEqual([3, 4, 0, 0, 0, 0, 0, 0]);
    expect(rows[4].blocks).toEqual([0, 0, 0, 0, 0, 0, 0, 1]);
    expect(rows[0].blocks).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });
});
