import type { LeaderboardEntry, ParticipantStats, StatsWindow, Streak } from './stats';

export const SCORING_FOOTER = 'Score = 8 - guesses; X = 1; no attempt = 0';

const WINDOW_TITLES: Record<StatsWindow, string> = {
  weekly: 'Weekly',
  monthly: 'Monthly',
  alltime: 'All Time',
};

export function windowTitle(window: StatsWindow): string {
  return WINDOW_TITLES[window];
}

export function displayName(p: { id: string; username: string | null; displayName: string | null }): string {
  return p.displayName || p.username || p.id;
}

export function renderTextTable(headers: string[], rows: string[][], leftAligned: number[] = []): string {
  const widths = headers.map((h, j) => Math.max(h.length, ...rows.map((r) => (r[j] ?? '').length)));
  const pad = (v: string, j: number) => {
    const w = widths[j] ?? 0;
    return leftAligned.includes(j) ? v.padEnd(w) : v.padStart(w);
  };
  const lines = [
    headers.map(pad).join('  '),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...rows.map((row) => row.map(pad).join('  ')),
  ];
  return lines.map((l) => l.trimEnd()).join('\n');
}

export function renderLeaderboard(window: StatsWindow, entries: LeaderboardEntry[]): string {
  const title = `🏆 ${windowTitle(window)} Wordle Leaderboard`;
  if (entries.length === 0) {
    return `${title}\nNo data available for this period.`;
  }
  const headers = ['Rank', 'Name', 'Score', 'Games', 'Avg', 'Wins', 'Streak'];
  const rows = entries.map((e, i) => [
    String(i + 1),
    displayName(e.participant),
    String(e.totalScore),
    String(e.gamesPlayed),
    e.averageScore.toFixed(2),
    String(e.successfulGames),
    e.currentStreak > 0 ? `🔥${e.currentStreak}` : '-',
  ]);
  return `${title}\n\`\`\`\n${renderTextTable(headers, rows, [1])}\n\`\`\`\n${SCORING_FOOTER} • 🔥 = current streak`;
}

export function renderPersonalStats(
  window: StatsWindow,
  stats: ParticipantStats,
  streak: Streak,
  rank: number | null,
): string {
  if (stats.gamesPlayed === 0) {
    return `No games found for the ${windowTitle(window).toLowerCase()} period.`;
  }
  let streakText = `🔥 ${streak.currentStreak}`;
  if (streak.longestStreak > streak.currentStreak) streakText += ` (Best: ${streak.longestStreak})`;

  const lines = [
    `📊 Your ${windowTitle(window)} Statistics`,
    `Games Played: ${stats.gamesPlayed}`,
    `Total Score: ${stats.totalScore}`,
    `Average Score: ${stats.averageScore.toFixed(2)}`,
    `Success Rate: ${stats.successfulGames}/${stats.gamesPlayed}`,
    `Streak: ${streakText}`,
  ];
  if (rank !== null) lines.push(`Rank: #${rank}`);
  if (stats.firstGameDate && stats.lastGameDate) {
    lines.push(`First Game: ${stats.firstGameDate}`, `Last Game: ${stats.lastGameDate}`);
  }
  return lines.join('\n');
}

export function renderHelp(): string {
  return [
    '📖 Wordle Leaderboard Bot',
    '`/leaderboard [period] [limit]` - standings for weekly, monthly or alltime (default weekly)',
    '`/mystats [period]` - your own statistics (default alltime)',
    '`/post` - post the weekly leaderboard in this channel',
    '`/backfill [days]` - rescan recent results (Manage Server)',
    '`/alias set|list` - map a plain @name to a member (Manage Server)',
    '`/status` - show the auto-post schedule',
    SCORING_FOOTER,
  ].join('\n');
}

export type AutoPostStatus = {
  enabled: boolean;
  cron: string;
  timezone: string;
};

export function renderAutoPostStatus(status: AutoPostStatus): string {
  const lines = [`⏰ Weekly auto-post: ${status.enabled ? 'enabled' : 'disabled'}`];
  if (status.enabled) lines.push(`Schedule: \`${status.cron}\` (${status.timezone})`);
  lines.push('Run `/post` to post the weekly leaderboard now, or `/leaderboard` to view it.');
  return lines.join('\n');
}
