import dayjs from 'dayjs';
import { aggregateLeaderboard, aggregateParticipant, playDates, type Db } from './db';
import { wrapStorage } from './errors';
import { daysBetween } from './rounds';

export const WINDOWS = ['weekly', 'monthly', 'alltime'] as const;
export type StatsWindow = typeof WINDOWS[number];

/** Earlier than any Wordle round. */
export const ALLTIME_START = '2020-01-01';

export type DateRange = { from: string; to: string };

export type ParticipantStats = {
  gamesPlayed: number;
  totalScore: number;
  averageScore: number;
  successfulGames: number;
  firstGameDate: string | null;
  lastGameDate: string | null;
};

export type Streak = {
  currentStreak: number;
  longestStreak: number;
};

export type LeaderboardEntry = Streak & {
  participant: { id: string; username: string | null; displayName: string | null };
  gamesPlayed: number;
  totalScore: number;
  averageScore: number;
  successfulGames: number;
};

export function parseWindow(input: string | null | undefined, fallback: StatsWindow): StatsWindow | null {
  if (input === null || input === undefined || input === '') return fallback;
  const normalized = input.trim().toLowerCase().replace(/[\s_-]/g, '');
  return WINDOWS.find((w) => w === normalized) ?? null;
}

export function resolveWindow(window: StatsWindow, now: Date): DateRange {
  const today = dayjs(now).startOf('day');
  const to = today.format('YYYY-MM-DD');
  switch (window) {
    case 'weekly':
      // dayjs weeks start on Sunday; step back to Monday
      return { from: today.subtract((today.day() + 6) % 7, 'day').format('YYYY-MM-DD'), to };
    case 'monthly':
      return { from: today.startOf('month').format('YYYY-MM-DD'), to };
    case 'alltime':
      return { from: ALLTIME_START, to };
  }
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Streaks from distinct play dates sorted newest first. The current streak is
 * the run ending on the last played date, whether or not that was today.
 */
export function computeStreak(datesDesc: string[]): Streak {
  if (datesDesc.length === 0) return { currentStreak: 0, longestStreak: 0 };

  let currentStreak = 1;
  let currentOpen = true;
  let longestStreak = 1;
  let run = 1;
  for (let i = 1; i < datesDesc.length; i++) {
    const consecutive = daysBetween(datesDesc[i], datesDesc[i - 1]) === 1;
    run = consecutive ? run + 1 : 1;
    if (currentOpen) {
      if (consecutive) currentStreak++;
      else currentOpen = false;
    }
    if (run > longestStreak) longestStreak = run;
  }
  return { currentStreak, longestStreak };
}

export class StatsEngine {
  constructor(
    private readonly db: Db,
    private readonly now: () => Date = () => new Date(),
  ) {}

  window(window: StatsWindow): DateRange {
    return resolveWindow(window, this.now());
  }

  getStats(participantId: string, window: StatsWindow): ParticipantStats {
    const { from, to } = this.window(window);
    const row = wrapStorage('participant stats', () => aggregateParticipant(this.db, participantId, from, to));
    if (row.gamesPlayed === 0) {
      return { gamesPlayed: 0, totalScore: 0, averageScore: 0, successfulGames: 0, firstGameDate: null, lastGameDate: null };
    }
    return { ...row, averageScore: round2(row.averageScore ?? 0) };
  }

  getStreak(participantId: string): Streak {
    return computeStreak(wrapStorage('play dates', () => playDates(this.db, participantId)));
  }

  getLeaderboard(window: StatsWindow, limit: number): LeaderboardEntry[] {
    const { from, to } = this.window(window);
    const rows = wrapStorage('leaderboard', () => aggregateLeaderboard(this.db, from, to, Math.max(0, Math.floor(limit))));
    return rows.map((r) => ({
      participant: { id: r.participantId, username: r.username, displayName: r.displayName },
      gamesPlayed: r.gamesPlayed,
      totalScore: r.totalScore,
      averageScore: round2(r.averageScore),
      successfulGames: r.successfulGames,
      ...this.getStreak(r.participantId),
    }));
  }

  /** 1-based position in the full ordering, or null when not ranked in the window. */
  getRank(participantId: string, window: StatsWindow): number | null {
    const { from, to } = this.window(window);
    const rows = wrapStorage('rank', () => aggregateLeaderboard(this.db, from, to));
    const idx = rows.findIndex((r) => r.participantId === participantId);
    return idx === -1 ? null : idx + 1;
  }
}
