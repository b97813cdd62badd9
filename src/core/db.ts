import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { ConfigError } from './errors';
import type { ParticipantRef } from './parser';

export type Db = Database.Database;

export type RoundResultRow = {
  participantId: string;
  roundId: number;
  roundDate: string; // YYYY-MM-DD
  attemptCount: number;
  succeeded: boolean;
  score: number;
  rawLine: string;
};

export type InsertOutcome = 'inserted' | 'duplicate';

export function openDb(dbFile = path.join(process.cwd(), 'data.sqlite')): Db {
  if (dbFile !== ':memory:') {
    fs.mkdirSync(path.dirname(dbFile), { recursive: true });
  }
  const db = new Database(dbFile);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(`
    CREATE TABLE IF NOT EXISTS participants (
      participant_id TEXT PRIMARY KEY,
      username TEXT,
      display_name TEXT,
      first_seen_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS aliases (
      alias TEXT PRIMARY KEY,
      participant_id TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS round_results (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      participant_id TEXT NOT NULL,
      round_id INTEGER NOT NULL,
      round_date TEXT NOT NULL,
      attempt_count INTEGER NOT NULL,
      succeeded INTEGER NOT NULL,
      score INTEGER NOT NULL,
      raw_line TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      UNIQUE(participant_id, round_id, round_date),
      FOREIGN KEY (participant_id) REFERENCES participants(participant_id)
    );
    CREATE INDEX IF NOT EXISTS idx_round_results_participant_date ON round_results(participant_id, round_date);
    CREATE INDEX IF NOT EXISTS idx_round_results_date ON round_results(round_date);
  `);
  return db;
}

/** Seeds aliases from a JSON object of "@name" -> participant id. Returns how many were written. */
export function seedAliases(db: Db, aliasFile: string): number {
  if (!fs.existsSync(aliasFile)) return 0;
  const data: unknown = JSON.parse(fs.readFileSync(aliasFile, 'utf8'));
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError(`${aliasFile} must contain a JSON object of alias -> user id`, 'aliases.json');
  }
  let written = 0;
  for (const [alias, id] of Object.entries(data)) {
    if (typeof id !== 'string' || !id) continue;
    setAlias(db, alias, id);
    written++;
  }
  return written;
}

// Display attributes only move forward: an unknown name never erases a known one.
export function upsertParticipant(db: Db, ref: ParticipantRef, now = new Date().toISOString()): void {
  db.prepare(`INSERT INTO participants (participant_id, username, display_name, first_seen_at, updated_at)
              VALUES (?, ?, ?, ?, ?)
              ON CONFLICT(participant_id) DO UPDATE SET
                username = COALESCE(excluded.username, participants.username),
                display_name = COALESCE(excluded.display_name, participants.display_name),
                updated_at = excluded.updated_at
            `).run(ref.id, ref.username, ref.displayName, now, now);
}

/**
 * Relies on the UNIQUE key rather than a prior SELECT, so concurrent writers of
 * the same (participant, round, date) still end with exactly one row.
 */
export function insertRoundResult(db: Db, row: RoundResultRow, now = new Date().toISOString()): InsertOutcome {
  const info = db.prepare(`INSERT INTO round_results
                (participant_id, round_id, round_date, attempt_count, succeeded, score, raw_line, created_at)
              VALUES (?, ?, ?, ?, ?, ?, ?, ?)
              ON CONFLICT(participant_id, round_id, round_date) DO NOTHING
            `).run(
    row.participantId,
    row.roundId,
    row.roundDate,
    row.attemptCount,
    row.succeeded ? 1 : 0,
    row.score,
    row.rawLine,
    now,
  );
  return info.changes === 1 ? 'inserted' : 'duplicate';
}

function aliasKey(alias: string): string {
  return alias.trim().toLowerCase().replace(/^@/, '');
}

export function setAlias(db: Db, alias: string, participantId: string): void {
  db.prepare(`INSERT INTO aliases(alias, participant_id) VALUES(?, ?)
              ON CONFLICT(alias) DO UPDATE SET participant_id=excluded.participant_id`).run(aliasKey(alias), participantId);
}

export function getAlias(db: Db, alias: string): string | null {
  const row = db
    .prepare<[string], { participant_id: string }>(`SELECT participant_id FROM aliases WHERE alias = ?`)
    .get(aliasKey(alias));
  return row?.participant_id ?? null;
}

export function listAliases(db: Db): { alias: string; participantId: string }[] {
  return db
    .prepare<[], { alias: string; participantId: string }>(
      `SELECT alias, participant_id AS participantId FROM aliases ORDER BY alias`,
    )
    .all();
}

export type StoredParticipant = {
  participantId: string;
  username: string | null;
  displayName: string | null;
};

export function getParticipant(db: Db, participantId: string): StoredParticipant | null {
  const row = db
    .prepare<[string], StoredParticipant>(`
      SELECT participant_id AS participantId, username, display_name AS displayName
      FROM participants WHERE participant_id = ?`)
    .get(participantId);
  return row ?? null;
}

export type AggregateRow = {
  gamesPlayed: number;
  totalScore: number;
  averageScore: number | null;
  successfulGames: number;
  firstGameDate: string | null;
  lastGameDate: string | null;
};

export function aggregateParticipant(db: Db, participantId: string, from: string, to: string): AggregateRow {
  const row = db
    .prepare<[string, string, string], AggregateRow>(`
      SELECT COUNT(*) AS gamesPlayed,
             COALESCE(SUM(score), 0) AS totalScore,
             AVG(score) AS averageScore,
             COALESCE(SUM(CASE WHEN succeeded = 1 THEN 1 ELSE 0 END), 0) AS successfulGames,
             MIN(round_date) AS firstGameDate,
             MAX(round_date) AS lastGameDate
      FROM round_results
      WHERE participant_id = ? AND round_date BETWEEN ? AND ?
    `)
    .get(participantId, from, to);
  return row ?? {
    gamesPlayed: 0,
    totalScore: 0,
    averageScore: null,
    successfulGames: 0,
    firstGameDate: null,
    lastGameDate: null,
  };
}

export type LeaderboardAggregate = StoredParticipant & {
  gamesPlayed: number;
  totalScore: number;
  averageScore: number;
  successfulGames: number;
};

/** `limit` of -1 returns every ranked participant. */
export function aggregateLeaderboard(db: Db, from: string, to: string, limit = -1): LeaderboardAggregate[] {
  return db
    .prepare<[string, string, number], LeaderboardAggregate>(`
      SELECT p.participant_id AS participantId,
             p.username,
             p.display_name AS displayName,
             COUNT(r.id) AS gamesPlayed,
             SUM(r.score) AS totalScore,
             AVG(r.score) AS averageScore,
             SUM(CASE WHEN r.succeeded = 1 THEN 1 ELSE 0 END) AS successfulGames
      FROM round_results r
      JOIN participants p ON p.participant_id = r.participant_id
      WHERE r.round_date BETWEEN ? AND ?
      GROUP BY p.participant_id, p.username, p.display_name
      ORDER BY totalScore DESC, averageScore DESC, p.participant_id ASC
      LIMIT ?
    `)
    .all(from, to, limit);
}

/** Distinct play dates, most recent first. */
export function playDates(db: Db, participantId: string): string[] {
  return db
    .prepare<[string], { roundDate: string }>(`
      SELECT DISTINCT round_date AS roundDate
      FROM round_results
      WHERE participant_id = ?
      ORDER BY round_date DESC
    `)
    .all(participantId)
    .map((r) => r.roundDate);
}

export function countRows(db: Db, table: 'round_results' | 'participants' | 'aliases'): number {
  const row = db.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`).get();
  return row?.c ?? 0;
}
