// engine/combat-log.ts — SQLite persistence of runs and their notifications

import BetterSqlite3 from 'better-sqlite3';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { CombatEvent, CombatEventType, EntityId, Tick, TickResult } from '../types/index.js';
import { nowISO } from '../shared/utils.js';

export interface CombatRunRecord {
  id: string;
  label: string;
  seed: number;
  startedAt: string;
  endedAt: string | null;
  finalTick: Tick | null;
}

export interface StoredEvent {
  tick: Tick;
  seq: number;
  type: string;
  subjectId: EntityId | null;
  payload: unknown;
}

interface RunRow {
  id: string;
  label: string;
  seed: number;
  started_at: string;
  ended_at: string | null;
  final_tick: number | null;
}

interface EventRow {
  tick: number;
  seq: number;
  type: string;
  subject_id: string | null;
  payload: string;
}

interface EventParams {
  run_id: string;
  tick: number;
  seq: number;
  type: string;
  subject_id: string | null;
  payload: string;
}

/** The entity a notification is mainly about, for indexing. */
export function subjectOf(event: CombatEvent): EntityId | null {
  if ('entityId' in event) return event.entityId;
  if ('targetId' in event) return event.targetId;
  if ('casterId' in event) return event.casterId;
  if ('projectileId' in event) return event.projectileId;
  return null;
}

export class CombatLog {
  private db: BetterSqlite3.Database;
  private activeRunId: string | null = null;

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  runMigrations(migrationsDir: string): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name TEXT PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const applied = new Set(
      this.db.prepare<[], { name: string }>('SELECT name FROM _migrations').all().map((r) => r.name),
    );

    const files = readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (applied.has(file)) continue;
      const sql = readFileSync(join(migrationsDir, file), 'utf-8');
      this.db.exec(sql);
      this.db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(file);
    }
  }

  appliedMigrations(): string[] {
    return this.db
      .prepare<[], { name: string }>('SELECT name FROM _migrations ORDER BY name')
      .all()
      .map((r) => r.name);
  }

  get runId(): string | null {
    return this.activeRunId;
  }

  startRun(seed: number, label: string): string {
    const id = uuidv4();
    this.db
      .prepare('INSERT INTO combat_runs (id, label, seed, started_at) VALUES (?, ?, ?, ?)')
      .run(id, label, seed, nowISO());
    this.activeRunId = id;
    return id;
  }

  /** Writes every notification of the tick inside one transaction. */
  persistTick(result: TickResult): void {
    const runId = this.activeRunId;
    if (!runId) {
      throw new Error('Combat log has no active run; call startRun first');
    }

    const insert = this.db.prepare<[EventParams]>(`
      INSERT INTO combat_events (run_id, tick, seq, type, subject_id, payload)
      VALUES (@run_id, @tick, @seq, @type, @subject_id, @payload)
    `);

    const runAll = this.db.transaction((events: CombatEvent[]) => {
      events.forEach((event, seq) => {
        insert.run({
          run_id: runId,
          tick: result.tick,
          seq,
          type: event.type,
          subject_id: subjectOf(event),
          payload: JSON.stringify(event),
        });
      });
    });
    runAll(result.events);
  }

  endRun(finalTick: Tick): void {
    if (!this.activeRunId) return;
    this.db
      .prepare('UPDATE combat_runs SET ended_at = ?, final_tick = ? WHERE id = ?')
      .run(nowISO(), finalTick, this.activeRunId);
    this.activeRunId = null;
  }

  getRun(id: string): CombatRunRecord | undefined {
    const row = this.db.prepare<[string], RunRow>('SELECT * FROM combat_runs WHERE id = ?').get(id);
    if (!row) return undefined;
    return {
      id: row.id,
      label: row.label,
      seed: row.seed,
      startedAt: row.started_at,
      endedAt: row.ended_at,
      finalTick: row.final_tick,
    };
  }

  loadRunEvents(runId: string, type?: CombatEventType): StoredEvent[] {
    const rows = type
      ? this.db
          .prepare<[string, string], EventRow>(
            'SELECT tick, seq, type, subject_id, payload FROM combat_events WHERE run_id = ? AND type = ? ORDER BY tick, seq',
          )
          .all(runId, type)
      : this.db
          .prepare<[string], EventRow>(
            'SELECT tick, seq, type, subject_id, payload FROM combat_events WHERE run_id = ? ORDER BY tick, seq',
          )
          .all(runId);

    return rows.map((row) => {
      const payload: unknown = JSON.parse(row.payload);
      return { tick: row.tick, seq: row.seq, type: row.type, subjectId: row.subject_id, payload };
    });
  }

  close(): void {
    this.db.close();
  }
}
