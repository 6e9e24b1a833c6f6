/**
 * Health Store
 *
 * Relational store for daily health records, the user profile, conversation
 * turns, alerts, goal snapshots and job history. The coach reads daily
 * records and the profile; it only ever appends to the other tables.
 *
 * The `HealthStore` interface is what the coach depends on. `SqliteHealthStore`
 * is the shipped adapter (better-sqlite3, WAL mode, SQL migrations).
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { SQLITE_CONFIG, GOAL_DEFAULTS } from '../constants.js';
import { StoreError } from '../errors.js';
import {
  BackendAttemptListSchema,
  GoalRowSchema,
  JobRowSchema,
  TurnRowSchema,
} from '../schemas/index.js';
import type {
  ConversationTurn,
  DailyHealthRecord,
  GoalSnapshot,
  HealthAlert,
  JobName,
  JobResult,
  MetricGoal,
  MetricName,
  NewConversationTurn,
  UserProfile,
} from '../types.js';
import { logInfo } from './logger.js';

// =============================================================================
// CONTRACT
// =============================================================================

export interface HealthStore {
  getRecord(date: string): Promise<DailyHealthRecord | null>;
  /** Inclusive range, ascending by date. Dates without a record are absent. */
  getRange(start: string, end: string): Promise<DailyHealthRecord[]>;
  getProfile(): Promise<UserProfile>;
  /** Monotonic counter bumped on every profile write */
  getProfileVersion(): Promise<number>;
  ensureSession(sessionId: string): Promise<void>;
  /** Creates the session if needed and assigns the next turn index */
  appendTurn(turn: NewConversationTurn): Promise<ConversationTurn>;
  /** Last `limit` turns, oldest first */
  getSessionTurns(sessionId: string, limit: number): Promise<ConversationTurn[]>;
  appendAlert(alert: HealthAlert): Promise<void>;
  appendGoalSnapshot(snapshot: GoalSnapshot): Promise<void>;
  appendJobResult(result: JobResult): Promise<void>;
  getJobHistory(jobName?: JobName, limit?: number): Promise<JobResult[]>;
}

// =============================================================================
// COLUMN MAPPING
// =============================================================================

const METRIC_COLUMNS: Record<MetricName, string> = {
  systolic: 'systolic',
  diastolic: 'diastolic',
  heartRate: 'heart_rate',
  steps: 'steps',
  sleepHours: 'sleep_hours',
  sleepEfficiency: 'sleep_efficiency',
  vo2Max: 'vo2_max',
  hrv: 'hrv',
  respiratoryRate: 'respiratory_rate',
  activeCalories: 'active_calories',
  exerciseMinutes: 'exercise_minutes',
};

const METRIC_ENTRIES = Object.entries(METRIC_COLUMNS).filter(
  (entry): entry is [MetricName, string] => entry[0] in METRIC_COLUMNS
);

type Row = Record<string, unknown>;

function rowToRecord(row: Row): DailyHealthRecord {
  const record: DailyHealthRecord = { date: String(row.date) };
  for (const [metric, column] of METRIC_ENTRIES) {
    const value = row[column];
    if (typeof value === 'number' && Number.isFinite(value)) {
      record[metric] = value;
    }
  }
  return record;
}

function rowToTurn(row: Row): ConversationTurn {
  const parsed = TurnRowSchema.parse(row);
  const turn: ConversationTurn = {
    sessionId: parsed.session_id,
    turnIndex: parsed.turn_index,
    createdAt: parsed.created_at,
    queryText: parsed.query_text,
    intent: parsed.intent,
    backend: parsed.backend,
    status: parsed.status,
    responseText: parsed.response_text,
    confidence: parsed.confidence,
    inputTokens: parsed.input_tokens,
    outputTokens: parsed.output_tokens,
    costUsd: parsed.cost_usd,
    attempts: BackendAttemptListSchema.parse(JSON.parse(parsed.attempts)),
  };
  if (parsed.error_class) turn.errorClass = parsed.error_class;
  return turn;
}

// =============================================================================
// SQLITE ADAPTER
// =============================================================================

export interface SqliteHealthStoreOptions {
  /** ':memory:' for tests */
  path?: string;
  migrationsDir?: string;
  baselineWindowDays?: number;
}

/**
 * Migrations live at the repository root so the same path works from
 * src/ under ts-jest and from dist/ after a build.
 */
const DEFAULT_MIGRATIONS_DIR = join(__dirname, '..', '..', '..', 'migrations');

export class SqliteHealthStore implements HealthStore {
  private db: Database.Database;
  private baselineWindowDays: number;

  constructor(options: SqliteHealthStoreOptions = {}) {
    const path = options.path ?? SQLITE_CONFIG.DB_PATH;
    this.baselineWindowDays = options.baselineWindowDays ?? SQLITE_CONFIG.BASELINE_WINDOW_DAYS;

    if (path !== ':memory:') {
      const dir = dirname(path);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.runMigrations(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR);
  }

  private runMigrations(migrationsDir: string): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const applied = this.db.prepare<[], { name: string }>('SELECT name FROM migrations').all();
    const appliedNames = new Set(applied.map(m => m.name));

    if (!existsSync(migrationsDir)) {
      throw new StoreError('migrate', `migrations directory not found: ${migrationsDir}`);
    }

    const files = readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort();
    for (const file of files) {
      if (appliedNames.has(file)) continue;
      const sql = readFileSync(join(migrationsDir, file), 'utf-8');
      this.db.transaction(() => {
        this.db.exec(sql);
        this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run(file);
      })();
      logInfo('Migration applied', { migration: file });
    }
  }

  // ---------------------------------------------------------------------------
  // Daily records
  // ---------------------------------------------------------------------------

  async getRecord(date: string): Promise<DailyHealthRecord | null> {
    try {
      const row = this.db.prepare<[string], Row>('SELECT * FROM daily_health_data WHERE date = ?').get(date);
      return row ? rowToRecord(row) : null;
    } catch (error) {
      throw new StoreError('getRecord', error);
    }
  }

  async getRange(start: string, end: string): Promise<DailyHealthRecord[]> {
    try {
      const rows = this.db
        .prepare<[string, string], Row>(
          'SELECT * FROM daily_health_data WHERE date BETWEEN ? AND ? ORDER BY date ASC'
        )
        .all(start, end);
      return rows.map(rowToRecord);
    } catch (error) {
      throw new StoreError('getRange', error);
    }
  }

  /**
   * Written by the import pipeline; the coach never calls this.
   * New data moves the baselines, so the profile version is bumped with it.
   */
  upsertRecords(records: DailyHealthRecord[]): void {
    const columns = ['date', ...METRIC_ENTRIES.map(([, column]) => column)];
    const placeholders = columns.map(c => `@${c}`).join(', ');
    const updates = columns.slice(1).map(c => `${c} = excluded.${c}`).join(', ');
    const stmt = this.db.prepare(
      `INSERT INTO daily_health_data (${columns.join(', ')}) VALUES (${placeholders})
       ON CONFLICT(date) DO UPDATE SET ${updates}`
    );
    const insertAll = this.db.transaction((batch: DailyHealthRecord[]) => {
      for (const record of batch) {
        const params: Record<string, string | number | null> = { date: record.date };
        for (const [metric, column] of METRIC_ENTRIES) {
          params[column] = record[metric] ?? null;
        }
        stmt.run(params);
      }
      if (batch.length > 0) this.bumpProfileVersion();
    });
    insertAll(records);
  }

  // ---------------------------------------------------------------------------
  // Profile
  // ---------------------------------------------------------------------------

  async getProfile(): Promise<UserProfile> {
    try {
      const profileRow = this.db
        .prepare<[], { name: string }>('SELECT name FROM user_profile WHERE id = 1')
        .get();

      const goalRows = this.db.prepare<[], Row>('SELECT metric, goal, direction FROM metric_goals').all();
      const goals: MetricGoal[] = goalRows.length > 0
        ? goalRows.map(row => GoalRowSchema.parse(row))
        : defaultGoals();

      const averages = METRIC_ENTRIES.map(([, column]) => `AVG(${column}) AS ${column}`).join(', ');
      const baselineRow = this.db
        .prepare<[number], Row>(
          `SELECT COUNT(*) AS days, ${averages} FROM daily_health_data
           WHERE date > date((SELECT MAX(date) FROM daily_health_data), '-' || ? || ' days')`
        )
        .get(this.baselineWindowDays);

      const baselines: UserProfile['baselines'] = {};
      let baselineDays = 0;
      if (baselineRow) {
        const record = rowToRecord({ ...baselineRow, date: '' });
        for (const [metric] of METRIC_ENTRIES) {
          const value = record[metric];
          if (value !== undefined) baselines[metric] = Math.round(value * 10) / 10;
        }
        baselineDays = typeof baselineRow.days === 'number' ? baselineRow.days : 0;
      }

      return { name: profileRow?.name ?? 'User', baselines, goals, baselineDays };
    } catch (error) {
      throw new StoreError('getProfile', error);
    }
  }

  async getProfileVersion(): Promise<number> {
    const row = this.db.prepare<[], { version: number }>('SELECT version FROM user_profile WHERE id = 1').get();
    return row?.version ?? 0;
  }

  setProfileName(name: string): void {
    this.db
      .prepare(
        `INSERT INTO user_profile (id, name, version, updated_at) VALUES (1, ?, 1, datetime('now'))
         ON CONFLICT(id) DO UPDATE SET name = excluded.name, version = version + 1, updated_at = excluded.updated_at`
      )
      .run(name);
  }

  setGoal(goal: MetricGoal): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO metric_goals (metric, goal, direction) VALUES (?, ?, ?)
           ON CONFLICT(metric) DO UPDATE SET goal = excluded.goal, direction = excluded.direction`
        )
        .run(goal.metric, goal.goal, goal.direction);
      this.bumpProfileVersion();
    })();
  }

  private bumpProfileVersion(): void {
    this.db
      .prepare(
        `INSERT INTO user_profile (id, name, version, updated_at) VALUES (1, 'User', 1, datetime('now'))
         ON CONFLICT(id) DO UPDATE SET version = version + 1, updated_at = excluded.updated_at`
      )
      .run();
  }

  // ---------------------------------------------------------------------------
  // Conversations
  // ---------------------------------------------------------------------------

  async ensureSession(sessionId: string): Promise<void> {
    this.db
      .prepare(`INSERT OR IGNORE INTO sessions (id, created_at) VALUES (?, ?)`)
      .run(sessionId, new Date().toISOString());
  }

  async appendTurn(turn: NewConversationTurn): Promise<ConversationTurn> {
    try {
      const insert = this.db.transaction((t: NewConversationTurn): number => {
        this.db
          .prepare(`INSERT OR IGNORE INTO sessions (id, created_at) VALUES (?, ?)`)
          .run(t.sessionId, t.createdAt);
        const next = this.db
          .prepare<[string], { next: number }>(
            'SELECT COALESCE(MAX(turn_index), -1) + 1 AS next FROM conversation_turns WHERE session_id = ?'
          )
          .get(t.sessionId);
        const turnIndex = next?.next ?? 0;
        this.db
          .prepare(
            `INSERT INTO conversation_turns (
               session_id, turn_index, created_at, query_text, intent, backend, status,
               response_text, confidence, input_tokens, output_tokens, cost_usd, attempts, error_class
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            t.sessionId,
            turnIndex,
            t.createdAt,
            t.queryText,
            t.intent,
            t.backend,
            t.status,
            t.responseText,
            t.confidence,
            t.inputTokens,
            t.outputTokens,
            t.costUsd,
            JSON.stringify(t.attempts),
            t.errorClass ?? null
          );
        return turnIndex;
      });
      return { ...turn, turnIndex: insert(turn) };
    } catch (error) {
      throw new StoreError('appendTurn', error);
    }
  }

  async getSessionTurns(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    try {
      const rows = this.db
        .prepare<[string, number], Row>(
          `SELECT * FROM (
             SELECT * FROM conversation_turns WHERE session_id = ? ORDER BY turn_index DESC LIMIT ?
           ) ORDER BY turn_index ASC`
        )
        .all(sessionId, limit);
      return rows.map(rowToTurn);
    } catch (error) {
      throw new StoreError('getSessionTurns', error);
    }
  }

  // ---------------------------------------------------------------------------
  // Job outputs
  // ---------------------------------------------------------------------------

  async appendAlert(alert: HealthAlert): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO health_alerts (date, type, priority, title, message, metric_value, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        alert.date,
        alert.type,
        alert.priority,
        alert.title,
        alert.message,
        alert.metricValue ?? null,
        new Date().toISOString()
      );
  }

  async appendGoalSnapshot(snapshot: GoalSnapshot): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO goal_snapshots (date, metric, goal, current_value, progress_pct, gap, status)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        snapshot.date,
        snapshot.metric,
        snapshot.goal,
        snapshot.currentValue,
        snapshot.progressPct,
        snapshot.gap,
        snapshot.status
      );
  }

  async appendJobResult(result: JobResult): Promise<void> {
    this.db
      .prepare('INSERT INTO job_history (job_name, run_at, status, detail) VALUES (?, ?, ?, ?)')
      .run(result.jobName, result.runAt, result.status, result.detail);
  }

  async getJobHistory(jobName?: JobName, limit = 20): Promise<JobResult[]> {
    const rows = jobName
      ? this.db
          .prepare<[string, number], Row>(
            'SELECT job_name, run_at, status, detail FROM job_history WHERE job_name = ? ORDER BY id DESC LIMIT ?'
          )
          .all(jobName, limit)
      : this.db
          .prepare<[number], Row>('SELECT job_name, run_at, status, detail FROM job_history ORDER BY id DESC LIMIT ?')
          .all(limit);
    return rows.map(row => {
      const parsed = JobRowSchema.parse(row);
      return { jobName: parsed.job_name, runAt: parsed.run_at, status: parsed.status, detail: parsed.detail };
    });
  }

  close(): void {
    this.db.close();
  }
}

function defaultGoals(): MetricGoal[] {
  return [
    { metric: 'systolic', ...GOAL_DEFAULTS.systolic },
    { metric: 'sleepHours', ...GOAL_DEFAULTS.sleepHours },
    { metric: 'steps', ...GOAL_DEFAULTS.steps },
    { metric: 'vo2Max', ...GOAL_DEFAULTS.vo2Max },
  ];
}
