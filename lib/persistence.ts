import sqlite3 from 'sqlite3';
import { z } from 'zod';
import { logger } from './logger';
import type { CaseStore } from './board/case-store';
import { CLOSE_REASONS, PLATFORMS, type RescueCase } from './board/types';

const activeStatusSchema = z.enum(['open', 'assigned', 'callForJump']);

const caseStateSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('open') }),
  z.object({ status: z.literal('assigned') }),
  z.object({ status: z.literal('callForJump') }),
  z.object({ status: z.literal('paused'), from: activeStatusSchema }),
  z.object({ status: z.literal('closed'), reason: z.enum(CLOSE_REASONS) }),
]);

/** Shape of the JSON payload stored per case */
export const rescueCaseSchema = z.object({
  id: z.number().int().nonnegative(),
  reporter: z.string().min(1),
  client: z.string().min(1),
  channel: z.string(),
  signal: z.string(),
  state: caseStateSchema,
  responders: z.array(z.string()),
  system: z.string().optional(),
  platform: z.enum(PLATFORMS).optional(),
  unidentified: z.boolean(),
  codeRed: z.boolean(),
  language: z.string().optional(),
  notes: z.array(z.string()),
  history: z.array(z.object({
    at: z.number(),
    actor: z.string(),
    action: z.string(),
    detail: z.string().optional(),
  })),
  createdAt: z.number(),
  updatedAt: z.number(),
});

interface CaseRow {
  case_id: number;
  data: string;
}

export class PersistenceService implements CaseStore {
  private db?: sqlite3.Database;
  private dbPath: string;

  constructor(dbPath: string = './ratbot.db') {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(this.dbPath, (err) => {
        if (err) {
          logger.error('Failed to open database:', err);
          reject(err);
          return;
        }
        resolve(handle);
      });
    });
    this.db = db;
    logger.info(`Connected to SQLite database at ${this.dbPath}`);

    // WAL needs backups to copy the -wal file too
    try {
      await this.run('PRAGMA journal_mode = WAL;');
      logger.debug('SQLite WAL mode enabled');
    } catch (walErr) {
      logger.warn('Failed to enable WAL mode, using default journal mode:', walErr);
    }

    await this.createTables();
  }

  /**
   * Retry a write on SQLITE_BUSY with exponential backoff and jitter.
   */
  private async writeWithRetry<T>(
    operation: () => Promise<T>,
    maxRetries: number = 5,
    baseDelay: number = 50
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error: unknown) {
        if (!isBusyError(error) || attempt >= maxRetries) {
          throw error;
        }

        const exponentialDelay = baseDelay * Math.pow(2, attempt);
        const delay = exponentialDelay + Math.random() * 0.3 * exponentialDelay;

        logger.debug(
          `SQLITE_BUSY error on attempt ${attempt + 1}/${maxRetries + 1}, ` +
          `retrying after ${Math.round(delay)}ms`
        );

        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  private async createTables(): Promise<void> {
    const queries = [
      `CREATE TABLE IF NOT EXISTS open_cases (
        case_id INTEGER PRIMARY KEY,
        reporter TEXT NOT NULL,
        data TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS case_archive (
        archive_id INTEGER PRIMARY KEY AUTOINCREMENT,
        case_id INTEGER NOT NULL,
        reporter TEXT NOT NULL,
        close_reason TEXT NOT NULL,
        data TEXT NOT NULL,
        opened_at INTEGER NOT NULL,
        closed_at INTEGER NOT NULL
      )`,
      'CREATE INDEX IF NOT EXISTS idx_case_archive_case_id ON case_archive (case_id)',
    ];

    for (const query of queries) {
      await this.run(query);
    }

    logger.debug('Database tables created/verified');
  }

  async save(rescue: RescueCase): Promise<void> {
    await this.writeWithRetry(() => this.run(`
      INSERT OR REPLACE INTO open_cases
      (case_id, reporter, data, updated_at)
      VALUES (?, ?, ?, ?)
    `, [rescue.id, rescue.reporter, JSON.stringify(rescue), rescue.updatedAt]));
    logger.debug(`Saved case #${rescue.id}`);
  }

  async remove(caseId: number): Promise<void> {
    await this.writeWithRetry(() => this.run('DELETE FROM open_cases WHERE case_id = ?', [caseId]));
    logger.debug(`Removed open row for case #${caseId}`);
  }

  /**
   * Append the closed case to the archive and drop its live row in one
   * transaction.
   */
  async archive(rescue: RescueCase): Promise<void> {
    const reason = rescue.state.status === 'closed' ? rescue.state.reason : 'closed';

    await this.writeWithRetry(async () => {
      await this.run('BEGIN IMMEDIATE');
      try {
        await this.run(`
          INSERT INTO case_archive
          (case_id, reporter, close_reason, data, opened_at, closed_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `, [rescue.id, rescue.reporter, reason, JSON.stringify(rescue), rescue.createdAt, rescue.updatedAt]);
        await this.run('DELETE FROM open_cases WHERE case_id = ?', [rescue.id]);
        await this.run('COMMIT');
      } catch (error) {
        await this.run('ROLLBACK').catch((rollbackErr: unknown) => {
          logger.error('Failed to roll back archive transaction:', rollbackErr);
        });
        throw error;
      }
    });
    logger.debug(`Archived case #${rescue.id} (${reason})`);
  }

  async loadAllOpen(): Promise<RescueCase[]> {
    const rows = await this.all<CaseRow>('SELECT case_id, data FROM open_cases ORDER BY case_id');
    const cases: RescueCase[] = [];
    for (const row of rows) {
      const parsed = parseCaseRow(row);
      if (parsed) cases.push(parsed);
    }
    logger.debug(`Loaded ${cases.length} open case rows from database`);
    return cases;
  }

  /**
   * Latest archived record for an id. Ids are reused, so older closures of
   * the same id stay in the archive behind it.
   */
  async getArchived(caseId: number): Promise<RescueCase | null> {
    const rows = await this.all<CaseRow>(`
      SELECT case_id, data FROM case_archive
      WHERE case_id = ?
      ORDER BY archive_id DESC
      LIMIT 1
    `, [caseId]);
    return rows.length > 0 ? parseCaseRow(rows[0]) : null;
  }

  async countArchived(): Promise<number> {
    const rows = await this.all<{ total: number }>('SELECT COUNT(*) AS total FROM case_archive');
    return rows[0]?.total ?? 0;
  }

  async ping(): Promise<void> {
    await this.all('SELECT 1');
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) return;
    this.db = undefined;

    return new Promise((resolve, reject) => {
      db.close((err) => {
        if (err) {
          logger.error('Error closing database:', err);
          reject(err);
        } else {
          logger.info('Database connection closed');
          resolve();
        }
      });
    });
  }

  private handle(): sqlite3.Database {
    if (!this.db) {
      throw new Error('Database is not initialized');
    }
    return this.db;
  }

  private run(sql: string, params: unknown[] = []): Promise<void> {
    return new Promise((resolve, reject) => {
      this.handle().run(sql, params, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.handle().all(sql, params, (err, rows: T[]) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }
}

function parseCaseRow(row: CaseRow): RescueCase | null {
  let payload: unknown;
  try {
    payload = JSON.parse(row.data);
  } catch (parseErr) {
    logger.error(`Failed to parse stored case #${row.case_id}:`, parseErr);
    return null;
  }

  const result = rescueCaseSchema.safeParse(payload);
  if (!result.success) {
    logger.error(`Stored case #${row.case_id} does not match the case schema:`, result.error.issues);
    return null;
  }
  return result.data;
}

function isBusyError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  return Reflect.get(error, 'code') === 'SQLITE_BUSY' || Reflect.get(error, 'errno') === 5;
}
