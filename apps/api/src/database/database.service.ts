import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Database } from 'sqlite3';
import { SCHEMA } from './schema';

export type SqlParams = Array<string | number | null>;

export interface RunResult {
  lastID: number;
  changes: number;
}

/**
 * Single SQLite connection with promise wrappers.
 * Transactions are queued so that two imports never interleave on the connection.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db?: Database;
  private transactionQueue: Promise<void> = Promise.resolve();

  constructor(private readonly config: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const path = this.config.get<string>('DATABASE_PATH', 'bookkeeping.db');

    this.db = await new Promise<Database>((resolve, reject) => {
      const db = new Database(path, err => (err ? reject(err) : resolve(db)));
    });

    await this.exec('PRAGMA foreign_keys = ON');
    await this.exec(SCHEMA);
    this.logger.log(`Connected to SQLite database at ${path}`);
  }

  async onModuleDestroy(): Promise<void> {
    const db = this.db;
    if (!db) return;

    this.db = undefined;
    await new Promise<void>((resolve, reject) => {
      db.close(err => (err ? reject(err) : resolve()));
    });
  }

  run(sql: string, params: SqlParams = []): Promise<RunResult> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.run(sql, params, function (err) {
        if (err) {
          reject(err);
        } else {
          resolve({ lastID: this.lastID, changes: this.changes });
        }
      });
    });
  }

  get<T>(sql: string, params: SqlParams = []): Promise<T | undefined> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.get<T>(sql, params, (err, row) => {
        if (err) {
          reject(err);
        } else {
          resolve(row);
        }
      });
    });
  }

  all<T>(sql: string, params: SqlParams = []): Promise<T[]> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.all<T>(sql, params, (err, rows) => {
        if (err) {
          reject(err);
        } else {
          resolve(rows || []);
        }
      });
    });
  }

  exec(sql: string): Promise<void> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.exec(sql, err => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Run `work` between BEGIN and COMMIT, rolling back when it throws
   */
  executeTransaction<T>(work: () => Promise<T>): Promise<T> {
    const result = this.transactionQueue.then(async () => {
      await this.exec('BEGIN');
      try {
        const value = await work();
        await this.exec('COMMIT');
        return value;
      } catch (error) {
        await this.exec('ROLLBACK');
        throw error;
      }
    });

    // Callers get the failure through `result`; the queue only waits for it
    this.transactionQueue = result.then(
      () => undefined,
      () => undefined,
    );

    return result;
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.get('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private connection(): Database {
    if (!this.db) {
      throw new Error('Database is not open');
    }
    return this.db;
  }
}
