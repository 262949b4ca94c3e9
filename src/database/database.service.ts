import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import initSqlJs, { type Database, type SqlValue } from 'sql.js';
import { SCHEMA_STATEMENTS } from './database.schema';

export type SqlParams = SqlValue[];
export type SqlRow = Record<string, SqlValue>;

export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * SQLite access through sql.js. The database lives in memory and, unless the
 * configured path is ':memory:', the whole file is written back after every
 * write statement.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly path: string;
  private db: Database | null = null;

  constructor(configService: ConfigService) {
    this.path = configService.get<string>('database.path', IN_MEMORY_DATABASE);
  }

  async onModuleInit(): Promise<void> {
    await this.open();
  }

  onModuleDestroy(): void {
    this.close();
  }

  async open(): Promise<void> {
    if (this.db) return;

    const SQL = await initSqlJs();

    if (this.isPersistent() && existsSync(this.path)) {
      this.db = new SQL.Database(readFileSync(this.path));
      this.logger.log(`Loaded database from ${this.path}`);
    } else {
      this.db = new SQL.Database();
      this.logger.log(
        this.isPersistent()
          ? `Created new database at ${this.path}`
          : 'Using in-memory database'
      );
    }

    for (const statement of SCHEMA_STATEMENTS) {
      this.db.run(statement);
    }
    this.persist();
  }

  close(): void {
    if (!this.db) return;
    this.persist();
    this.db.close();
    this.db = null;
  }

  /**
   * Execute a write statement and persist the file
   */
  run(sql: string, params: SqlParams = []): RunResult {
    const db = this.connection();
    db.run(sql, params);

    const changes = db.getRowsModified();
    const idRow = this.get('SELECT last_insert_rowid() AS id');
    const lastInsertRowid = typeof idRow?.id === 'number' ? idRow.id : 0;

    this.persist();
    return { changes, lastInsertRowid };
  }

  get(sql: string, params: SqlParams = []): SqlRow | undefined {
    return this.all(sql, params)[0];
  }

  all(sql: string, params: SqlParams = []): SqlRow[] {
    const statement = this.connection().prepare(sql);
    try {
      statement.bind(params);
      const rows: SqlRow[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private connection(): Database {
    if (!this.db) {
      throw new Error('Database is not open');
    }
    return this.db;
  }

  private isPersistent(): boolean {
    return this.path !== IN_MEMORY_DATABASE;
  }

  private persist(): void {
    if (!this.db || !this.isPersistent()) return;

    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, Buffer.from(this.db.export()));
  }
}
