import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

type BetterSqliteDatabase = InstanceType<typeof Database>;
type BetterSqliteStatement = Database.Statement<unknown[]>;

export interface StatementRunResult {
  readonly changes: number;
}

export class WrappedStatement {
  private readonly statement: BetterSqliteStatement;

  public constructor(statement: BetterSqliteStatement) {
    this.statement = statement;
  }

  public run(...params: unknown[]): StatementRunResult {
    const result = this.statement.run(...params);
    return { changes: result.changes };
  }

  public get(...params: unknown[]): unknown {
    const value: unknown = this.statement.get(...params);
    return value === null ? undefined : value;
  }

  public all(...params: unknown[]): unknown[] {
    return this.statement.all(...params);
  }
}

export function prepareDatabasePath(filePath: string): string {
  if (filePath === ':memory:') {
    return filePath;
  }
  mkdirSync(dirname(filePath), { recursive: true });
  return filePath;
}

export class SqliteDatabase {
  private readonly database: BetterSqliteDatabase;
  private readonly statements = new Map<string, WrappedStatement>();

  public constructor(filePath: string) {
    this.database = new Database(prepareDatabasePath(filePath));
  }

  public close(): void {
    this.statements.clear();
    this.database.close();
  }

  public exec(sql: string): void {
    this.database.exec(sql);
  }

  public prepare(sql: string): WrappedStatement {
    const cached = this.statements.get(sql);
    if (cached !== undefined) {
      return cached;
    }
    const statement = new WrappedStatement(this.database.prepare(sql));
    this.statements.set(sql, statement);
    return statement;
  }

  public transaction<T>(body: () => T): T {
    this.database.exec('BEGIN IMMEDIATE TRANSACTION');
    try {
      const result = body();
      this.database.exec('COMMIT');
      return result;
    } catch (error: unknown) {
      this.database.exec('ROLLBACK');
      throw error;
    }
  }
}
