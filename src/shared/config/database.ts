import mysql, { ResultSetHeader, RowDataPacket } from "mysql2/promise";
import type { Config } from "./environment";
import { createModuleLogger, logDatabaseQuery } from "./logger";

const moduleLogger = createModuleLogger("Database");

export type SqlValue = string | number | boolean | Date | null;

/**
 * The subset of database access repositories depend on. Implemented both by the
 * pool-backed manager and by the scope handed to a transaction callback.
 */
export interface QueryExecutor {
  query<T extends RowDataPacket>(sql: string, params?: SqlValue[]): Promise<T[]>;
  queryOne<T extends RowDataPacket>(sql: string, params?: SqlValue[]): Promise<T | null>;
  execute(sql: string, params?: SqlValue[]): Promise<ResultSetHeader>;
}

export interface TransactionRunner extends QueryExecutor {
  transaction<T>(callback: (tx: QueryExecutor) => Promise<T>): Promise<T>;
}

type Executable = Pick<mysql.Connection, "execute">;

class ConnectionExecutor implements QueryExecutor {
  constructor(
    private readonly target: Executable,
    private readonly verbose: boolean,
    private readonly label: string
  ) {}

  async query<T extends RowDataPacket>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    const start = Date.now();

    try {
      const [rows] = await this.target.execute<T[]>(sql, params);

      if (this.verbose) {
        logDatabaseQuery(sql, params, Date.now() - start);
      }

      return rows;
    } catch (error) {
      moduleLogger.error({ error, sql, params, duration: `${Date.now() - start}ms` }, `${this.label} failed`);
      throw error;
    }
  }

  async queryOne<T extends RowDataPacket>(sql: string, params: SqlValue[] = []): Promise<T | null> {
    const results = await this.query<T>(sql, params);
    return results[0] ?? null;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ResultSetHeader> {
    const start = Date.now();

    try {
      const [result] = await this.target.execute<ResultSetHeader>(sql, params);

      if (this.verbose) {
        logDatabaseQuery(sql, params, Date.now() - start);
      }

      return result;
    } catch (error) {
      moduleLogger.error({ error, sql, params, duration: `${Date.now() - start}ms` }, `${this.label} failed`);
      throw error;
    }
  }
}

export class DatabaseManager implements TransactionRunner {
  private readonly pool: mysql.Pool;
  private readonly executor: ConnectionExecutor;
  private readonly verbose: boolean;

  constructor(database: Config["database"], options: { verbose?: boolean } = {}) {
    this.pool = mysql.createPool({
      host: database.host,
      port: database.port,
      user: database.user,
      password: database.password,
      database: database.name,
      connectionLimit: database.connectionLimit,
      charset: "utf8mb4",
      // Store everything in UTC
      timezone: "Z",
      dateStrings: ["DATE"],
      decimalNumbers: true,
    });
    this.verbose = options.verbose ?? false;
    this.executor = new ConnectionExecutor(this.pool, this.verbose, "Database query");
  }

  public async connect(): Promise<void> {
    const connection = await this.pool.getConnection();

    try {
      await connection.ping();
      moduleLogger.info("✅ Database connected successfully");
    } finally {
      connection.release();
    }
  }

  public async ping(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (error) {
      moduleLogger.warn({ error }, "Database health check failed");
      return false;
    }
  }

  public query<T extends RowDataPacket>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    return this.executor.query<T>(sql, params);
  }

  public queryOne<T extends RowDataPacket>(sql: string, params: SqlValue[] = []): Promise<T | null> {
    return this.executor.queryOne<T>(sql, params);
  }

  public execute(sql: string, params: SqlValue[] = []): Promise<ResultSetHeader> {
    return this.executor.execute(sql, params);
  }

  public async transaction<T>(callback: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();

    try {
      await connection.beginTransaction();

      const result = await callback(new ConnectionExecutor(connection, this.verbose, "Transaction query"));
      await connection.commit();

      return result;
    } catch (error) {
      await connection.rollback();
      throw error;
    } finally {
      connection.release();
    }
  }

  public async close(): Promise<void> {
    try {
      await this.pool.end();
      moduleLogger.info("Database connection pool closed");
    } catch (error) {
      moduleLogger.error({ error }, "Error closing database connection pool");
    }
  }
}
