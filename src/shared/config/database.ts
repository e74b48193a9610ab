import mysql, { Pool, PoolConnection, PoolOptions, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import { config } from "./environment";
import { logger, logDatabaseQuery } from "./logger";

export type SqlParam = string | number | boolean | Date | null;

export type { ResultSetHeader, RowDataPacket };

// Unique key violation reported by the MySQL driver
export const isDuplicateEntryError = (error: unknown): error is Error =>
  error instanceof Error && "code" in error && error.code === "ER_DUP_ENTRY";

// Migrations send one statement per query, so no connection needs multipleStatements
export const buildPoolOptions = (settings: typeof config.database = config.database): PoolOptions => ({
  host: settings.host,
  port: settings.port,
  user: settings.user,
  password: settings.password,
  database: settings.name,
  connectionLimit: settings.connectionLimit,
  timezone: "Z",
  dateStrings: false,
});

class DatabaseManager {
  private pool: Pool | null = null;
  private static instance: DatabaseManager;

  private constructor() {}

  public static getInstance(): DatabaseManager {
    if (!DatabaseManager.instance) {
      DatabaseManager.instance = new DatabaseManager();
    }
    return DatabaseManager.instance;
  }

  // Pool is created on first use so the in-memory provider never opens one
  public getPool(): Pool {
    if (!this.pool) {
      this.pool = mysql.createPool(buildPoolOptions());
    }
    return this.pool;
  }

  public async connect(): Promise<void> {
    const connection = await this.getPool().getConnection();
    try {
      await connection.ping();
      logger.info("✅ Database connected successfully");
    } finally {
      connection.release();
    }
  }

  public async query<T extends RowDataPacket>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return this.run(sql, params, async () => {
      const [rows] = await this.getPool().execute<T[]>(sql, params);
      return rows;
    });
  }

  public async queryOne<T extends RowDataPacket>(sql: string, params: SqlParam[] = []): Promise<T | null> {
    const results = await this.query<T>(sql, params);
    return results[0] ?? null;
  }

  public async execute(sql: string, params: SqlParam[] = []): Promise<ResultSetHeader> {
    return this.run(sql, params, async () => {
      const [result] = await this.getPool().execute<ResultSetHeader>(sql, params);
      return result;
    });
  }

  public async transaction<T>(callback: (connection: PoolConnection) => Promise<T>): Promise<T> {
    const connection = await this.getPool().getConnection();

    try {
      await connection.beginTransaction();
      const result = await callback(connection);
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
    if (!this.pool) {
      return;
    }

    try {
      await this.pool.end();
      this.pool = null;
      logger.info("Database connection pool closed");
    } catch (error) {
      logger.error({ err: error }, "Error closing database connection pool");
    }
  }

  private async run<T>(sql: string, params: SqlParam[], operation: () => Promise<T>): Promise<T> {
    const start = Date.now();

    try {
      const result = await operation();

      if (config.app.isDevelopment) {
        logDatabaseQuery(sql, params, Date.now() - start);
      }

      return result;
    } catch (error) {
      logger.error(
        {
          err: error,
          sql,
          params,
          duration: `${Date.now() - start}ms`,
        },
        "Database query failed"
      );
      throw error;
    }
  }
}

// Export singleton instance
export const db = DatabaseManager.getInstance();
export type Database = DatabaseManager;
