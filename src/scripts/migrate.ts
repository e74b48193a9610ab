import { promises as fs } from "fs";
import path from "path";
import { db, RowDataPacket } from "@/shared/config/database";
import { logger } from "@/shared/config/logger";

interface MigrationRow extends RowDataPacket {
  id: number;
  filename: string;
  executed_at: Date;
}

const ROLLBACK_SUFFIX = ".rollback.sql";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const splitStatements = (sql: string): string[] =>
  sql
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

class MigrationRunner {
  private migrationsPath = path.join(__dirname, "../database/migrations");
  private tableName = "migrations";

  async run(): Promise<void> {
    logger.info("Starting database migrations...");

    await this.createMigrationsTable();

    const migrationFiles = await this.getMigrationFiles();
    const executed = await this.getExecutedMigrations();
    const pending = migrationFiles.filter((file) => !executed.some((m) => m.filename === file));

    if (pending.length === 0) {
      logger.info("No pending migrations found");
      return;
    }

    logger.info(`Found ${pending.length} pending migrations`);

    for (const migrationFile of pending) {
      await this.executeMigration(migrationFile);
    }

    logger.info("All migrations completed successfully");
  }

  private async createMigrationsTable(): Promise<void> {
    await db.execute(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id INT AUTO_INCREMENT PRIMARY KEY,
        filename VARCHAR(255) NOT NULL UNIQUE,
        executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
    logger.debug("Migrations table ready");
  }

  private async getMigrationFiles(): Promise<string[]> {
    const files = await fs.readdir(this.migrationsPath);
    return files.filter((file) => file.endsWith(".sql") && !file.endsWith(ROLLBACK_SUFFIX)).sort();
  }

  private async getExecutedMigrations(): Promise<MigrationRow[]> {
    return db.query<MigrationRow>(`SELECT * FROM ${this.tableName} ORDER BY id`);
  }

  private async executeMigration(filename: string): Promise<void> {
    logger.info(`Executing migration: ${filename}`);

    const sql = await fs.readFile(path.join(this.migrationsPath, filename), "utf-8");

    // MySQL commits DDL implicitly; the transaction only keeps the bookkeeping row consistent
    await db.transaction(async (connection) => {
      for (const statement of splitStatements(sql)) {
        await connection.query(statement);
      }
      await connection.execute(`INSERT INTO ${this.tableName} (filename) VALUES (?)`, [filename]);
    });

    logger.info(`Migration completed: ${filename}`);
  }

  async rollback(steps: number = 1): Promise<void> {
    logger.info(`Rolling back ${steps} migration(s)...`);

    const executed = await db.query<MigrationRow>(
      `SELECT * FROM ${this.tableName} ORDER BY id DESC LIMIT ${Math.max(1, Math.floor(steps))}`
    );

    if (executed.length === 0) {
      logger.info("No migrations to rollback");
      return;
    }

    for (const migration of executed) {
      await this.rollbackMigration(migration);
    }

    logger.info("Rollback completed successfully");
  }

  private async rollbackMigration(migration: MigrationRow): Promise<void> {
    logger.info(`Rolling back migration: ${migration.filename}`);

    const rollbackFile = migration.filename.replace(/\.sql$/, ROLLBACK_SUFFIX);

    let sql: string;
    try {
      sql = await fs.readFile(path.join(this.migrationsPath, rollbackFile), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.warn(`No rollback file found for: ${migration.filename}. Manual rollback may be required`);
        return;
      }
      throw error;
    }

    await db.transaction(async (connection) => {
      for (const statement of splitStatements(sql)) {
        await connection.query(statement);
      }
      await connection.execute(`DELETE FROM ${this.tableName} WHERE id = ?`, [migration.id]);
    });

    logger.info(`Rollback completed: ${migration.filename}`);
  }

  async status(): Promise<void> {
    await this.createMigrationsTable();

    const migrationFiles = await this.getMigrationFiles();
    const executed = await this.getExecutedMigrations();
    const pending = migrationFiles.filter((file) => !executed.some((m) => m.filename === file));

    logger.info(`Total migration files: ${migrationFiles.length}`);
    logger.info(`Executed migrations: ${executed.length}`);

    if (pending.length > 0) {
      logger.info(`Pending migrations: ${pending.length}`);
      pending.forEach((file) => logger.info(`  - ${file}`));
    } else {
      logger.info("All migrations are up to date");
    }
  }
}

async function main(): Promise<void> {
  const command = process.argv[2];
  const migrationRunner = new MigrationRunner();

  try {
    switch (command) {
      case "up":
        await migrationRunner.run();
        break;
      case "down": {
        const steps = Number.parseInt(process.argv[3] ?? "", 10) || 1;
        await migrationRunner.rollback(steps);
        break;
      }
      case "status":
        await migrationRunner.status();
        break;
      default:
        logger.info("Usage: npm run migrate -- [up|down|status] [steps]");
        logger.info("  up     - Run pending migrations");
        logger.info("  down   - Rollback migrations (default: 1 step)");
        logger.info("  status - Show migration status");
        break;
    }
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, "Migration script failed");
    process.exit(1);
  });
}
