import { promises as fs } from "fs";
import path from "path";
import type { RowDataPacket } from "mysql2/promise";
import { config } from "@/shared/config/environment";
import { DatabaseManager } from "@/shared/config/database";
import { logger } from "@/shared/config/logger";

interface MigrationRow extends RowDataPacket {
  id: number;
  filename: string;
  executed_at: Date;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

// Statements are separated by semicolons; migrations contain no procedures
export const splitStatements = (sql: string): string[] =>
  sql
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

export class MigrationRunner {
  private readonly tableName = "migrations";

  constructor(
    private readonly db: DatabaseManager,
    private readonly migrationsPath: string = path.join(__dirname, "../database/migrations")
  ) {}

  async run(): Promise<void> {
    logger.info("🔄 Starting database migrations...");

    await this.createMigrationsTable();

    const migrationFiles = await this.getMigrationFiles();
    const executed = await this.getExecutedMigrations();
    const pending = migrationFiles.filter((file) => !executed.some((migration) => migration.filename === file));

    if (pending.length === 0) {
      logger.info("✅ No pending migrations found");
      return;
    }

    logger.info(`📋 Found ${pending.length} pending migrations`);

    for (const migrationFile of pending) {
      await this.executeMigration(migrationFile);
    }

    logger.info("🎉 All migrations completed successfully!");
  }

  async rollback(steps: number = 1): Promise<void> {
    logger.info(`🔄 Rolling back ${steps} migration(s)...`);

    const executed = await this.db.query<MigrationRow>(`SELECT * FROM ${this.tableName} ORDER BY id DESC LIMIT ?`, [
      steps,
    ]);

    if (executed.length === 0) {
      logger.info("✅ No migrations to rollback");
      return;
    }

    for (const migration of executed) {
      await this.rollbackMigration(migration);
    }

    logger.info("🎉 Rollback completed successfully!");
  }

  async status(): Promise<void> {
    const migrationFiles = await this.getMigrationFiles();
    const executed = await this.getExecutedMigrations();
    const pending = migrationFiles.filter((file) => !executed.some((migration) => migration.filename === file));

    logger.info({ total: migrationFiles.length, executed: executed.length, pending }, "📋 Migration status");
  }

  private async createMigrationsTable(): Promise<void> {
    await this.db.execute(`
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
    return files.filter((file) => file.endsWith(".sql") && !file.endsWith(".rollback.sql")).sort();
  }

  private async getExecutedMigrations(): Promise<MigrationRow[]> {
    return this.db.query<MigrationRow>(`SELECT * FROM ${this.tableName} ORDER BY id`);
  }

  private async executeMigration(filename: string): Promise<void> {
    logger.info(`⚡ Executing migration: ${filename}`);

    const sql = await fs.readFile(path.join(this.migrationsPath, filename), "utf-8");

    await this.db.transaction(async (tx) => {
      for (const statement of splitStatements(sql)) {
        await tx.execute(statement);
      }
      await tx.execute(`INSERT INTO ${this.tableName} (filename) VALUES (?)`, [filename]);
    });

    logger.info(`✅ Migration completed: ${filename}`);
  }

  private async rollbackMigration(migration: MigrationRow): Promise<void> {
    const rollbackFilename = migration.filename.replace(/\.sql$/, ".rollback.sql");
    logger.info(`⚡ Rolling back migration: ${migration.filename}`);

    let sql: string;
    try {
      sql = await fs.readFile(path.join(this.migrationsPath, rollbackFilename), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.warn(`⚠️ No rollback file found for ${migration.filename}, manual rollback may be required`);
        return;
      }
      throw error;
    }

    await this.db.transaction(async (tx) => {
      for (const statement of splitStatements(sql)) {
        await tx.execute(statement);
      }
      await tx.execute(`DELETE FROM ${this.tableName} WHERE id = ?`, [migration.id]);
    });

    logger.info(`✅ Rollback completed: ${migration.filename}`);
  }
}

// CLI handling
async function main(): Promise<void> {
  const command = process.argv[2];
  const db = new DatabaseManager(config.database);
  const runner = new MigrationRunner(db);

  try {
    switch (command) {
      case "up":
        await runner.run();
        break;
      case "down":
        await runner.rollback(Number.parseInt(process.argv[3] ?? "", 10) || 1);
        break;
      case "status":
        await runner.status();
        break;
      default:
        logger.info("Usage: tsx src/scripts/migrate.ts [up|down|status] [steps]");
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
    logger.error({ error }, "❌ Migration script failed");
    process.exit(1);
  });
}
