import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const PROJECT_ROOT = path.resolve(__dirname, '../..');
const IN_MEMORY = ':memory:';

export interface DbConfig {
  dbPath: string;
  migrationsDir: string;
  verbose?: boolean;
  quiet?: boolean; // suppress migration progress lines
}

export class DatabaseClient {
  private db: Database.Database | null = null;
  private config: DbConfig;

  constructor(dbConfig?: Partial<DbConfig>) {
    this.config = {
      dbPath: dbConfig?.dbPath || config.dbPath || path.join(PROJECT_ROOT, 'data', 'whales.db'),
      migrationsDir: dbConfig?.migrationsDir || path.join(PROJECT_ROOT, 'migrations'),
      verbose: dbConfig?.verbose || false,
      quiet: dbConfig?.quiet || false,
    };
  }

  /**
   * Connect to database (lazy initialization)
   */
  connect(): Database.Database {
    if (this.db) return this.db;

    const inMemory = this.config.dbPath === IN_MEMORY;

    // Ensure data directory exists
    if (!inMemory) {
      const dir = path.dirname(this.config.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.config.dbPath, {
      verbose: this.config.verbose ? console.log : undefined,
    });

    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
      this.db.pragma('synchronous = NORMAL');
    }
    this.db.pragma('foreign_keys = ON');

    return this.db;
  }

  /**
   * Run database migrations
   */
  migrate(): void {
    const database = this.connect();
    const migrationsDir = this.config.migrationsDir;

    database.prepare(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id INTEGER PRIMARY KEY,
        name TEXT UNIQUE NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      )
    `).run();

    const applied = new Set(
      this.all<{ name: string }>('SELECT name FROM _migrations').map((r) => r.name)
    );

    if (!fs.existsSync(migrationsDir)) {
      this.log('No migrations directory found');
      return;
    }

    const files = fs
      .readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (applied.has(file)) {
        this.log(`  ✓ ${file} (already applied)`);
        continue;
      }

      this.log(`  → Applying: ${file}`);
      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

      // exec() handles multi-statement files
      this.transaction(() => {
        database.exec(sql);
        database.prepare('INSERT INTO _migrations (name) VALUES (?)').run(file);
      });
      this.log(`  ✓ ${file} applied`);
    }
  }

  /**
   * Get database instance (auto-connects if needed)
   */
  get(): Database.Database {
    return this.connect();
  }

  /**
   * Prepare and return all results
   */
  all<T = unknown>(sql: string, params?: unknown[]): T[] {
    const stmt = this.get().prepare(sql);
    return (params ? stmt.all(...params) : stmt.all()) as T[];
  }

  /**
   * Prepare and return first result
   */
  first<T = unknown>(sql: string, params?: unknown[]): T | undefined {
    const stmt = this.get().prepare(sql);
    return (params ? stmt.get(...params) : stmt.get()) as T | undefined;
  }

  /**
   * Prepare and run a statement (INSERT, UPDATE, DELETE)
   */
  run(sql: string, params?: unknown[]): Database.RunResult {
    const stmt = this.get().prepare(sql);
    return params ? stmt.run(...params) : stmt.run();
  }

  /**
   * Run multiple statements in a transaction
   */
  transaction<T>(fn: () => T): T {
    return this.get().transaction(fn)();
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  getPath(): string {
    return this.config.dbPath;
  }

  private log(message: string): void {
    if (!this.config.quiet) console.log(message);
  }
}

// Singleton instance
export const db = new DatabaseClient();

/**
 * Fresh, migrated in-memory database (tests and one-off scripts)
 */
export function createMemoryDatabase(): DatabaseClient {
  const client = new DatabaseClient({ dbPath: IN_MEMORY, quiet: true });
  client.migrate();
  return client;
}

// Helper to get current ISO timestamp
export function nowISO(): string {
  return new Date().toISOString();
}

export function toISO(ms: number): string {
  return new Date(ms).toISOString();
}
