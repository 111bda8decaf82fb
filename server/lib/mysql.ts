import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import mysql, {
  type Pool,
  type PoolConnection,
  type ResultSetHeader,
  type RowDataPacket,
} from "mysql2/promise";
import bcrypt from "bcryptjs";
import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import { formatLocalTimestamp } from "@shared/interest";
import { getConfig } from "./config";

const DEFAULT_DB_FILENAME = "pawn-ledger.db";
const IN_MEMORY = ":memory:";

export type Dialect = "mysql" | "sqlite";

export interface QueryHeader {
  affectedRows: number;
  insertId: number;
}

export interface Queryable {
  readonly dialect: Dialect;
  select<T extends RowDataPacket>(sql: string, params?: unknown[]): Promise<T[]>;
  execute(sql: string, params?: unknown[]): Promise<QueryHeader>;
}

export interface DatabaseConnection extends Queryable {
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface DatabasePool extends Queryable {
  getConnection(): Promise<DatabaseConnection>;
}

let mysqlPool: Pool | null = null;
let pool: DatabasePool | null = null;
let sqliteDb: SqliteDatabase | null = null;
let initializationPromise: Promise<boolean> | null = null;

function hasMysqlConfig() {
  const config = getConfig();
  return Boolean(config.MYSQL_HOST && config.MYSQL_DATABASE && config.MYSQL_USER);
}

function resolveDefaultDataDir() {
  const config = getConfig();
  if (config.LOCAL_DB_DIR) {
    return path.resolve(config.LOCAL_DB_DIR);
  }
  if (config.PORTABLE_EXECUTABLE_DIR) {
    return path.resolve(config.PORTABLE_EXECUTABLE_DIR, "data");
  }
  return path.resolve(process.cwd(), "data");
}

function resolveLocalDbPath() {
  const explicit = getConfig().LOCAL_DB_PATH;
  if (explicit === IN_MEMORY) return IN_MEMORY;
  if (explicit) return path.resolve(explicit);
  return path.join(resolveDefaultDataDir(), DEFAULT_DB_FILENAME);
}

function ensureDirectoryExists(filePath: string) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

class BetterSqliteConnection implements DatabaseConnection {
  readonly dialect = "sqlite" as const;
  private inTransaction = false;
  private released = false;

  constructor(
    private readonly db: SqliteDatabase,
    private readonly unlock: () => void,
  ) {}

  async select<T extends RowDataPacket>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    return this.db.prepare<unknown[], T>(sql).all(...params);
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryHeader> {
    const result = this.db.prepare(sql).run(...params);
    return {
      affectedRows: result.changes,
      insertId: Number(result.lastInsertRowid),
    };
  }

  async beginTransaction(): Promise<void> {
    if (this.inTransaction) return;
    this.db.prepare("BEGIN IMMEDIATE").run();
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) return;
    this.db.prepare("COMMIT").run();
    this.inTransaction = false;
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) return;
    try {
      this.db.prepare("ROLLBACK").run();
    } finally {
      this.inTransaction = false;
    }
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    if (this.inTransaction) {
      this.inTransaction = false;
      try {
        this.db.prepare("ROLLBACK").run();
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error("[sqlite] rollback on release failed", error);
      }
    }
    this.unlock();
  }
}

/**
 * One better-sqlite3 handle behind the pool interface. Connections are handed
 * out one at a time so transactions on the shared handle never interleave;
 * pool-level queries wait their turn in the same queue.
 */
class BetterSqlitePool implements DatabasePool {
  readonly dialect = "sqlite" as const;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly db: SqliteDatabase) {}

  private async withConnection<T>(
    work: (conn: DatabaseConnection) => Promise<T>,
  ): Promise<T> {
    const conn = await this.getConnection();
    try {
      return await work(conn);
    } finally {
      conn.release();
    }
  }

  select<T extends RowDataPacket>(sql: string, params: unknown[] = []): Promise<T[]> {
    return this.withConnection((conn) => conn.select<T>(sql, params));
  }

  execute(sql: string, params: unknown[] = []): Promise<QueryHeader> {
    return this.withConnection((conn) => conn.execute(sql, params));
  }

  async getConnection(): Promise<DatabaseConnection> {
    const previous = this.queue;
    let unlock: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    await previous;
    return new BetterSqliteConnection(this.db, unlock);
  }
}

class MysqlConnection implements DatabaseConnection {
  readonly dialect = "mysql" as const;

  constructor(private readonly conn: PoolConnection) {}

  async select<T extends RowDataPacket>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    const [rows] = await this.conn.query<T[]>(sql, params);
    return rows;
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryHeader> {
    const [result] = await this.conn.query<ResultSetHeader>(sql, params);
    return { affectedRows: result.affectedRows, insertId: result.insertId };
  }

  beginTransaction(): Promise<void> {
    return this.conn.beginTransaction();
  }

  commit(): Promise<void> {
    return this.conn.commit();
  }

  rollback(): Promise<void> {
    return this.conn.rollback();
  }

  release(): void {
    this.conn.release();
  }
}

class MysqlPool implements DatabasePool {
  readonly dialect = "mysql" as const;

  constructor(private readonly pool: Pool) {}

  async select<T extends RowDataPacket>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    const [rows] = await this.pool.query<T[]>(sql, params);
    return rows;
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryHeader> {
    const [result] = await this.pool.query<ResultSetHeader>(sql, params);
    return { affectedRows: result.affectedRows, insertId: result.insertId };
  }

  async getConnection(): Promise<DatabaseConnection> {
    return new MysqlConnection(await this.pool.getConnection());
  }
}

function openSqlite(): SqliteDatabase {
  if (sqliteDb) return sqliteDb;
  const dbPath = resolveLocalDbPath();
  if (dbPath !== IN_MEMORY) ensureDirectoryExists(dbPath);
  sqliteDb = new Database(dbPath);
  if (dbPath !== IN_MEMORY) sqliteDb.pragma("journal_mode = WAL");
  sqliteDb.pragma("foreign_keys = ON");
  return sqliteDb;
}

function ensureSqliteSchema(db: SqliteDatabase) {
  const statements = [
    `CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      email TEXT NOT NULL DEFAULT '',
      role TEXT NOT NULL DEFAULT 'staff' CHECK (role IN ('admin','staff')),
      active INTEGER NOT NULL DEFAULT 1,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE TABLE IF NOT EXISTS sessions (
      token TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS password_resets (
      token TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      created_at TEXT NOT NULL,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS loans (
      id TEXT PRIMARY KEY,
      created_at TEXT NOT NULL,
      item_name TEXT NOT NULL,
      weight_grams REAL NOT NULL DEFAULT 0,
      customer_name TEXT NOT NULL DEFAULT '',
      customer_id TEXT NOT NULL DEFAULT '',
      phone TEXT NOT NULL,
      amount REAL NOT NULL CHECK (amount >= 0),
      interest_rate REAL NOT NULL,
      due_date TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'ACTIVE' CHECK (status IN ('ACTIVE','REDEEMED','LOST','SOLD')),
      photo_path TEXT NOT NULL DEFAULT '',
      id_front_path TEXT NOT NULL DEFAULT '',
      id_back_path TEXT NOT NULL DEFAULT '',
      signature_path TEXT NOT NULL DEFAULT '',
      redeemed_at TEXT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS payments (
      id TEXT PRIMARY KEY,
      loan_id TEXT NOT NULL,
      paid_at TEXT NOT NULL,
      amount REAL NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('INTEREST','PRINCIPAL')),
      notes TEXT NOT NULL DEFAULT '',
      prior_due_date TEXT NULL,
      FOREIGN KEY (loan_id) REFERENCES loans(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS cash_movements (
      id TEXT PRIMARY KEY,
      when_at TEXT NOT NULL,
      concept TEXT NOT NULL,
      amount REAL NOT NULL,
      ref TEXT NOT NULL,
      loan_id TEXT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS payment_reversals (
      id TEXT PRIMARY KEY,
      loan_id TEXT NOT NULL,
      paid_at TEXT NOT NULL,
      interest_amount REAL NOT NULL,
      principal_amount REAL NOT NULL,
      total REAL NOT NULL,
      reason TEXT NOT NULL,
      reversed_by TEXT NOT NULL,
      reversed_at TEXT NOT NULL,
      FOREIGN KEY (loan_id) REFERENCES loans(id) ON DELETE CASCADE
    )`,
    `CREATE TABLE IF NOT EXISTS clients (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      document TEXT NOT NULL,
      phone TEXT NOT NULL DEFAULT '',
      address TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS sales (
      id TEXT PRIMARY KEY,
      item_desc TEXT NOT NULL,
      price REAL NOT NULL,
      status TEXT NOT NULL DEFAULT 'FOR_SALE' CHECK (status IN ('FOR_SALE','SOLD')),
      sold_at TEXT NULL,
      created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS inventory_items (
      id TEXT PRIMARY KEY,
      loan_id TEXT NULL,
      item_desc TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'FOR_SALE' CHECK (status IN ('FOR_SALE','SOLD')),
      created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS settings (
      name TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS idx_loans_status_due ON loans(status, due_date)`,
    `CREATE INDEX IF NOT EXISTS idx_payments_loan_paid ON payments(loan_id, paid_at)`,
    `CREATE INDEX IF NOT EXISTS idx_payments_type_paid ON payments(type, paid_at)`,
    `CREATE INDEX IF NOT EXISTS idx_cash_movements_when ON cash_movements(when_at)`,
    `CREATE INDEX IF NOT EXISTS idx_inventory_items_loan ON inventory_items(loan_id)`,
  ];

  for (const statement of statements) {
    db.prepare(statement).run();
  }
}

async function ensureMysqlSchema(db: Pool) {
  await db.query(`
    CREATE TABLE IF NOT EXISTS users (
      id CHAR(36) NOT NULL PRIMARY KEY,
      username VARCHAR(191) NOT NULL UNIQUE,
      name VARCHAR(191) NOT NULL,
      email VARCHAR(191) NOT NULL DEFAULT '',
      role ENUM('admin','staff') NOT NULL DEFAULT 'staff',
      active TINYINT(1) NOT NULL DEFAULT 1,
      password_hash VARCHAR(191) NOT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS sessions (
      token CHAR(36) NOT NULL PRIMARY KEY,
      user_id CHAR(36) NOT NULL,
      created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
      CONSTRAINT fk_sessions_user FOREIGN KEY (user_id)
        REFERENCES users(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS password_resets (
      token VARCHAR(64) NOT NULL PRIMARY KEY,
      user_id CHAR(36) NOT NULL,
      expires_at DATETIME NOT NULL,
      created_at DATETIME NOT NULL,
      CONSTRAINT fk_password_resets_user FOREIGN KEY (user_id)
        REFERENCES users(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS loans (
      id CHAR(36) NOT NULL PRIMARY KEY,
      created_at DATETIME NOT NULL,
      item_name VARCHAR(191) NOT NULL,
      weight_grams DECIMAL(12,2) NOT NULL DEFAULT 0,
      customer_name VARCHAR(191) NOT NULL DEFAULT '',
      customer_id VARCHAR(191) NOT NULL DEFAULT '',
      phone VARCHAR(64) NOT NULL,
      amount DECIMAL(12,2) NOT NULL,
      interest_rate DECIMAL(6,2) NOT NULL,
      due_date DATE NOT NULL,
      status ENUM('ACTIVE','REDEEMED','LOST','SOLD') NOT NULL DEFAULT 'ACTIVE',
      photo_path VARCHAR(255) NOT NULL DEFAULT '',
      id_front_path VARCHAR(255) NOT NULL DEFAULT '',
      id_back_path VARCHAR(255) NOT NULL DEFAULT '',
      signature_path VARCHAR(255) NOT NULL DEFAULT '',
      redeemed_at DATETIME NULL,
      INDEX idx_loans_status_due (status, due_date),
      CONSTRAINT chk_loans_amount CHECK (amount >= 0)
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS payments (
      id CHAR(36) NOT NULL PRIMARY KEY,
      loan_id CHAR(36) NOT NULL,
      paid_at DATETIME NOT NULL,
      amount DECIMAL(12,2) NOT NULL,
      type ENUM('INTEREST','PRINCIPAL') NOT NULL,
      notes TEXT NULL,
      prior_due_date DATE NULL,
      INDEX idx_payments_loan_paid (loan_id, paid_at),
      INDEX idx_payments_type_paid (type, paid_at),
      CONSTRAINT fk_payments_loan FOREIGN KEY (loan_id)
        REFERENCES loans(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS cash_movements (
      id CHAR(36) NOT NULL PRIMARY KEY,
      when_at DATETIME NOT NULL,
      concept VARCHAR(255) NOT NULL,
      amount DECIMAL(12,2) NOT NULL,
      ref VARCHAR(32) NOT NULL,
      loan_id CHAR(36) NULL,
      INDEX idx_cash_movements_when (when_at)
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS payment_reversals (
      id CHAR(36) NOT NULL PRIMARY KEY,
      loan_id CHAR(36) NOT NULL,
      paid_at DATETIME NOT NULL,
      interest_amount DECIMAL(12,2) NOT NULL,
      principal_amount DECIMAL(12,2) NOT NULL,
      total DECIMAL(12,2) NOT NULL,
      reason VARCHAR(255) NOT NULL,
      reversed_by CHAR(36) NOT NULL,
      reversed_at DATETIME NOT NULL,
      CONSTRAINT fk_payment_reversals_loan FOREIGN KEY (loan_id)
        REFERENCES loans(id) ON DELETE CASCADE
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS clients (
      id CHAR(36) NOT NULL PRIMARY KEY,
      name VARCHAR(191) NOT NULL,
      document VARCHAR(191) NOT NULL,
      phone VARCHAR(64) NOT NULL DEFAULT '',
      address VARCHAR(255) NOT NULL DEFAULT '',
      created_at DATETIME NOT NULL
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS sales (
      id CHAR(36) NOT NULL PRIMARY KEY,
      item_desc VARCHAR(255) NOT NULL,
      price DECIMAL(12,2) NOT NULL,
      status ENUM('FOR_SALE','SOLD') NOT NULL DEFAULT 'FOR_SALE',
      sold_at DATETIME NULL,
      created_at DATETIME NOT NULL
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS inventory_items (
      id CHAR(36) NOT NULL PRIMARY KEY,
      loan_id CHAR(36) NULL,
      item_desc VARCHAR(255) NOT NULL,
      status ENUM('FOR_SALE','SOLD') NOT NULL DEFAULT 'FOR_SALE',
      created_at DATETIME NOT NULL,
      INDEX idx_inventory_items_loan (loan_id)
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS settings (
      name VARCHAR(64) NOT NULL PRIMARY KEY,
      value TEXT NOT NULL
    ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
  `);
}

async function seedAdmin(target: DatabasePool) {
  const rows = await target.select<RowDataPacket>(
    `SELECT id FROM users WHERE role = 'admin' LIMIT 1`,
  );
  if (rows.length > 0) return;

  const id = crypto.randomUUID();
  const passwordHash = await bcrypt.hash(getConfig().SEED_ADMIN_PASSWORD, 10);
  await target.execute(
    `INSERT INTO users (id, username, name, email, role, active, password_hash, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      id,
      "admin",
      "Administrator",
      "admin@example.com",
      "admin",
      1,
      passwordHash,
      formatLocalTimestamp(new Date()),
    ],
  );
  // eslint-disable-next-line no-console
  console.log("[db] seeded default admin user");
}

export function isMysqlConfigured() {
  return hasMysqlConfig();
}

export function getPool(): DatabasePool | null {
  if (pool) return pool;
  if (hasMysqlConfig()) {
    const config = getConfig();
    mysqlPool = mysql.createPool({
      host: config.MYSQL_HOST,
      port: config.MYSQL_PORT,
      database: config.MYSQL_DATABASE,
      user: config.MYSQL_USER,
      password: config.MYSQL_PASSWORD,
      waitForConnections: true,
      connectionLimit: 10,
      dateStrings: true,
      decimalNumbers: true,
      charset: "utf8mb4_general_ci",
    });
    pool = new MysqlPool(mysqlPool);
    return pool;
  }

  try {
    pool = new BetterSqlitePool(openSqlite());
    return pool;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error("[sqlite] failed to create pool", error);
    return null;
  }
}

export async function initializeDatabase() {
  if (!initializationPromise) {
    initializationPromise = (async () => {
      if (hasMysqlConfig()) {
        try {
          const target = getPool();
          if (!target || !mysqlPool) return false;
          await ensureMysqlSchema(mysqlPool);
          await seedAdmin(target);
          return true;
        } catch (error) {
          // eslint-disable-next-line no-console
          console.error("[mysql] initialization failed", error);
          return false;
        }
      }

      try {
        const target = getPool();
        if (!target) return false;
        ensureSqliteSchema(openSqlite());
        await seedAdmin(target);
        return true;
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error("[sqlite] initialization failed", error);
        return false;
      }
    })();
  }
  return initializationPromise;
}

export async function getInitializedPool(): Promise<DatabasePool> {
  const ready = await initializeDatabase();
  const target = ready ? getPool() : null;
  if (!target) throw new Error("Database not configured");
  return target;
}

/**
 * Runs `work` inside one transaction on a dedicated connection, committing on
 * success and rolling back on any thrown error.
 */
export async function withTransaction<T>(
  work: (conn: DatabaseConnection) => Promise<T>,
): Promise<T> {
  const target = await getInitializedPool();
  const conn = await target.getConnection();
  try {
    await conn.beginTransaction();
    const result = await work(conn);
    await conn.commit();
    return result;
  } catch (error) {
    await conn.rollback();
    throw error;
  } finally {
    conn.release();
  }
}

/** Row lock suffix for a SELECT inside a transaction; SQLite locks the whole file instead. */
export function forUpdate(db: Queryable): string {
  return db.dialect === "mysql" ? " FOR UPDATE" : "";
}

export async function closeDatabase() {
  if (mysqlPool) {
    await mysqlPool.end();
    mysqlPool = null;
  }
  if (sqliteDb) {
    sqliteDb.close();
    sqliteDb = null;
  }
  pool = null;
  initializationPromise = null;
}
