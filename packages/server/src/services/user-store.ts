/**
 * Account persistence (better-sqlite3)
 *
 * Username uniqueness is enforced by the UNIQUE constraint on the table,
 * not by a lookup before insert.
 */

import Database from "better-sqlite3";
import type { Database as SqliteDatabase, Statement } from "better-sqlite3";
import type { Account } from "@credvault/shared";
import { DuplicateUsernameError, StorageUnavailableError } from "../errors.js";

export const ACCOUNTS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    external_identity TEXT NOT NULL,
    encrypted_secret TEXT NOT NULL,
    created_at TEXT NOT NULL
  )
`;

interface AccountRow {
  id: number;
  username: string;
  external_identity: string;
  encrypted_secret: string;
  created_at: string;
}

const SELECT_COLUMNS =
  "id, username, external_identity, encrypted_secret, created_at";

/**
 * Open a database handle. File databases use WAL so readers do not block
 * the writer; ":memory:" is used by tests.
 */
export function openDatabase(path: string): SqliteDatabase {
  try {
    const db = new Database(path);
    if (path !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    db.pragma("busy_timeout = 5000");
    return db;
  } catch (error) {
    throw new StorageUnavailableError("open database", { cause: error });
  }
}

export class UserStore {
  private insertStmt: Statement<[string, string, string, string]> | null = null;
  private byUsernameStmt: Statement<[string], AccountRow> | null = null;
  private byIdStmt: Statement<[number], AccountRow> | null = null;

  constructor(private db: SqliteDatabase) {}

  /**
   * Create the accounts table if it does not exist. Safe on every startup.
   */
  migrate(): void {
    this.run("migrate", () => {
      this.db.exec(ACCOUNTS_SCHEMA);
      this.insertStmt = this.db.prepare<[string, string, string, string]>(
        "INSERT INTO accounts (username, external_identity, encrypted_secret, created_at) VALUES (?, ?, ?, ?)"
      );
      this.byUsernameStmt = this.db.prepare<[string], AccountRow>(
        `SELECT ${SELECT_COLUMNS} FROM accounts WHERE username = ?`
      );
      this.byIdStmt = this.db.prepare<[number], AccountRow>(
        `SELECT ${SELECT_COLUMNS} FROM accounts WHERE id = ?`
      );
    });
  }

  /**
   * Insert an account and return its id.
   * @throws DuplicateUsernameError when the username is taken
   */
  insert(username: string, externalIdentity: string, encryptedSecret: string): number {
    const stmt = this.prepared(this.insertStmt);
    try {
      const result = stmt.run(
        username,
        externalIdentity,
        encryptedSecret,
        new Date().toISOString()
      );
      return Number(result.lastInsertRowid);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateUsernameError();
      }
      throw new StorageUnavailableError("insert account", { cause: error });
    }
  }

  findByUsername(username: string): Account | null {
    const stmt = this.prepared(this.byUsernameStmt);
    const row = this.run("find account by username", () => stmt.get(username));
    return row ? toAccount(row) : null;
  }

  findById(id: number): Account | null {
    const stmt = this.prepared(this.byIdStmt);
    const row = this.run("find account by id", () => stmt.get(id));
    return row ? toAccount(row) : null;
  }

  close(): void {
    this.db.close();
  }

  private prepared<T>(stmt: T | null): T {
    if (!stmt) {
      throw new StorageUnavailableError("UserStore used before migrate()");
    }
    return stmt;
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageUnavailableError(operation, { cause: error });
    }
  }
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    error.code === "SQLITE_CONSTRAINT_UNIQUE"
  );
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    username: row.username,
    externalIdentity: row.external_identity,
    encryptedSecret: row.encrypted_secret,
    createdAt: row.created_at,
  };
}
