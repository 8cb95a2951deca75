import type { Database } from 'better-sqlite3'

/**
 * A prepared statement. Rows are returned untyped; callers narrow them.
 */
export interface SQLiteStatement<Params extends unknown[] = unknown[]> {
  run(...params: Params): void
  get(...params: Params): unknown
  all(...params: Params): unknown[]
}

/**
 * Minimal database surface used by the SQLite spill storage
 */
export interface SQLiteDb {
  exec(sql: string): void
  prepare<Params extends unknown[] = unknown[]>(
    sql: string,
  ): SQLiteStatement<Params>
}

/**
 * Wrapper for better-sqlite3 to implement the SQLiteDb interface
 */
export class BetterSQLite3Wrapper implements SQLiteDb {
  #db: Database

  constructor(db: Database) {
    this.#db = db
  }

  exec(sql: string): void {
    this.#db.exec(sql)
  }

  prepare<Params extends unknown[] = unknown[]>(
    sql: string,
  ): SQLiteStatement<Params> {
    const stmt = this.#db.prepare(sql)
    return {
      run: (...params: Params) => {
        stmt.run(...params)
      },
      get: (...params: Params): unknown => stmt.get(...params),
      all: (...params: Params): unknown[] => stmt.all(...params),
    }
  }

  close(): void {
    this.#db.close()
  }
}
