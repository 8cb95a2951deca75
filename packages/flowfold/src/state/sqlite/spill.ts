import type { SpillStorage, SpillStorageFactory } from '../spill.js'
import type { SQLiteDb, SQLiteStatement } from './database.js'

const NAME_PATTERN = /^[A-Za-z0-9_]+$/

/**
 * Spill storage backed by one SQLite table per state store.
 */
export class SQLiteSpillStorage implements SpillStorage {
  #db: SQLiteDb
  #table: string
  #statements: {
    write: SQLiteStatement<[string, Buffer]>
    read: SQLiteStatement<[string]>
    delete: SQLiteStatement<[string]>
    clear: SQLiteStatement<[]>
  }

  constructor(db: SQLiteDb, name: string) {
    if (!NAME_PATTERN.test(name)) {
      throw new Error(`Invalid spill storage name: ${name}`)
    }
    this.#db = db
    this.#table = `spill_${name}`

    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.#table} (
        address TEXT PRIMARY KEY,
        data BLOB NOT NULL
      )
    `)

    this.#statements = {
      write: this.#db.prepare(`
        INSERT INTO ${this.#table} (address, data)
        VALUES (?, ?)
        ON CONFLICT(address) DO UPDATE SET data = excluded.data
      `),
      read: this.#db.prepare(
        `SELECT data FROM ${this.#table} WHERE address = ?`,
      ),
      delete: this.#db.prepare(`DELETE FROM ${this.#table} WHERE address = ?`),
      clear: this.#db.prepare(`DELETE FROM ${this.#table}`),
    }
  }

  get table(): string {
    return this.#table
  }

  write(address: string, bytes: Uint8Array): void {
    this.#statements.write.run(address, Buffer.from(bytes))
  }

  read(address: string): Uint8Array | undefined {
    const row = this.#statements.read.get(address)
    if (row === undefined) return undefined
    if (
      typeof row === 'object' &&
      row !== null &&
      'data' in row &&
      row.data instanceof Uint8Array
    ) {
      return new Uint8Array(row.data)
    }
    throw new Error(`Unexpected row shape in ${this.#table}`)
  }

  delete(address: string): void {
    this.#statements.delete.run(address)
  }

  clear(): void {
    this.#statements.clear.run()
  }
}

/**
 * Spill storage factory creating a table per state store in `db`
 */
export function sqliteSpillStorage(db: SQLiteDb): SpillStorageFactory {
  return (name) => new SQLiteSpillStorage(db, name)
}
