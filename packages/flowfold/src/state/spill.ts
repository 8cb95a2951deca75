/**
 * Byte storage that evicted state entries are written to.
 *
 * Implementations may throw; the state store reports failures as
 * `SpillIOError` and never retries.
 */
export interface SpillStorage {
  write(address: string, bytes: Uint8Array): void
  read(address: string): Uint8Array | undefined
  delete(address: string): void
  clear(): void
}

/**
 * Creates the storage for one named state store. Called lazily on first spill.
 */
export type SpillStorageFactory = (name: string) => SpillStorage

export class MemorySpillStorage implements SpillStorage {
  #data = new Map<string, Uint8Array>()

  write(address: string, bytes: Uint8Array): void {
    this.#data.set(address, bytes.slice())
  }

  read(address: string): Uint8Array | undefined {
    return this.#data.get(address)
  }

  delete(address: string): void {
    this.#data.delete(address)
  }

  clear(): void {
    this.#data.clear()
  }

  get size(): number {
    return this.#data.size
  }

  addresses(): string[] {
    return [...this.#data.keys()]
  }
}

export const memorySpillStorage: SpillStorageFactory = () =>
  new MemorySpillStorage()
