import { z } from 'zod'
import { SettingsError } from './errors.js'
import type { Comparator, Logger } from './types.js'
import type { SerializerFactory } from './state/serializer.js'
import type { SpillStorageFactory } from './state/spill.js'

export const settingsSchema = z
  .object({
    /** Maximum number of resident state entries per keyed operator */
    stateCapacity: z.number().int().positive().default(10_000),
    /** Inputs with an estimated size at or below this are broadcast in joins */
    broadcastJoinThreshold: z.number().int().nonnegative().default(1_000),
    /** Maximum number of source elements sent to the graph at once */
    batchSize: z.number().int().positive().default(1_000),
  })
  .strict()

export type SettingsInput = z.input<typeof settingsSchema>
export type Settings = z.output<typeof settingsSchema>

/**
 * Options that cannot be validated as plain data and are passed through as is.
 */
export interface RuntimeOptions {
  spillStorage?: SpillStorageFactory
  /** Serializes spilled accumulators, JSON with tagged values by default */
  serializer?: SerializerFactory
  comparators?: ReadonlyMap<string, Comparator<unknown>>
  onError?: (error: Error) => void
  debug?: boolean | Logger
}

export function resolveSettings(input: unknown = {}): Settings {
  const result = settingsSchema.safeParse(input)
  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    )
  }
  return result.data
}
