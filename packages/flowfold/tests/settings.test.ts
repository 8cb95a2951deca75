import { describe, test, expect } from 'vitest'
import { SettingsError } from '../src/errors.js'
import { LocalExecutor } from '../src/local/executor.js'
import { resolveSettings } from '../src/settings.js'

describe('resolveSettings', () => {
  test('fills in defaults', () => {
    expect(resolveSettings({})).toEqual({
      stateCapacity: 10_000,
      broadcastJoinThreshold: 1_000,
      batchSize: 1_000,
    })
  })

  test('keeps given values', () => {
    expect(
      resolveSettings({ stateCapacity: 5, broadcastJoinThreshold: 0 }),
    ).toEqual({ stateCapacity: 5, broadcastJoinThreshold: 0, batchSize: 1_000 })
  })

  test('rejects invalid values with one issue per problem', () => {
    try {
      resolveSettings({ stateCapacity: 0, batchSize: 1.5 })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(SettingsError)
      if (!(error instanceof SettingsError)) return
      expect(error.issues).toHaveLength(2)
      expect(error.issues[0]).toMatch(/^stateCapacity: /)
      expect(error.issues[1]).toMatch(/^batchSize: /)
    }
  })

  test('rejects unknown settings', () => {
    expect(() => resolveSettings({ capacity: 10 })).toThrow(SettingsError)
  })

  test('the local executor validates its settings', () => {
    expect(() => new LocalExecutor({ broadcastJoinThreshold: -1 })).toThrow(
      SettingsError,
    )
    expect(new LocalExecutor({ stateCapacity: 3 }).settings.stateCapacity).toBe(
      3,
    )
  })
})
