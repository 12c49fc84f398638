import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { SubmissionStore } from '../../db'
import { ResetGuard } from '../reset'
import { ResetNotConfirmedError } from '../errors'
import { MemorySubmissionFile, TZ } from '../../__tests__/helpers/fixtures'

let store: SubmissionStore
let clock: number
let guard: ResetGuard

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  store = new SubmissionStore(new MemorySubmissionFile(), { timezone: TZ })
  await store.upsert(1, 'Government', 'Team A', 'For')
  await store.upsert(2, 'Government', 'Team B', 'Against')
  clock = 1_000_000
  guard = new ResetGuard(store, 60_000, () => clock)
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('ResetGuard', () => {
  it('deletes everything after acknowledgement', async () => {
    const { token, expiresAt } = guard.acknowledge()
    expect(expiresAt).toBe(1_060_000)
    expect(await guard.confirm(token)).toBe(2)
    expect(await store.loadAll()).toEqual([])
  })

  it('refuses without a token', async () => {
    await expect(guard.confirm(undefined)).rejects.toBeInstanceOf(ResetNotConfirmedError)
    expect(await store.loadAll()).toHaveLength(2)
  })

  it('refuses an unknown token', async () => {
    guard.acknowledge()
    await expect(guard.confirm('00000000-0000-4000-8000-000000000000')).rejects.toThrow('unknown or already used token')
    expect(await store.loadAll()).toHaveLength(2)
  })

  it('accepts each token once', async () => {
    const { token } = guard.acknowledge()
    await guard.confirm(token)
    await expect(guard.confirm(token)).rejects.toThrow('unknown or already used token')
  })

  it('refuses an expired token', async () => {
    const { token } = guard.acknowledge()
    clock += 60_001
    await expect(guard.confirm(token)).rejects.toThrow('token expired')
    expect(await store.loadAll()).toHaveLength(2)
  })
})
