import { describe, it, expect, afterEach, vi } from 'vitest'
import { writeFile } from 'node:fs/promises'
import path from 'node:path'
import { loadSchedule, parseDebateId, parseSchedule } from '../schedule'
import { ScheduleNotFoundError } from '../errors'
import { SCHEDULE_CSV, withTempDir } from '../../__tests__/helpers/fixtures'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('parseSchedule', () => {
  it('reads every debate with four slots in column order', () => {
    const schedule = parseSchedule(SCHEDULE_CSV)
    expect(schedule.map(d => d.debateId)).toEqual([1, 2, 3, 4])
    expect(schedule[0]).toEqual({
      debateId: 1,
      dateTime: '2025-09-20 10:10',
      resolution: 'Cities should ban cars, downtown',
      slots: [
        { team: 'Team A', stakeholder: 'Government' },
        { team: 'Team B', stakeholder: 'Opposition' },
        { team: '', stakeholder: '' },
        { team: '', stakeholder: '' },
      ],
    })
  })

  it('strips a UTF-8 BOM from the header', () => {
    const schedule = parseSchedule('\uFEFF' + SCHEDULE_CSV)
    expect(schedule[0].debateId).toBe(1)
  })

  it('keeps stray quotes inside an unquoted cell', () => {
    const schedule = parseSchedule('Debate,Date and Time,Resolution,Team 1,Stakeholder 1\n1,2025-09-26,Say "no" to "x,Team A,Gov\n')
    expect(schedule).toHaveLength(1)
    expect(schedule[0].resolution).toBe('Say "no" to "x')
    expect(schedule[0].slots[0]).toEqual({ team: 'Team A', stakeholder: 'Gov' })
  })

  it('defaults missing columns to empty strings', () => {
    const schedule = parseSchedule('Debate,Team 1\n7,Team Z\n')
    expect(schedule).toEqual([{
      debateId: 7,
      dateTime: '',
      resolution: '',
      slots: [
        { team: 'Team Z', stakeholder: '' },
        { team: '', stakeholder: '' },
        { team: '', stakeholder: '' },
        { team: '', stakeholder: '' },
      ],
    }])
  })

  it('skips rows without a usable debate number, and duplicates', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const schedule = parseSchedule('Debate,Resolution\nabc,First\n0,Second\n5,Third\n5,Fourth\n')
    expect(schedule.map(d => d.resolution)).toEqual(['Third'])
    expect(warn).toHaveBeenCalledTimes(3)
  })
})

describe('parseDebateId', () => {
  it('accepts positive integers with surrounding spaces', () => {
    expect(parseDebateId(' 12 ')).toBe(12)
  })

  it('rejects zero, negatives and decimals', () => {
    expect(parseDebateId('0')).toBeNull()
    expect(parseDebateId('-3')).toBeNull()
    expect(parseDebateId('1.5')).toBeNull()
    expect(parseDebateId('')).toBeNull()
  })
})

describe('loadSchedule', () => {
  it('re-reads the file on every call', async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, 'schedule.csv')
      await writeFile(file, SCHEDULE_CSV)
      expect(await loadSchedule(file)).toHaveLength(4)

      await writeFile(file, 'Debate,Resolution\n9,Only one\n')
      expect((await loadSchedule(file)).map(d => d.debateId)).toEqual([9])
    })
  })

  it('fails with ScheduleNotFoundError when the file is absent', async () => {
    await withTempDir(async (dir) => {
      await expect(loadSchedule(path.join(dir, 'nope.csv'))).rejects.toBeInstanceOf(ScheduleNotFoundError)
    })
  })

  it('treats a header-only file as not found', async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, 'schedule.csv')
      await writeFile(file, 'Debate,Date and Time,Resolution\n')
      await expect(loadSchedule(file)).rejects.toMatchObject({ code: 'SCHEDULE_NOT_FOUND', status: 503 })
    })
  })
})
