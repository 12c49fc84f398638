import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { DateTime } from 'luxon';
import { makeRevealConfig } from '../../core/factory';
import { RevealPolicy } from '../../core/reveal';
import { parseSchedule } from '../../core/schedule';
import { SubmissionFile, SubmissionTable } from '../../core/submissionsFile';
import { Snapshot, SubmissionRecord } from '../../core/types';

export const TZ = 'America/Toronto';

export const SCHEDULE_CSV = [
  'Debate,Date and Time,Resolution,Team 1,Stakeholder 1,Team 2,Stakeholder 2,Team 3,Stakeholder 3,Team 4,Stakeholder 4',
  '1,2025-09-20 10:10,"Cities should ban cars, downtown",Team A,Government,Team B,Opposition,,,,',
  '2,Sep 26 10:10,Homework should be optional,Team B,Government,Team C,Opposition,Team A,Students,,',
  '3,2025-12-31 09:00,Fireworks should be banned,Team C,Government,Team D,Opposition,,,,',
  '4,tomorrow,Uniforms should be mandatory,Team D,Government,,,,,,',
].join('\n') + '\n';

export const REVEALS = {
  'Sep 20': '2025-09-24T00:00',
  'Sep 26': '2025-09-25T00:00',
  'Oct 10': '2025-10-08T00:00',
};

export const at = (iso: string) => DateTime.fromISO(iso, { zone: TZ });

export function makePolicy() {
  return new RevealPolicy(makeRevealConfig({ timezone: TZ, reveals: REVEALS }));
}

export function makeSnapshot(submissions: SubmissionRecord[] = []): Snapshot {
  return { schedule: parseSchedule(SCHEDULE_CSV), submissions, policy: makePolicy() };
}

export function submission(debateId: number, stakeholder: string, teamName: string, position: 'For' | 'Against'): SubmissionRecord {
  return { debateId, stakeholder, teamName, position, submittedAt: '2025-09-22 10:15:00 EDT' };
}

// In-process stand-in for the CSV file
export class MemorySubmissionFile implements SubmissionFile {
  table: SubmissionTable | null = null;
  writes = 0;

  async read() {
    return this.table ? copy(this.table) : null;
  }
  async write(table: SubmissionTable) {
    this.writes++;
    this.table = copy(table);
  }
  async remove() {
    const existed = this.table !== null;
    this.table = null;
    return existed;
  }
}

const copy = (t: SubmissionTable): SubmissionTable => ({
  records: t.records.map(r => ({ ...r })),
  unreadable: t.unreadable.map(row => [...row]),
});

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), 'signup-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
