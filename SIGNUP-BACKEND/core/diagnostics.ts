// core/diagnostics.ts
// Instructor-only: schedule sanity check and clock debugger.

import type { DateTime } from 'luxon';
import { DebateRecord } from './types';
import { RevealPolicy } from './reveal';
import { isBefore } from './query';

export type ScheduleIssue =
  | { debateId: number; kind: 'unparseable'; dateTime: string; message: string }
  | { debateId: number; kind: 'missing-key'; dateTime: string; key: string; message: string };

export function scheduleDiagnostics(schedule: DebateRecord[], policy: RevealPolicy): ScheduleIssue[] {
  const issues: ScheduleIssue[] = [];
  for (const debate of schedule) {
    const d = policy.diagnose(debate);
    if (d.status === 'unparseable') {
      issues.push({
        debateId: debate.debateId,
        kind: 'unparseable',
        dateTime: d.dateTime,
        message: `Could not parse date '${d.dateTime}'. Use YYYY-MM-DD or "Mon DD".`,
      });
    } else if (d.status === 'missing-key') {
      issues.push({
        debateId: debate.debateId,
        kind: 'missing-key',
        dateTime: d.dateTime,
        key: d.key,
        message: `The date '${d.dateTime}' (key: '${d.key}') has no reveal time configured.`,
      });
    }
  }
  return issues;
}

const STAMP = 'yyyy-MM-dd HH:mm:ss ZZZZ';

export function clockDiagnostics(policy: RevealPolicy, now: DateTime) {
  const local = (dt: DateTime) => dt.setZone(policy.timezone).setLocale('en-US').toFormat(STAMP);
  return {
    timezone: policy.timezone,
    now: local(now),
    reveals: policy.entries().map(({ key, revealAt }) => ({
      key,
      revealAt: local(revealAt),
      beforeReveal: isBefore(now, revealAt),
    })),
  };
}
