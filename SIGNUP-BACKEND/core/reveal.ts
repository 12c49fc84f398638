// core/reveal.ts

// Decides when a debate's positions become visible.
// The reveal table is keyed by "Mon DD" so one config serves a whole course
// offering without per-debate timestamps.

import { DateTime } from 'luxon';
import { DebateRecord, RevealConfig } from './types';

const LOCALE = 'en-US';
const KEY_FORMAT = 'MMM dd';
// Fixed leap year so "Feb 29" always parses and keys never depend on today's date.
const KEY_YEAR = 2000;

export type RevealDiagnosis =
  | { status: 'ok'; key: string; revealAt: DateTime }
  | { status: 'empty' }
  | { status: 'unparseable'; dateTime: string }
  | { status: 'missing-key'; dateTime: string; key: string };

export class RevealPolicy {
  constructor(private cfg: RevealConfig) {}

  get timezone() { return this.cfg.timezone; }

  revealInstant(record: DebateRecord): DateTime | null {
    const d = this.diagnose(record);
    return d.status === 'ok' ? d.revealAt : null;
  }

  diagnose(record: DebateRecord): RevealDiagnosis {
    const dateTime = record.dateTime;
    if (!dateTime.trim()) return { status: 'empty' };

    const key = dayKey(dateTime);
    if (key === null) return { status: 'unparseable', dateTime };

    const revealAt = this.cfg.schedule.get(key);
    if (!revealAt) return { status: 'missing-key', dateTime, key };
    return { status: 'ok', key, revealAt };
  }

  // Configured keys in chronological order of their reveal instants
  entries(): Array<{ key: string; revealAt: DateTime }> {
    return [...this.cfg.schedule.entries()]
      .map(([key, revealAt]) => ({ key, revealAt }))
      .sort((a, b) => a.revealAt.toMillis() - b.revealAt.toMillis());
  }
}

// "2025-09-26 10:10" -> "Sep 26"; "Sep 26 10:10" -> "Sep 26"; otherwise null.
export function dayKey(dateTime: string): string | null {
  const tokens = dateTime.trim().split(/\s+/);
  if (!tokens[0]) return null;

  // YYYY-MM-DD first
  const iso = DateTime.fromFormat(tokens[0], 'yyyy-M-d', { locale: LOCALE, zone: 'utc' });
  if (iso.isValid) return iso.toFormat(KEY_FORMAT);

  // then "Mon DD"
  return monthDayKey(tokens.slice(0, 2).join(' '));
}

export function monthDayKey(text: string): string | null {
  const dt = DateTime.fromFormat(`${text.trim()} ${KEY_YEAR}`, 'MMM d yyyy', { locale: LOCALE, zone: 'utc' });
  return dt.isValid ? dt.toFormat(KEY_FORMAT) : null;
}
