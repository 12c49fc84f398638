// core/schedule.ts
// Reads the debate schedule CSV. Reloaded on every request cycle, never cached.

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DebateRecord, SLOT_COUNT, Slot } from './types';
import { ScheduleNotFoundError, isMissingFile } from './errors';

const rowsSchema = z.array(z.record(z.string()));

type Row = Record<string, string>;

// Hand-edited sheets: ragged rows and stray quotes inside unquoted cells are tolerated.
export const CSV_READ_OPTIONS = {
  columns: true,
  bom: true,
  skip_empty_lines: true,
  relax_column_count: true,
  relax_quotes: true,
} as const;

export async function loadSchedule(file: string): Promise<DebateRecord[]> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (e) {
    if (isMissingFile(e)) throw new ScheduleNotFoundError(file);
    throw e;
  }

  const records = parseSchedule(text);
  if (records.length === 0) throw new ScheduleNotFoundError(file);
  return records;
}

export function parseSchedule(text: string): DebateRecord[] {
  const rows = rowsSchema.parse(parse(text, CSV_READ_OPTIONS));

  const seen = new Set<number>();
  const out: DebateRecord[] = [];
  rows.forEach((row, i) => {
    const record = toDebateRecord(row);
    if (!record) {
      console.warn(`[schedule] row ${i + 2}: Debate '${field(row, 'Debate')}' is not a positive integer, skipped`);
      return;
    }
    if (seen.has(record.debateId)) {
      console.warn(`[schedule] row ${i + 2}: duplicate Debate ${record.debateId}, skipped`);
      return;
    }
    seen.add(record.debateId);
    out.push(record);
  });
  return out;
}

function toDebateRecord(row: Row): DebateRecord | null {
  const debateId = parseDebateId(field(row, 'Debate'));
  if (debateId === null) return null;

  const slots: Slot[] = [];
  for (let i = 1; i <= SLOT_COUNT; i++) {
    slots.push({
      team: field(row, `Team ${i}`).trim(),
      stakeholder: field(row, `Stakeholder ${i}`).trim(),
    });
  }

  return {
    debateId,
    dateTime: field(row, 'Date and Time'),
    resolution: field(row, 'Resolution'),
    slots,
  };
}

export function parseDebateId(raw: string): number | null {
  const s = raw.trim();
  if (!/^\d+$/.test(s)) return null;
  const n = Number(s);
  return n > 0 ? n : null;
}

// Missing columns read as ''
function field(row: Row, name: string): string {
  return row[name] ?? '';
}
