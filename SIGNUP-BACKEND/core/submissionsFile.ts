// core/submissionsFile.ts
// Persistence for the submissions table. The store only talks to SubmissionFile,
// so the full in-place rewrite below can be swapped for a temp-file + rename
// strategy without touching the locking or upsert logic.

import { open, readFile, unlink } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { SubmissionRecord, isPosition } from './types';
import { isMissingFile } from './errors';
import { CSV_READ_OPTIONS, parseDebateId } from './schedule';

export const SUBMISSION_HEADERS = ['Debate Number', 'Stakeholder', 'Team Name', 'Position', 'Submission Time'] as const;

/**
 * One stored table. Rows that do not parse as a submission stay in
 * `unreadable` as raw cells in header order, and are written back with the same cell values.
 */
export type SubmissionTable = {
  records: SubmissionRecord[];
  unreadable: string[][];
};

export interface SubmissionFile {
  read(): Promise<SubmissionTable | null>;      // null => backing source absent
  write(table: SubmissionTable): Promise<void>;
  remove(): Promise<boolean>;                   // false => nothing to remove
}

const rowsSchema = z.array(z.record(z.string()));

export class CsvSubmissionFile implements SubmissionFile {
  constructor(public readonly path: string) {}

  async read(): Promise<SubmissionTable | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (e) {
      if (isMissingFile(e)) return null;
      throw e;
    }
    return parseSubmissions(text);
  }

  // Not atomic: a failure mid-write loses the previous table.
  async write(table: SubmissionTable): Promise<void> {
    const fh = await open(this.path, 'w');
    try {
      await fh.writeFile(serializeSubmissions(table), 'utf8');
      await fh.sync();
    } finally {
      await fh.close();
    }
  }

  async remove(): Promise<boolean> {
    try {
      await unlink(this.path);
      return true;
    } catch (e) {
      if (isMissingFile(e)) return false;
      throw e;
    }
  }
}

export function parseSubmissions(text: string): SubmissionTable {
  const rows = rowsSchema.parse(parse(text, CSV_READ_OPTIONS));

  const table: SubmissionTable = { records: [], unreadable: [] };
  rows.forEach((row, i) => {
    const debateId = parseDebateId(row['Debate Number'] ?? '');
    const position = row['Position'] ?? '';
    if (debateId === null || !isPosition(position)) {
      console.warn(`[store] submissions row ${i + 2} unreadable, kept as is`);
      table.unreadable.push(SUBMISSION_HEADERS.map(h => row[h] ?? ''));
      return;
    }
    table.records.push({
      debateId,
      stakeholder: row['Stakeholder'] ?? '',
      teamName: row['Team Name'] ?? '',
      position,
      submittedAt: row['Submission Time'] ?? '',
    });
  });
  return table;
}

export function serializeSubmissions({ records, unreadable }: SubmissionTable): string {
  return stringify([
    [...SUBMISSION_HEADERS],
    ...records.map(r => [String(r.debateId), r.stakeholder, r.teamName, r.position, r.submittedAt]),
    ...unreadable,
  ]);
}
