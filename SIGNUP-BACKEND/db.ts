// db.ts
import { Mutex } from 'async-mutex';
import { DateTime } from 'luxon';
import { Position, SubmissionRecord } from './core/types';
import { CsvSubmissionFile, SubmissionFile, SubmissionTable } from './core/submissionsFile';

export type StoreOptions = {
  timezone: string;
  now?: () => DateTime;
};

export const SUBMITTED_AT_FORMAT = 'yyyy-MM-dd HH:mm:ss ZZZZ';

/**
 * Single writer for the submissions table.
 *
 * Every load and every read-modify-write runs inside one process-wide mutex,
 * so two concurrent upserts can never interleave between reload and rewrite.
 */
export class SubmissionStore {
  private lock = new Mutex();
  private file: SubmissionFile;
  private now: () => DateTime;

  constructor(file: string | SubmissionFile, private opts: StoreOptions) {
    this.file = typeof file === 'string' ? new CsvSubmissionFile(file) : file;
    this.now = opts.now ?? (() => DateTime.now());
  }

  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  loadAll(): Promise<SubmissionRecord[]> {
    return this.withLock(async () => (await this.loadUnlocked()).records);
  }

  /**
   * `guard` runs once the lock is held and before anything is read; throwing
   * from it aborts the upsert with nothing written.
   */
  upsert(
    debateId: number,
    stakeholder: string,
    teamName: string,
    position: Position,
    guard?: () => void,
  ): Promise<void> {
    return this.withLock(async () => {
      guard?.();
      const table = await this.loadUnlocked();
      const { records } = table;
      const submittedAt = this.timestamp();
      const existing = records.find(r => r.debateId === debateId && r.stakeholder === stakeholder);
      if (existing) {
        existing.teamName = teamName;
        existing.position = position;
        existing.submittedAt = submittedAt;
      } else {
        records.push({ debateId, stakeholder, teamName, position, submittedAt });
      }
      await this.file.write(table);
      console.log(`[store] ${existing ? 'updated' : 'added'} debate ${debateId} / ${stakeholder}: ${teamName} -> ${position}`);
    });
  }

  // Irreversible. Returns how many records were deleted.
  reset(): Promise<number> {
    return this.withLock(async () => {
      let n = 0;
      try {
        n = (await this.file.read())?.records.length ?? 0;
      } catch (e) {
        console.warn(`[store] reset: submissions file unreadable (${e instanceof Error ? e.message : String(e)}), deleting anyway`);
      }
      await this.file.remove();
      console.log(`[store] reset: ${n} submission(s) deleted`);
      return n;
    });
  }

  private async loadUnlocked(): Promise<SubmissionTable> {
    const table = await this.file.read();
    if (table !== null) return table;
    const empty: SubmissionTable = { records: [], unreadable: [] };
    await this.file.write(empty);
    return empty;
  }

  private timestamp() {
    return this.now().setZone(this.opts.timezone).setLocale('en-US').toFormat(SUBMITTED_AT_FORMAT);
  }
}
