// core/types

// Core Types (Debates, Slots, Submissions, Labels)

import type { DateTime } from 'luxon';

export const POSITIONS = ['For', 'Against'] as const;
export type Position = typeof POSITIONS[number];

export const SLOT_COUNT = 4;

export type Slot = {
  team: string;         // '' => no team assigned
  stakeholder: string;  // role, e.g. 'Government'
};

export type DebateRecord = {
  debateId: number;     // positive, unique across the schedule
  dateTime: string;     // raw "Date and Time" cell, e.g. "2025-09-26 10:10" or "Sep 26 10:10"
  resolution: string;
  slots: Slot[];        // always SLOT_COUNT entries, column order
};

export type SubmissionRecord = {
  debateId: number;
  stakeholder: string;
  teamName: string;
  position: Position;
  submittedAt: string;  // "yyyy-MM-dd HH:mm:ss ZZZZ" in the configured zone
};

// "Mon DD" day key -> reveal instant
export type RevealSchedule = ReadonlyMap<string, DateTime>;

export type RevealConfig = {
  timezone: string;
  schedule: RevealSchedule;
};

export type Label =
  | { kind: 'EMPTY' }
  | { kind: 'CONFIG_ERROR' }
  | { kind: 'PENDING'; revealAt: DateTime }
  | { kind: 'REVEALED'; position: Position }
  | { kind: 'NOT_SUBMITTED' };

export type MissingSubmission = {
  debateId: number;
  teamName: string;
  stakeholder: string;
};

export type TeamAssignment = {
  debate: DebateRecord;
  stakeholder: string;
};

export type OpenAssignment = TeamAssignment & {
  revealAt: DateTime | null;        // null => CONFIG_ERROR, still open
  currentPosition: Position | null;
};

export type BoardSlot = Slot & { label: Label };

export type BoardRow = {
  debateId: number;
  dateTime: string;
  resolution: string;
  slots: BoardSlot[];
};

// Everything one request cycle needs to answer visibility questions.
export type Snapshot = {
  schedule: DebateRecord[];
  submissions: SubmissionRecord[];
  policy: {
    revealInstant(record: DebateRecord): DateTime | null;
  };
};

export function isPosition(value: string): value is Position {
  return (POSITIONS as readonly string[]).includes(value);
}
