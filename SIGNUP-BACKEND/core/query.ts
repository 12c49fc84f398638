// core/query.ts

// Read-side authority for what each viewer may see.
// Pure functions of (schedule, submissions, reveal policy, now): no hidden state.

import type { DateTime } from 'luxon';
import {
  BoardRow,
  DebateRecord,
  Label,
  MissingSubmission,
  OpenAssignment,
  Snapshot,
  SubmissionRecord,
  TeamAssignment,
} from './types';

export function isBefore(a: DateTime, b: DateTime) {
  return a.toMillis() < b.toMillis();
}

export function findSubmission(submissions: SubmissionRecord[], debateId: number, stakeholder: string) {
  return submissions.find(s => s.debateId === debateId && s.stakeholder === stakeholder);
}

export function visiblePosition(
  snap: Snapshot,
  debateId: number,
  stakeholder: string,
  teamName: string,
  now: DateTime,
): Label {
  if (!teamName) return { kind: 'EMPTY' };

  const debate = snap.schedule.find(d => d.debateId === debateId);
  const revealAt = debate ? snap.policy.revealInstant(debate) : null;
  if (!revealAt) return { kind: 'CONFIG_ERROR' };
  if (isBefore(now, revealAt)) return { kind: 'PENDING', revealAt };

  const sub = findSubmission(snap.submissions, debateId, stakeholder);
  return sub ? { kind: 'REVEALED', position: sub.position } : { kind: 'NOT_SUBMITTED' };
}

// Past-deadline slots with no record; drives the instructor override list.
export function missingSubmissions(snap: Snapshot, now: DateTime): MissingSubmission[] {
  const out: MissingSubmission[] = [];
  for (const debate of snap.schedule) {
    const revealAt = snap.policy.revealInstant(debate);
    if (!revealAt || isBefore(now, revealAt)) continue;
    for (const { team, stakeholder } of debate.slots) {
      if (!team || !stakeholder) continue;
      if (findSubmission(snap.submissions, debate.debateId, stakeholder)) continue;
      out.push({ debateId: debate.debateId, teamName: team, stakeholder });
    }
  }
  return out;
}

export function normalizeTeam(name: string) {
  return name.trim().toLowerCase();
}

export function debatesForTeam(schedule: DebateRecord[], teamName: string): TeamAssignment[] {
  const wanted = normalizeTeam(teamName);
  if (!wanted) return [];

  const found: TeamAssignment[] = [];
  for (const debate of schedule) {
    for (const slot of debate.slots) {
      if (normalizeTeam(slot.team) === wanted) {
        found.push({ debate, stakeholder: slot.stakeholder });
      }
    }
  }
  return found;
}

// Still open = reveal instant unknown or not reached yet.
export function isOpen(revealAt: DateTime | null, now: DateTime) {
  return !revealAt || isBefore(now, revealAt);
}

export function openDebatesForTeam(snap: Snapshot, teamName: string, now: DateTime): OpenAssignment[] {
  return debatesForTeam(snap.schedule, teamName)
    .map(a => {
      const revealAt = snap.policy.revealInstant(a.debate);
      const current = findSubmission(snap.submissions, a.debate.debateId, a.stakeholder);
      return { ...a, revealAt, currentPosition: current?.position ?? null };
    })
    .filter(a => isOpen(a.revealAt, now));
}

export function scheduleBoard(snap: Snapshot, now: DateTime, team?: string): BoardRow[] {
  const debates = team
    ? snap.schedule.filter(d => d.slots.some(s => s.team === team))
    : snap.schedule;

  return debates.map(d => ({
    debateId: d.debateId,
    dateTime: d.dateTime,
    resolution: d.resolution,
    slots: d.slots.map(s => ({
      ...s,
      label: visiblePosition(snap, d.debateId, s.stakeholder, s.team, now),
    })),
  }));
}

export function listTeams(schedule: DebateRecord[]): string[] {
  const teams = new Set<string>();
  schedule.forEach(d => d.slots.forEach(s => { if (s.team) teams.add(s.team); }));
  return [...teams].sort();
}

export function formatLabel(label: Label, timezone: string): string {
  switch (label.kind) {
    case 'EMPTY': return '—';
    case 'CONFIG_ERROR': return 'CONFIG ERROR';
    case 'PENDING': return `Reveals ${label.revealAt.setZone(timezone).setLocale('en-US').toFormat('MMM dd')}`;
    case 'REVEALED': return label.position;
    case 'NOT_SUBMITTED': return 'Not Submitted';
  }
}
