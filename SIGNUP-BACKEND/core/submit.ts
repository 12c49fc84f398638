// core/submit.ts
import type { DateTime } from 'luxon';
import { DebateRecord, Position } from './types';
import { RevealPolicy } from './reveal';
import { SubmissionStore } from '../db';
import { debatesForTeam, isOpen } from './query';
import { DeadlinePassedError, TeamNotFoundError } from './errors';

export type SubmitContext = {
  schedule: DebateRecord[];
  policy: RevealPolicy;
  store: SubmissionStore;
};

export async function submitPosition(ctx: SubmitContext, args: {
  teamName: string;
  debateId: number;
  position: Position;
}, now: () => DateTime): Promise<{ stakeholder: string }> {
  // Basic guard: the team must hold a slot in this debate, and sign-up must still be open
  const assignment = debatesForTeam(ctx.schedule, args.teamName)
    .find(a => a.debate.debateId === args.debateId);
  if (!assignment) throw new TeamNotFoundError(args.teamName, args.debateId);

  // Deadline checked under the store lock, against the clock at that moment.
  const revealAt = ctx.policy.revealInstant(assignment.debate);
  await ctx.store.upsert(args.debateId, assignment.stakeholder, args.teamName, args.position, () => {
    if (!isOpen(revealAt, now())) throw new DeadlinePassedError(args.debateId);
  });
  return { stakeholder: assignment.stakeholder };
}

// Instructor override: no deadline, no slot check.
export async function forcePosition(store: SubmissionStore, args: {
  debateId: number;
  stakeholder: string;
  teamName: string;
  position: Position;
}) {
  await store.upsert(args.debateId, args.stakeholder, args.teamName, args.position);
}
