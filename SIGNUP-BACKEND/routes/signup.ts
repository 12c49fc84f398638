import { Router } from 'express';
import { asyncHandler } from '../middleware/error';
import { success, validationError } from '../lib/api-utils';
import { lookupSchema, signupSchema } from '../lib/validators';
import { Services, loadSnapshot } from '../lib/services';
import { debatesForTeam, openDebatesForTeam } from '../core/query';
import { submitPosition } from '../core/submit';
import { TeamNotFoundError } from '../core/errors';

export function signupRouter(s: Services) {
  const router = Router();

  /**
   * POST /api/signup/lookup
   * Step 1: find every slot the team holds, and which are still open
   */
  router.post(
    '/lookup',
    asyncHandler(async (req, res) => {
      const parsed = lookupSchema.safeParse(req.body);
      if (!parsed.success) return validationError(res, parsed.error);

      const { teamName } = parsed.data;
      const snap = await loadSnapshot(s);
      const assignments = debatesForTeam(snap.schedule, teamName);
      if (assignments.length === 0) throw new TeamNotFoundError(teamName);

      const open = openDebatesForTeam(snap, teamName, s.now());
      return success(res, {
        teamName,
        assignments: assignments.map((a) => ({
          debateId: a.debate.debateId,
          dateTime: a.debate.dateTime,
          resolution: a.debate.resolution,
          stakeholder: a.stakeholder,
        })),
        open: open.map((a) => ({
          debateId: a.debate.debateId,
          resolution: a.debate.resolution,
          stakeholder: a.stakeholder,
          revealAt: a.revealAt?.toISO() ?? null,
          currentPosition: a.currentPosition,
        })),
      });
    })
  );

  /**
   * POST /api/signup
   * Step 2: declare (or change) a position before the deadline
   */
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = signupSchema.safeParse(req.body);
      if (!parsed.success) return validationError(res, parsed.error);

      const snap = await loadSnapshot(s);
      const { stakeholder } = await submitPosition(
        { schedule: snap.schedule, policy: s.policy, store: s.store },
        parsed.data,
        s.now
      );
      s.notify({ reason: 'submitted', debateId: parsed.data.debateId });
      return success(res, { ...parsed.data, stakeholder }, 201);
    })
  );

  return router;
}
