import { Router } from 'express';
import { asyncHandler } from '../middleware/error';
import { success } from '../lib/api-utils';
import { Services, labelJson, loadSnapshot } from '../lib/services';
import { formatLabel, listTeams, scheduleBoard } from '../core/query';

export function scheduleRouter(s: Services) {
  const router = Router();

  /**
   * GET /api/schedule?team=
   * Full schedule with each slot's visible position
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const team = typeof req.query.team === 'string' && req.query.team ? req.query.team : undefined;
      const snap = await loadSnapshot(s);
      const rows = scheduleBoard(snap, s.now(), team).map((row) => ({
        ...row,
        slots: row.slots.map((slot) => ({
          team: slot.team,
          stakeholder: slot.stakeholder,
          label: labelJson(slot.label),
          display: formatLabel(slot.label, s.policy.timezone),
        })),
      }));
      return success(res, { teams: listTeams(snap.schedule), rows });
    })
  );

  return router;
}
