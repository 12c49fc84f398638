import { Router } from 'express';
import { asyncHandler } from '../middleware/error';
import { requireInstructor } from '../middleware/auth';
import { success, validationError } from '../lib/api-utils';
import { overrideSchema, resetSchema } from '../lib/validators';
import { Services, loadSnapshot } from '../lib/services';
import { missingSubmissions } from '../core/query';
import { forcePosition } from '../core/submit';
import { loadSchedule } from '../core/schedule';
import { clockDiagnostics, scheduleDiagnostics } from '../core/diagnostics';

export function adminRouter(s: Services) {
  const router = Router();
  router.use(requireInstructor(s.config.instructorPassword));

  router.get(
    '/submissions',
    asyncHandler(async (_req, res) => {
      return success(res, { submissions: await s.store.loadAll() });
    })
  );

  /**
   * GET /api/admin/missing
   * Teams that missed their deadline
   */
  router.get(
    '/missing',
    asyncHandler(async (_req, res) => {
      const snap = await loadSnapshot(s);
      return success(res, { missing: missingSubmissions(snap, s.now()) });
    })
  );

  /**
   * POST /api/admin/override
   * Force a position, bypassing the deadline
   */
  router.post(
    '/override',
    asyncHandler(async (req, res) => {
      const parsed = overrideSchema.safeParse(req.body);
      if (!parsed.success) return validationError(res, parsed.error);

      await forcePosition(s.store, parsed.data);
      s.notify({ reason: 'override', debateId: parsed.data.debateId });
      return success(res, parsed.data, 201);
    })
  );

  // Danger zone: acknowledge first, then reset with the returned token
  router.post('/reset/acknowledge', (_req, res) => {
    const { token, expiresAt } = s.resetGuard.acknowledge();
    return success(res, {
      token,
      expiresAt: new Date(expiresAt).toISOString(),
      warning: 'This will delete all student submissions and cannot be undone.',
    });
  });

  router.post(
    '/reset',
    asyncHandler(async (req, res) => {
      const parsed = resetSchema.safeParse(req.body ?? {});
      if (!parsed.success) return validationError(res, parsed.error);

      const deleted = await s.resetGuard.confirm(parsed.data.token);
      s.notify({ reason: 'reset' });
      return success(res, { deleted });
    })
  );

  router.get(
    '/diagnostics',
    asyncHandler(async (_req, res) => {
      const schedule = await loadSchedule(s.config.scheduleFile);
      const issues = scheduleDiagnostics(schedule, s.policy);
      return success(res, {
        ok: issues.length === 0,
        issues,
        clock: clockDiagnostics(s.policy, s.now()),
      });
    })
  );

  return router;
}
