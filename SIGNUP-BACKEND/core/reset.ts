// core/reset.ts
// Two-step reset: acknowledge() hands out a one-time token, confirm(token) deletes.

import { v4 as uuid } from 'uuid';
import { SubmissionStore } from '../db';
import { ResetNotConfirmedError } from './errors';

export const RESET_TOKEN_TTL_MS = 5 * 60 * 1000;

export class ResetGuard {
  private tokens = new Map<string, number>(); // token -> expiresAt (ms)

  constructor(
    private store: SubmissionStore,
    private ttlMs = RESET_TOKEN_TTL_MS,
    private clock: () => number = Date.now,
  ) {}

  acknowledge(): { token: string; expiresAt: number } {
    this.prune();
    const token = uuid();
    const expiresAt = this.clock() + this.ttlMs;
    this.tokens.set(token, expiresAt);
    console.log('[reset] acknowledgement issued');
    return { token, expiresAt };
  }

  async confirm(token: string | undefined): Promise<number> {
    if (!token) throw new ResetNotConfirmedError('acknowledgement token required');
    const expiresAt = this.tokens.get(token);
    this.tokens.delete(token); // one use, even when expired
    if (expiresAt === undefined) throw new ResetNotConfirmedError('unknown or already used token');
    if (this.clock() > expiresAt) throw new ResetNotConfirmedError('token expired');
    return this.store.reset();
  }

  private prune() {
    const now = this.clock();
    for (const [token, expiresAt] of this.tokens) {
      if (now > expiresAt) this.tokens.delete(token);
    }
  }
}
