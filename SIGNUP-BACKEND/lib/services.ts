import { DateTime } from 'luxon';
import type { AppConfig } from '../config';
import { SubmissionStore } from '../db';
import { RevealPolicy } from '../core/reveal';
import { ResetGuard } from '../core/reset';
import { loadSchedule } from '../core/schedule';
import { Label, Snapshot } from '../core/types';

export type SubmissionsChanged = {
  reason: 'submitted' | 'override' | 'reset';
  debateId?: number;
};

export type Notifier = (event: SubmissionsChanged) => void;

export type Services = {
  config: AppConfig;
  store: SubmissionStore;
  policy: RevealPolicy;
  resetGuard: ResetGuard;
  notify: Notifier;
  now: () => DateTime;
};

export function makeServices(config: AppConfig, overrides: Partial<Omit<Services, 'config'>> = {}): Services {
  const now = overrides.now ?? (() => DateTime.now());
  const store = overrides.store ?? new SubmissionStore(config.submissionsFile, { timezone: config.reveal.timezone, now });
  return {
    config,
    store,
    policy: overrides.policy ?? new RevealPolicy(config.reveal),
    resetGuard: overrides.resetGuard ?? new ResetGuard(store),
    notify: overrides.notify ?? (() => {}),
    now,
  };
}

// One request cycle: fresh schedule from disk, submissions under the store lock.
export async function loadSnapshot(s: Services): Promise<Snapshot> {
  const schedule = await loadSchedule(s.config.scheduleFile);
  const submissions = await s.store.loadAll();
  return { schedule, submissions, policy: s.policy };
}

export function labelJson(label: Label) {
  switch (label.kind) {
    case 'PENDING': return { kind: label.kind, revealAt: label.revealAt.toISO() };
    case 'REVEALED': return { kind: label.kind, position: label.position };
    default: return { kind: label.kind };
  }
}
