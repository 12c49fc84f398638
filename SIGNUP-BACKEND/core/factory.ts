//core/factory.ts

import { readFileSync } from 'node:fs';
import { DateTime, IANAZone } from 'luxon';
import { z } from 'zod';
import { RevealConfig } from './types';
import { ConfigError } from './errors';
import { monthDayKey } from './reveal';

export const DEFAULT_TIMEZONE = 'America/Toronto';

export const revealFileSchema = z.object({
  timezone: z.string().min(1).optional(),
  // "Sep 26": "2025-09-24T00:00" (wall clock in the configured zone)
  reveals: z.record(z.string().min(1)),
});

export type RevealFile = z.infer<typeof revealFileSchema>;

export function readRevealFile(file: string): RevealFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Could not read reveal schedule '${file}': ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = revealFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid reveal schedule '${file}': ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

export function makeRevealConfig(opts: {
  timezone: string;
  reveals: Record<string, string>;
}): RevealConfig {
  if (!IANAZone.isValidZone(opts.timezone)) {
    throw new ConfigError(`Unknown timezone '${opts.timezone}'`);
  }

  const schedule = new Map<string, DateTime>();
  for (const [rawKey, rawInstant] of Object.entries(opts.reveals)) {
    const key = monthDayKey(rawKey);
    if (key === null) throw new ConfigError(`Reveal key '${rawKey}' is not a "Mon DD" day`);
    if (schedule.has(key)) throw new ConfigError(`Reveal key '${rawKey}' duplicates '${key}'`);

    const revealAt = DateTime.fromISO(rawInstant, { zone: opts.timezone });
    if (!revealAt.isValid) throw new ConfigError(`Reveal time '${rawInstant}' for '${rawKey}' is not an ISO date-time`);
    schedule.set(key, revealAt);
  }

  return { timezone: opts.timezone, schedule };
}
