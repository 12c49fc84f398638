// config.ts
// Read once at process start; everything downstream receives the frozen value.

import path from 'node:path';
import { RevealConfig } from './core/types';
import { ConfigError } from './core/errors';
import { DEFAULT_TIMEZONE, makeRevealConfig, readRevealFile } from './core/factory';

export type AppConfig = Readonly<{
  port: number;
  scheduleFile: string;
  submissionsFile: string;
  revealScheduleFile: string;
  reveal: RevealConfig;
  instructorPassword: string;
  corsOrigin: string;
}>;

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, cwd = process.cwd()): AppConfig {
  const resolve = (v: string | undefined, fallback: string) => path.resolve(cwd, v || fallback);

  const instructorPassword = env.INSTRUCTOR_PASSWORD;
  if (!instructorPassword) throw new ConfigError('INSTRUCTOR_PASSWORD is not set');

  const port = Number(env.PORT || 3000);
  if (!Number.isInteger(port) || port < 0) throw new ConfigError(`PORT '${env.PORT}' is not a port number`);

  const revealScheduleFile = resolve(env.REVEAL_SCHEDULE_FILE, 'reveal-schedule.json');
  const revealFile = readRevealFile(revealScheduleFile);

  return Object.freeze({
    port,
    scheduleFile: resolve(env.SCHEDULE_FILE, 'schedule.csv'),
    submissionsFile: resolve(env.SUBMISSIONS_FILE, 'submissions.csv'),
    revealScheduleFile,
    reveal: makeRevealConfig({
      timezone: env.TIMEZONE || revealFile.timezone || DEFAULT_TIMEZONE,
      reveals: revealFile.reveals,
    }),
    instructorPassword,
    corsOrigin: env.FRONTEND_URL || '*',
  });
}
