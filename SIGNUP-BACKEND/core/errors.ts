// core/errors.ts

export class SignupError extends Error {
  status: number;
  code: string;

  constructor(message: string, status: number, code?: string) {
    super(message);
    this.name = 'SignupError';
    this.status = status;
    this.code = code || `HTTP_${status}`;
  }
}

// Fatal for the current request: nothing works without a schedule.
export class ScheduleNotFoundError extends SignupError {
  constructor(public file: string) {
    super(`The schedule file '${file}' was not found.`, 503, 'SCHEDULE_NOT_FOUND');
    this.name = 'ScheduleNotFoundError';
  }
}

export class TeamNotFoundError extends SignupError {
  constructor(teamName: string, debateId?: number) {
    super(
      debateId === undefined
        ? `Team name '${teamName}' not found. Please check the spelling and try again.`
        : `Team '${teamName}' has no slot in debate ${debateId}.`,
      404,
      'TEAM_NOT_FOUND',
    );
    this.name = 'TeamNotFoundError';
  }
}

export class DeadlinePassedError extends SignupError {
  constructor(debateId: number) {
    super(`Sign-up for debate ${debateId} is closed.`, 409, 'DEADLINE_PASSED');
    this.name = 'DeadlinePassedError';
  }
}

export class ResetNotConfirmedError extends SignupError {
  constructor(reason: string) {
    super(`Reset not confirmed: ${reason}`, 409, 'RESET_NOT_CONFIRMED');
    this.name = 'ResetNotConfirmedError';
  }
}

// Startup only; the process refuses to boot.
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
