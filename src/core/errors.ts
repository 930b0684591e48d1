import type { ZodError } from 'zod';

// ── Input errors ─────────────────────────────────────────────

function describeIssues(err: ZodError): string[] {
  return err.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/** Malformed task input, rejected before it enters the state machine. */
export class InvalidTaskError extends Error {
  readonly exitCode = 3;

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidTaskError';
  }

  static fromZod(err: ZodError): InvalidTaskError {
    return new InvalidTaskError('Invalid task', describeIssues(err));
  }
}

/** A human decision that does not fit the escalation it answers. */
export class InvalidDecisionError extends Error {
  readonly exitCode = 3;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidDecisionError';
  }

  static fromZod(err: ZodError): InvalidDecisionError {
    return new InvalidDecisionError(`Invalid decision: ${describeIssues(err).join('; ')}`);
  }
}

export class UnknownTaskError extends Error {
  readonly exitCode = 4;

  constructor(readonly taskId: string) {
    super(`Unknown task ${taskId}`);
    this.name = 'UnknownTaskError';
  }
}

// ── Engine errors ────────────────────────────────────────────

export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal task transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Abort reason handed to in-flight provider calls. */
export class TaskAbortedError extends Error {
  constructor(
    readonly taskId: string,
    reason: string,
  ) {
    super(`Task ${taskId} aborted: ${reason}`);
    this.name = 'TaskAbortedError';
  }
}
