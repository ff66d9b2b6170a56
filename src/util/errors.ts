export class BlackjackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Broken bookkeeping: the round cannot continue with misaligned state. */
export class InvariantError extends BlackjackError {}

export class ShoeExhaustedError extends BlackjackError {
  constructor(dealt: number) {
    super(`shoe exhausted after ${dealt} cards`);
  }
}

/** Table misconfiguration or a round that cannot be seated. */
export class TableError extends BlackjackError {}

/** Fallible bookkeeping operations report through this instead of throwing. */
export type Result = { ok: true } | { ok: false; reason: string };

export const OK: Result = Object.freeze({ ok: true as const });

export function fail(reason: string): Result {
  return { ok: false, reason };
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}
