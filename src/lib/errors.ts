export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Raised when an SSH session cannot be established. Not retried here;
 * the owning controller's remaining operations are unusable.
 */
export class ConnectionError extends Error {
  readonly host: string;

  constructor(host: string, cause: unknown) {
    super(`failed to connect to ${host}: ${formatError(cause)}`, { cause });
    this.name = 'ConnectionError';
    this.host = host;
  }
}

/** A caller broke a precondition (e.g. executing on a closed session). */
export class StateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}

export type PhaseName =
  | 'target-setup'
  | 'target-verify'
  | 'initiator-discover'
  | 'initiator-connect';

/** A required orchestration phase failed; ends the run early. */
export class PhaseError extends Error {
  readonly phase: PhaseName;

  constructor(phase: PhaseName, message: string) {
    super(message);
    this.name = 'PhaseError';
    this.phase = phase;
  }
}
