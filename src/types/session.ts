import type { RemoteCommand } from '../services/remote-command';

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
  success: boolean;
};

export type SessionState = 'idle' | 'connected' | 'closed';

/**
 * One remote execution channel, exclusively owned by a single controller.
 * Command failures are returned as values; only connect() and misuse throw.
 */
export interface RemoteSession {
  readonly host: string;
  readonly state: SessionState;
  connect(): Promise<void>;
  execute(request: RemoteCommand, timeoutMs?: number): Promise<CommandResult>;
  close(): Promise<void>;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 300_000;

/** Exit code used when the command never produced one (channel error, timeout). */
export const EXEC_FAILURE_EXIT_CODE = -1;

export function commandResult(stdout: string, stderr: string, exitCode: number): CommandResult {
  return { stdout, stderr, exitCode, success: exitCode === 0 };
}
