import { StateError } from '../../src/lib/errors';
import { renderCommand, type RemoteCommand, type RemoteCommandKind } from '../../src/services/remote-command';
import { commandResult, type CommandResult, type RemoteSession, type SessionState } from '../../src/types/session';

export type Responder = (request: RemoteCommand) => CommandResult | undefined;

export const ok = (stdout = ''): CommandResult => commandResult(stdout, '', 0);
export const fail = (stderr = 'failed', exitCode = 1): CommandResult => commandResult('', stderr, exitCode);

/**
 * Scripted in-process session. Every request is recorded; the responder
 * decides the result (success with empty output when it returns undefined).
 */
export class FakeSession implements RemoteSession {
  state: SessionState = 'idle';
  readonly executed: RemoteCommand[] = [];
  readonly timeouts: Array<number | undefined> = [];
  connectCalls = 0;
  closeCalls = 0;
  connectError?: Error;

  constructor(
    readonly host: string,
    private responder: Responder = () => undefined,
    private readonly journal?: string[]
  ) {}

  respond(responder: Responder): void {
    this.responder = responder;
  }

  async connect(): Promise<void> {
    this.connectCalls += 1;
    if (this.connectError) throw this.connectError;
    if (this.state === 'closed') throw new StateError(`session to ${this.host} is closed`);
    this.state = 'connected';
  }

  async execute(request: RemoteCommand, timeoutMs?: number): Promise<CommandResult> {
    if (this.state !== 'connected') throw new StateError('not connected');
    this.executed.push(request);
    this.timeouts.push(timeoutMs);
    this.journal?.push(`${this.host}:${request.kind}`);
    return this.responder(request) ?? ok();
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    if (this.state !== 'closed') this.journal?.push(`${this.host}:close`);
    this.state = 'closed';
  }

  kinds(): RemoteCommandKind[] {
    return this.executed.map((request) => request.kind);
  }

  commands(): string[] {
    return this.executed.map(renderCommand);
  }
}
