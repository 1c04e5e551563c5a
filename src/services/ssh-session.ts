import { Client, type ClientChannel } from 'ssh2';
import logger, { type Logger } from '../lib/logger';
import { ConnectionError, StateError, formatError } from '../lib/errors';
import type { ConnectionConfig } from '../types/nvmeof/config';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  EXEC_FAILURE_EXIT_CODE,
  commandResult,
  type CommandResult,
  type RemoteSession,
  type SessionState,
} from '../types/session';
import { renderCommand, type RemoteCommand } from './remote-command';

export type SshSessionOptions = {
  readyTimeoutMs?: number;
};

const DEFAULT_READY_TIMEOUT_MS = 20_000;

const decode = (chunks: Buffer[]): string => Buffer.concat(chunks).toString('utf8');

/**
 * Password-authenticated SSH channel to a single host.
 * Host keys are accepted without verification (lab hosts are re-imaged often).
 */
export class SshSession implements RemoteSession {
  private client?: Client;
  private current: SessionState = 'idle';
  private readonly log: Logger;
  private readonly readyTimeoutMs: number;

  constructor(
    private readonly config: ConnectionConfig,
    options: SshSessionOptions = {}
  ) {
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.log = logger.child(['ssh', config.host]);
  }

  get host(): string {
    return this.config.host;
  }

  get state(): SessionState {
    return this.current;
  }

  async connect(): Promise<void> {
    if (this.current === 'connected') return;
    if (this.current === 'closed') {
      throw new StateError(`session to ${this.host} is closed`);
    }

    const client = new Client();
    try {
      await new Promise<void>((resolve, reject) => {
        client.once('ready', () => resolve());
        client.once('error', reject);
        client.connect({
          host: this.config.host,
          port: this.config.port,
          username: this.config.username,
          password: this.config.password,
          readyTimeout: this.readyTimeoutMs,
        });
      });
    } catch (err) {
      client.end();
      this.log.error('connect failed', { host: this.host, port: this.config.port, err });
      throw new ConnectionError(this.host, err);
    }

    client.on('error', (err) => {
      this.log.error('connection error', { host: this.host, err });
    });
    client.on('close', () => {
      if (this.current === 'connected') {
        this.log.warn('connection dropped', { host: this.host });
      }
    });

    this.client = client;
    this.current = 'connected';
    this.log.info('connected', { host: this.host, port: this.config.port, user: this.config.username });
  }

  async execute(request: RemoteCommand, timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS): Promise<CommandResult> {
    const client = this.client;
    if (this.current !== 'connected' || !client) {
      throw new StateError('not connected');
    }

    const command = renderCommand(request);
    let result: CommandResult;
    try {
      result = await this.run(client, command, timeoutMs);
    } catch (err) {
      result = commandResult('', formatError(err), EXEC_FAILURE_EXIT_CODE);
    }

    if (result.success) {
      this.log.info('command succeeded', { kind: request.kind, command });
    } else {
      this.log.error('command failed', {
        kind: request.kind,
        command,
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
    }
    return result;
  }

  async close(): Promise<void> {
    const previous = this.current;
    if (previous === 'closed') {
      this.log.info('close skipped, session already closed', { host: this.host, state: previous });
      return;
    }
    this.current = 'closed';
    if (this.client) {
      this.client.end();
      this.client = undefined;
    }
    this.log.info(previous === 'connected' ? 'disconnected' : 'closed without connecting', {
      host: this.host,
      state: previous,
    });
  }

  /**
   * The timer starts before the channel is requested, so a server that never
   * confirms the channel open still yields a timeout.
   */
  private run(client: Client, command: string, timeoutMs: number): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      let channel: ClientChannel | undefined;
      let settled = false;

      const settle = (finish: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        finish();
      };

      const timer = setTimeout(() => {
        settle(() => {
          channel?.destroy();
          reject(new Error(`command timed out after ${timeoutMs}ms`));
        });
      }, timeoutMs);

      client.exec(command, (err: Error | undefined, stream: ClientChannel) => {
        if (settled) {
          // the command already timed out; drop the late channel
          stream?.destroy();
          return;
        }
        if (err) {
          settle(() => reject(err));
          return;
        }
        channel = stream;

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let exitCode: number | null = null;

        stream.on('data', (chunk: Buffer) => stdout.push(chunk));
        stream.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
        stream.on('exit', (code: number | null) => {
          exitCode = code;
        });
        stream.on('error', (streamErr: Error) => settle(() => reject(streamErr)));
        stream.on('close', () =>
          settle(() =>
            resolve(
              commandResult(
                decode(stdout),
                decode(stderr),
                typeof exitCode === 'number' ? exitCode : EXEC_FAILURE_EXIT_CODE
              )
            )
          )
        );
      });
    });
  }
}
