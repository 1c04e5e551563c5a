import logger from '../lib/logger';
import { StateError } from '../lib/errors';
import type { InitiatorConfig, TargetConfig } from '../types/nvmeof/config';
import type { RemoteSession } from '../types/session';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../types/session';
import type { BenchmarkRecord, BenchmarkSpec } from '../types/report';
import type { FabricAddress, FabricTransport } from '../services/remote-command';
import { parseFioOutput } from '../services/fio-output';

const TRANSPORT: FabricTransport = 'tcp';
const BENCHMARK_GRACE_MS = 60_000;
const DEFAULT_SETTLE_MS = 2_000;

export type InitiatorControllerOptions = {
  /** Wait between a successful fabric connect and device enumeration. */
  settleMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** First whitespace-delimited token of every non-empty line, in order. */
export function parseDeviceList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim().split(/\s+/)[0])
    .filter((device) => device.length > 0);
}

export function benchmarkTimeoutMs(runtimeSec?: number): number {
  return runtimeSec ? runtimeSec * 1000 + BENCHMARK_GRACE_MS : DEFAULT_COMMAND_TIMEOUT_MS;
}

/**
 * Discovers, connects to and benchmarks the target's subsystem from the
 * initiator host.
 */
export class InitiatorController {
  private discoveredDevice?: string;
  private linked = false;
  private readonly log = logger.child('initiator');
  private readonly settleMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: InitiatorConfig,
    private readonly target: TargetConfig,
    private readonly session: RemoteSession,
    options: InitiatorControllerOptions = {}
  ) {
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.sleep = options.sleep ?? wait;
  }

  get device(): string | undefined {
    return this.discoveredDevice;
  }

  /** True while a fabric connection made by connect() has not been torn down. */
  get isLinked(): boolean {
    return this.linked;
  }

  private get fabric(): FabricAddress {
    return { transport: TRANSPORT, address: this.target.dataIp, serviceId: this.target.servicePort };
  }

  /** Exit status alone is not enough: the subsystem NQN must be listed. */
  async discover(): Promise<boolean> {
    this.log.info('discovering targets', {
      host: this.config.connection.host,
      address: this.target.dataIp,
      servicePort: this.target.servicePort,
    });
    await this.open();

    const result = await this.session.execute({ kind: 'nvmeDiscover', fabric: this.fabric });
    if (result.success && result.stdout.includes(this.target.subsystemNqn)) {
      this.log.info('target discovered', { nqn: this.target.subsystemNqn });
      return true;
    }
    this.log.error('target discovery failed', {
      nqn: this.target.subsystemNqn,
      exitCode: result.exitCode,
      listed: result.stdout.includes(this.target.subsystemNqn),
    });
    return false;
  }

  async connect(): Promise<boolean> {
    this.log.info('connecting to target', { nqn: this.target.subsystemNqn });
    await this.open();

    // Enumeration takes the first fabric device, so none may exist beforehand.
    const existing = await this.listFabricDevices();
    if (existing.length > 0) {
      this.log.error('initiator already has fabric-attached devices', { devices: existing });
      return false;
    }

    const result = await this.session.execute({
      kind: 'nvmeConnect',
      fabric: this.fabric,
      nqn: this.target.subsystemNqn,
    });
    if (!result.success) {
      this.log.error('connection failed', { exitCode: result.exitCode, stderr: result.stderr.trim() });
      return false;
    }
    this.linked = true;

    await this.sleep(this.settleMs);

    const [device] = await this.listFabricDevices();
    if (!device) {
      this.log.error('failed to find connected device');
      return false;
    }
    this.discoveredDevice = device;
    this.log.info('connected to device', { device });
    return true;
  }

  /**
   * Never throws once a device is known: command failures and unparsable
   * output both come back as an empty record.
   */
  async runBenchmark(spec: BenchmarkSpec): Promise<BenchmarkRecord> {
    const device = this.discoveredDevice;
    if (!device) {
      throw new StateError('no device connected');
    }

    this.log.info('running fio test', { name: spec.name, mode: spec.mode, blockSize: spec.blockSize });
    const result = await this.session.execute(
      {
        kind: 'fio',
        job: {
          name: spec.name,
          filename: device,
          mode: spec.mode,
          blockSize: spec.blockSize,
          size: spec.size,
          runtimeSec: spec.runtimeSec,
          mixRead: spec.mixRead,
        },
      },
      benchmarkTimeoutMs(spec.runtimeSec)
    );

    if (!result.success) {
      this.log.error('fio test failed', { name: spec.name, stderr: result.stderr.trim() });
      return {};
    }

    const record = parseFioOutput(result.stdout);
    if (!record) {
      this.log.error('failed to parse fio output', { name: spec.name });
      return {};
    }
    this.log.info('fio test completed', { name: spec.name });
    return record;
  }

  /** Best-effort; failures are logged only. Closes the session last. */
  async disconnect(): Promise<void> {
    this.log.info('disconnecting from target', { nqn: this.target.subsystemNqn });
    if (this.session.state === 'connected') {
      const result = await this.session.execute({ kind: 'nvmeDisconnect', nqn: this.target.subsystemNqn });
      if (result.success) {
        this.log.info('disconnected');
      } else {
        this.log.warn('disconnect had issues', { stderr: result.stderr.trim() });
      }
    } else {
      this.log.warn('initiator session not connected, skipping disconnect', {
        sessionState: this.session.state,
      });
    }
    this.linked = false;
    this.discoveredDevice = undefined;
    await this.close();
  }

  async close(): Promise<void> {
    try {
      await this.session.close();
    } catch (err) {
      this.log.warn('failed to close initiator session', { err });
    }
  }

  async collectKernelLog(lines: number): Promise<string | undefined> {
    if (this.session.state !== 'connected') return undefined;
    const result = await this.session.execute({ kind: 'kernelLog', lines });
    return result.success ? result.stdout : undefined;
  }

  async open(): Promise<void> {
    if (this.session.state === 'idle') {
      await this.session.connect();
    }
  }

  private async listFabricDevices(): Promise<string[]> {
    const result = await this.session.execute({ kind: 'nvmeListFabricDevices', transport: TRANSPORT });
    return result.success ? parseDeviceList(result.stdout) : [];
  }
}
