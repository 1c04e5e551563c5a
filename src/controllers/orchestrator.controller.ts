import logger from '../lib/logger';
import { PhaseError, formatError, type PhaseName } from '../lib/errors';
import { summarizeResults } from '../services/fio-output';
import type { BenchmarkRecord, BenchmarkSpec, KernelLogs, RunOutcome, TestReport } from '../types/report';
import type { InitiatorController } from './initiator.controller';
import type { TargetController } from './target.controller';

export const DEFAULT_BATTERY: readonly BenchmarkSpec[] = [
  { name: 'seq_read', mode: 'read', blockSize: '1M', size: '1G' },
  { name: 'rand_read', mode: 'randread', blockSize: '4k', runtimeSec: 60 },
  { name: 'rand_write', mode: 'randwrite', blockSize: '4k', runtimeSec: 60 },
  { name: 'randrw', mode: 'randrw', blockSize: '4k', runtimeSec: 60, mixRead: 70 },
];

export type OrchestratorOptions = {
  battery?: readonly BenchmarkSpec[];
  /** Lines of kernel log to collect from each host before teardown; 0 disables. */
  kernelLogLines?: number;
  now?: () => Date;
};

const BANNER = '='.repeat(60);

export function exitCode(report: TestReport): number {
  return report.error === undefined ? 0 : 1;
}

/**
 * Sequences the target and initiator controllers through one test run.
 *
 * Phases 1-4 are required; a failure raises PhaseError, caught once in run().
 * Target cleanup sits in the finally block so it runs exactly once whichever
 * phase ended the run.
 */
export class OrchestratorController {
  private readonly log = logger.child('orchestrator');
  private readonly battery: readonly BenchmarkSpec[];
  private readonly kernelLogLines: number;
  private readonly now: () => Date;

  constructor(
    private readonly target: TargetController,
    private readonly initiator: InitiatorController,
    options: OrchestratorOptions = {}
  ) {
    this.battery = options.battery ?? DEFAULT_BATTERY;
    this.kernelLogLines = options.kernelLogLines ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<RunOutcome> {
    const startedAt = this.now().toISOString();
    const results: Record<string, BenchmarkRecord> = {};
    const kernelLogs: KernelLogs = {};
    let summary: string[] = [];
    let error: string | undefined;

    this.log.info(BANNER);
    this.log.info('Starting NVMe-oF remote test suite');
    this.log.info(BANNER);

    try {
      this.log.info('[Phase 1] Setting up target...');
      await this.require('target-setup', () => this.target.setup(), 'Target setup failed');

      this.log.info('[Phase 2] Verifying target...');
      await this.require('target-verify', () => this.target.verify(), 'Target verification failed');

      summary = await this.initiatorPhases(results, kernelLogs);
    } catch (err) {
      error = formatError(err);
      this.log.error('test suite failed', { error });
    } finally {
      await this.captureKernelLogs(kernelLogs, ['target', 'initiator']);
      await this.releaseInitiator();
      this.log.info('[Cleanup] Cleaning up target...');
      await this.target.cleanup();
    }

    this.log.info('test suite completed', { failed: error !== undefined });
    return { report: this.report(startedAt, results, error), summary, kernelLogs };
  }

  /**
   * Phases 3-7 against a target configured out of band. The target is
   * neither set up nor torn down.
   */
  async runInitiatorSuite(): Promise<RunOutcome> {
    const startedAt = this.now().toISOString();
    const results: Record<string, BenchmarkRecord> = {};
    const kernelLogs: KernelLogs = {};
    let summary: string[] = [];
    let error: string | undefined;

    try {
      summary = await this.initiatorPhases(results, kernelLogs);
    } catch (err) {
      error = formatError(err);
      this.log.error('initiator suite failed', { error });
    } finally {
      await this.captureKernelLogs(kernelLogs, ['initiator']);
      await this.releaseInitiator();
    }

    return { report: this.report(startedAt, results, error), summary, kernelLogs };
  }

  private async initiatorPhases(
    results: Record<string, BenchmarkRecord>,
    kernelLogs: KernelLogs
  ): Promise<string[]> {
    this.log.info('[Phase 3] Discovering target from initiator...');
    await this.require('initiator-discover', () => this.initiator.discover(), 'Target discovery failed');

    this.log.info('[Phase 4] Connecting to target...');
    await this.require('initiator-connect', () => this.initiator.connect(), 'Connection failed');

    try {
      this.log.info('[Phase 5] Running I/O tests...');
      for (const spec of this.battery) {
        results[spec.name] = await this.initiator.runBenchmark(spec);
      }
    } finally {
      // disconnect() closes the session, so the initiator's log is read first
      await this.captureKernelLogs(kernelLogs, ['initiator']);
      this.log.info('[Phase 6] Disconnecting...');
      await this.initiator.disconnect();
    }

    this.log.info('[Phase 7] Test results summary');
    const summary = summarizeResults(results);
    for (const line of summary) {
      this.log.info(line);
    }
    return summary;
  }

  private async require(phase: PhaseName, step: () => Promise<boolean>, message: string): Promise<void> {
    if (!(await step())) {
      throw new PhaseError(phase, message);
    }
  }

  /** Fills in each host's log at most once; hosts whose session is gone are skipped. */
  private async captureKernelLogs(logs: KernelLogs, hosts: Array<keyof KernelLogs>): Promise<void> {
    if (this.kernelLogLines <= 0) return;
    for (const host of hosts) {
      if (logs[host] !== undefined) continue;
      const controller = host === 'target' ? this.target : this.initiator;
      try {
        const text = await controller.collectKernelLog(this.kernelLogLines);
        if (text !== undefined) logs[host] = text;
      } catch (err) {
        this.log.warn('kernel log collection failed', { host, err });
      }
    }
  }

  /** A fabric link left up by a failed run is torn down before the target goes. */
  private async releaseInitiator(): Promise<void> {
    try {
      if (this.initiator.isLinked) {
        await this.initiator.disconnect();
      } else {
        await this.initiator.close();
      }
    } catch (err) {
      this.log.warn('failed to release initiator', { err });
    }
  }

  private report(startedAt: string, results: Record<string, BenchmarkRecord>, error?: string): TestReport {
    return {
      startedAt,
      finishedAt: this.now().toISOString(),
      results,
      ...(error !== undefined ? { error } : {}),
    };
  }
}
