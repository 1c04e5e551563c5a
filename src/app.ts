#!/usr/bin/env node
import os from 'os';
import { loadConfig, loadDotenv, type AppConfig } from './config';
import { InitiatorController } from './controllers/initiator.controller';
import { OrchestratorController, exitCode } from './controllers/orchestrator.controller';
import { TargetController } from './controllers/target.controller';
import { ReportPublisher } from './services/report-publisher';
import { writeKernelLogs, writeReport } from './services/report-writer';
import { SshSession } from './services/ssh-session';
import type { KernelLogs, RunOutcome } from './types/report';
import logger from './lib/logger';

const COMMANDS = ['run', 'setup', 'verify', 'test', 'cleanup', 'logs'] as const;

export type Command = (typeof COMMANDS)[number];

export const USAGE = `usage: nvmeof-remote-test [${COMMANDS.join('|')}]

  run      set up and verify the target, benchmark it from the initiator, tear down (default)
  setup    set up and verify the target only
  verify   verify an existing target configuration
  test     benchmark an already configured target from the initiator
  cleanup  tear down the target configuration
  logs     save the kernel log tail of both hosts`;

export function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function createControllers(config: AppConfig): {
  target: TargetController;
  initiator: InitiatorController;
} {
  const sshOptions = { readyTimeoutMs: config.ssh.readyTimeoutMs };
  const target = new TargetController(config.target, new SshSession(config.target.connection, sshOptions));
  const initiator = new InitiatorController(
    config.initiator,
    config.target,
    new SshSession(config.initiator.connection, sshOptions),
    { settleMs: config.run.settleMs }
  );
  return { target, initiator };
}

async function persist(outcome: RunOutcome, config: AppConfig): Promise<void> {
  if (outcome.summary.length > 0) {
    console.log(`\n${outcome.summary.join('\n')}\n`);
  }

  const file = await writeReport(outcome.report, config.run.resultsFile);
  logger.info('results saved', { file });

  if (config.run.collectLogs) {
    const files = await writeKernelLogs(outcome.kernelLogs, config.run.logDir);
    if (files.length > 0) logger.info('kernel logs saved', { files });
  }

  if (config.broker) {
    const publisher = new ReportPublisher(config.broker);
    await publisher.publish({
      ok: exitCode(outcome.report) === 0,
      host: os.hostname(),
      report: outcome.report,
      publishedAt: new Date().toISOString(),
    });
  }
}

type KernelLogSource = {
  open(): Promise<void>;
  collectKernelLog(lines: number): Promise<string | undefined>;
};

/** Exit status 0 only when a log was saved for both hosts. */
async function saveKernelLogs(
  sources: Record<keyof KernelLogs, KernelLogSource>,
  config: AppConfig
): Promise<number> {
  const logs: KernelLogs = {};
  for (const host of ['target', 'initiator'] as const) {
    try {
      await sources[host].open();
      const text = await sources[host].collectKernelLog(config.run.kernelLogLines);
      if (text === undefined) {
        logger.warn('kernel log unavailable', { host });
      } else {
        logs[host] = text;
      }
    } catch (err) {
      logger.error('kernel log collection failed', { host, err });
    }
  }

  const files = await writeKernelLogs(logs, config.run.logDir);
  if (files.length > 0) logger.info('kernel logs saved', { files });
  return files.length === 2 ? 0 : 1;
}

export async function main(argv: string[]): Promise<number> {
  const command = argv[0] ?? 'run';
  if (!isCommand(command)) {
    console.error(USAGE);
    return 2;
  }

  loadDotenv();
  const config = loadConfig();
  const { target, initiator } = createControllers(config);
  const kernelLogLines = config.run.collectLogs ? config.run.kernelLogLines : 0;

  switch (command) {
    case 'run': {
      const orchestrator = new OrchestratorController(target, initiator, { kernelLogLines });
      const outcome = await orchestrator.run();
      await persist(outcome, config);
      return exitCode(outcome.report);
    }
    case 'test': {
      const orchestrator = new OrchestratorController(target, initiator, { kernelLogLines });
      const outcome = await orchestrator.runInitiatorSuite();
      await persist(outcome, config);
      return exitCode(outcome.report);
    }
    case 'setup':
      try {
        const ok = (await target.setup()) && (await target.verify());
        return ok ? 0 : 1;
      } finally {
        await target.release();
      }
    case 'verify':
      try {
        return (await target.verify()) ? 0 : 1;
      } finally {
        await target.release();
      }
    case 'cleanup':
      await target.cleanup();
      return 0;
    case 'logs':
      try {
        return await saveKernelLogs({ target, initiator }, config);
      } finally {
        await target.release();
        await initiator.close();
      }
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.error('nvmeof remote test crashed', { err });
      process.exit(1);
    });
}
