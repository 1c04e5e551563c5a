import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeKernelLogs, writeReport } from '../../src/services/report-writer';
import type { TestReport } from '../../src/types/report';

const report: TestReport = {
  startedAt: '2026-03-01T10:00:00.000Z',
  finishedAt: '2026-03-01T10:05:00.000Z',
  results: { seq_read: {}, rand_read: { jobs: [] } },
  error: 'Connection failed',
};

describe('report writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'nvmeof-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the report as indented JSON', async () => {
    const file = await writeReport(report, path.join(dir, 'results.json'));

    expect(file).toBe(path.join(dir, 'results.json'));
    const text = await readFile(file, 'utf8');
    expect(text).toBe(`${JSON.stringify(report, null, 2)}\n`);
    expect(JSON.parse(text)).toEqual(report);
  });

  it('writes one file per collected kernel log', async () => {
    const logDir = path.join(dir, 'logs');

    const files = await writeKernelLogs({ target: 'nvmet: ready\n', initiator: 'nvme: ready\n' }, logDir);

    expect(files).toEqual([path.join(logDir, 'target_dmesg.log'), path.join(logDir, 'initiator_dmesg.log')]);
    await expect(readFile(path.join(logDir, 'target_dmesg.log'), 'utf8')).resolves.toBe('nvmet: ready\n');
    await expect(readFile(path.join(logDir, 'initiator_dmesg.log'), 'utf8')).resolves.toBe('nvme: ready\n');
  });

  it('creates nothing when no log was collected', async () => {
    const files = await writeKernelLogs({}, path.join(dir, 'logs'));

    expect(files).toEqual([]);
    await expect(readdir(dir)).resolves.toEqual([]);
  });
});
