import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { KernelLogs, TestReport } from '../types/report';

export async function writeReport(report: TestReport, file: string): Promise<string> {
  const target = path.resolve(file);
  await writeFile(target, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  return target;
}

/** Writes <host>_dmesg.log for each collected log; returns the files written. */
export async function writeKernelLogs(logs: KernelLogs, dir: string): Promise<string[]> {
  const entries = Object.entries(logs).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string'
  );
  if (entries.length === 0) return [];

  const root = path.resolve(dir);
  await mkdir(root, { recursive: true });
  const written: string[] = [];
  for (const [host, text] of entries) {
    const file = path.join(root, `${host}_dmesg.log`);
    await writeFile(file, text, 'utf8');
    written.push(file);
  }
  return written;
}
