import { z } from 'zod';
import type { BenchmarkRecord } from '../types/report';
import { isEmptyRecord } from '../types/report';

// Only the fields the summary reads; everything else is kept in the raw record.
const directionSchema = z
  .object({
    io_bytes: z.number(),
    bw: z.number(),
    iops: z.number(),
  })
  .passthrough();

const jobSchema = z
  .object({
    jobname: z.string(),
    read: directionSchema.optional(),
    write: directionSchema.optional(),
  })
  .passthrough();

const fioReportSchema = z
  .object({
    jobs: z.array(jobSchema),
  })
  .passthrough();

export type FioDirection = z.infer<typeof directionSchema>;
export type FioJobResult = z.infer<typeof jobSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode fio `--output-format=json` text. Returns undefined when the text is
 * not JSON or its root is not an object.
 */
export function parseFioOutput(stdout: string): BenchmarkRecord | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stdout);
  } catch {
    return undefined;
  }
  return isRecord(decoded) ? decoded : undefined;
}

export function fioJobs(record: BenchmarkRecord): FioJobResult[] {
  const parsed = fioReportSchema.safeParse(record);
  return parsed.success ? parsed.data.jobs : [];
}

function directionLine(label: string, direction: FioDirection | undefined): string | undefined {
  if (!direction || direction.io_bytes <= 0) return undefined;
  const mbPerSec = (direction.bw / 1024).toFixed(2);
  return `  ${label} ${mbPerSec} MB/s, ${direction.iops.toFixed(0)} IOPS`;
}

/**
 * Printable summary of every non-empty record, one block per fio job:
 *
 *   rand_read:
 *     Read:  512.00 MB/s, 131072 IOPS
 */
export function summarizeResults(results: Record<string, BenchmarkRecord>): string[] {
  const lines: string[] = [];
  for (const record of Object.values(results)) {
    if (isEmptyRecord(record)) continue;
    for (const job of fioJobs(record)) {
      lines.push(`${job.jobname}:`);
      const read = directionLine('Read: ', job.read);
      const write = directionLine('Write:', job.write);
      if (read) lines.push(read);
      if (write) lines.push(write);
    }
  }
  return lines;
}
