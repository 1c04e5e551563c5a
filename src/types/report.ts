export type AccessMode = 'read' | 'write' | 'randread' | 'randwrite' | 'rw' | 'randrw';

export type BenchmarkSpec = {
  name: string;
  mode: AccessMode;
  blockSize: string;
  size?: string;
  runtimeSec?: number;
  /** Read percentage for mixed workloads (fio --rwmixread). */
  mixRead?: number;
};

/** Decoded fio JSON output; an empty object when the run produced nothing usable. */
export type BenchmarkRecord = Record<string, unknown>;

export type TestReport = {
  startedAt: string;
  finishedAt: string;
  results: Record<string, BenchmarkRecord>;
  error?: string;
};

export type KernelLogs = {
  target?: string;
  initiator?: string;
};

export type RunOutcome = {
  report: TestReport;
  summary: string[];
  kernelLogs: KernelLogs;
};

export function isEmptyRecord(record: BenchmarkRecord): boolean {
  return Object.keys(record).length === 0;
}
