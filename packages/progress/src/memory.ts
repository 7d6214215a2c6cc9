import os from 'node:os';

export interface MemorySample {
  /** Resident set size of this process. */
  residentBytes: number;
  /** V8 heap in use by this process. */
  heapUsedBytes: number;
  /** Free system memory. */
  freeBytes: number;
  /** Total system memory. */
  totalBytes: number;
}

export interface MemorySampler {
  sample(): MemorySample;
}

export const processMemorySampler: MemorySampler = {
  sample: () => {
    const usage = process.memoryUsage();
    return {
      residentBytes: usage.rss,
      heapUsedBytes: usage.heapUsed,
      freeBytes: os.freemem(),
      totalBytes: os.totalmem(),
    };
  },
};
