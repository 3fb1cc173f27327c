/**
 * Process resource usage and host metadata.
 *
 * Resource usage feeds health snapshots; host metadata is attached to every
 * wire record when metadata collection is enabled.
 */

import { hostname, platform, totalmem } from 'os';

import type { ResourceUsage } from './types';

// ============================================================================
// Resource usage
// ============================================================================

/**
 * Samples CPU and memory of the current process. CPU percent is measured
 * between consecutive samples (since process start for the first one).
 */
export class ResourceSampler {
  private lastCpu = process.cpuUsage();
  private lastAt = process.hrtime.bigint();

  constructor(private readonly now: () => number = Date.now) {}

  sample(): ResourceUsage {
    const cpu = process.cpuUsage(this.lastCpu);
    const at = process.hrtime.bigint();
    const elapsedMicros = Number(at - this.lastAt) / 1000;
    this.lastCpu = process.cpuUsage();
    this.lastAt = at;

    const memory = process.memoryUsage();
    const total = totalmem();

    return {
      cpuPercent: elapsedMicros > 0 ? round2(((cpu.user + cpu.system) / elapsedMicros) * 100) : 0,
      memoryPercent: total > 0 ? round2((memory.rss / total) * 100) : 0,
      memoryRss: memory.rss,
      heapUsed: memory.heapUsed,
      heapTotal: memory.heapTotal,
      timestamp: this.now(),
    };
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================================================
// Host metadata
// ============================================================================

/**
 * Static description of the running process, sent as the `resource`
 * envelope of each record
 */
export function collectHostMetadata(extra: Record<string, string> = {}): Record<string, string> {
  return {
    'host.name': hostname(),
    'process.pid': String(process.pid),
    'process.runtime.version': process.version,
    'os.type': platform(),
    ...extra,
  };
}
