import { describe, expect, it } from 'vitest';

import { collectHostMetadata, ResourceSampler } from '../resource';

describe('ResourceSampler', () => {
  it('reports memory of this process stamped with the given clock', () => {
    const sample = new ResourceSampler(() => 1_700_000_000_000).sample();

    expect(sample.timestamp).toBe(1_700_000_000_000);
    expect(sample.memoryRss).toBeGreaterThan(0);
    expect(sample.heapUsed).toBeLessThanOrEqual(sample.heapTotal);
    expect(sample.cpuPercent).toBeGreaterThanOrEqual(0);
  });
});

describe('collectHostMetadata', () => {
  it('describes the process and keeps caller metadata', () => {
    const metadata = collectHostMetadata({ region: 'eu-west-1', 'process.pid': 'overridden' });

    expect(metadata['process.runtime.version']).toBe(process.version);
    expect(metadata['region']).toBe('eu-west-1');
    expect(metadata['process.pid']).toBe('overridden');
  });
});
