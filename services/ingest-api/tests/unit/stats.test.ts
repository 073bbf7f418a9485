import { describe, it, expect } from 'vitest';
import { PipelineStats, combineSnapshots, successRate } from '../../src/pipeline/stats.js';

describe('PipelineStats', () => {
  it('starts at zero with a zero success rate', () => {
    expect(new PipelineStats().snapshot(0)).toEqual({
      queue_size: 0,
      total_received: 0,
      total_ingested: 0,
      total_errors: 0,
      total_batches: 0,
      total_rejected: 0,
      success_rate: 0,
    });
  });

  it('tracks persisted and failed batches separately', () => {
    const s = new PipelineStats();
    for (let i = 0; i < 8; i++) s.recordReceived();
    s.recordRejected();
    s.recordPersisted(5);
    s.recordFailed(2);

    expect(s.snapshot(1)).toEqual({
      queue_size: 1,
      total_received: 8,
      total_ingested: 5,
      total_errors: 2,
      total_batches: 1,
      total_rejected: 1,
      success_rate: 0.625,
    });
    expect(s.totalBatches).toBe(1);
  });
});

describe('combineSnapshots', () => {
  it('sums counters and recomputes the rate from the totals', () => {
    const a = new PipelineStats();
    const b = new PipelineStats();
    for (let i = 0; i < 4; i++) a.recordReceived();
    a.recordPersisted(4);
    for (let i = 0; i < 4; i++) b.recordReceived();
    b.recordFailed(4);

    const sum = combineSnapshots([a.snapshot(2), b.snapshot(3)]);
    expect(sum.queue_size).toBe(5);
    expect(sum.total_received).toBe(8);
    expect(sum.total_ingested).toBe(4);
    expect(sum.total_errors).toBe(4);
    expect(sum.total_batches).toBe(1);
    expect(sum.success_rate).toBe(0.5);
  });

  it('handles an empty list', () => {
    expect(combineSnapshots([]).success_rate).toBe(0);
    expect(successRate(0, 0)).toBe(0);
  });
});
