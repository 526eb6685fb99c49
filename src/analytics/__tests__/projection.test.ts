import { describe, it, expect } from 'vitest';
import { project } from '../projection.js';
import { HOUR, T0 } from '../../__tests__/fixtures.js';

describe('project', () => {
  it('projects usage at reset and time to exhaustion', () => {
    const result = project({ current: 250, limit: 1000, rate: 300, resetsAt: T0 + 2 * HOUR, now: T0 });

    expect(result).toEqual({
      hoursUntilReset: 2,
      projected: 850,
      exhaustionHours: 2.5,
      exhaustsAt: T0 + 2.5 * HOUR,
      exhaustsFirst: false,
    });
  });

  it('flags exhaustion before reset and clamps the projection to the limit', () => {
    const result = project({ current: 250, limit: 1000, rate: 300, resetsAt: T0 + 4 * HOUR, now: T0 });

    expect(result.projected).toBe(1000);
    expect(result.exhaustsFirst).toBe(true);
  });

  it('computes hours to exhaustion from the remaining budget', () => {
    const result = project({ current: 250, limit: 1100, rate: 300, resetsAt: null, now: T0 });

    expect(result.exhaustionHours).toBeCloseTo(2.8333, 4);
    expect(result.projected).toBeNull();
    expect(result.exhaustsFirst).toBe(false);
  });

  it('never projects past the limit when already exhausted', () => {
    const result = project({ current: 1200, limit: 1000, rate: 10, resetsAt: T0 + HOUR, now: T0 });
    expect(result.projected).toBe(1000);
    expect(result.exhaustionHours).toBe(0);
  });

  it('has no exhaustion time for an idle quota', () => {
    const result = project({ current: 250, limit: 1000, rate: 0, resetsAt: T0 + HOUR, now: T0 });
    expect(result.projected).toBe(250);
    expect(result.exhaustionHours).toBeNull();
    expect(result.exhaustsAt).toBeNull();
  });

  it('yields nulls when the rate is unknown', () => {
    expect(project({ current: 250, limit: 1000, rate: null, resetsAt: T0 + HOUR, now: T0 })).toEqual({
      hoursUntilReset: 1,
      projected: null,
      exhaustionHours: null,
      exhaustsAt: null,
      exhaustsFirst: false,
    });
  });

  it('ignores reset times in the past', () => {
    const result = project({ current: 250, limit: 1000, rate: 300, resetsAt: T0 - HOUR, now: T0 });
    expect(result.hoursUntilReset).toBeNull();
    expect(result.projected).toBeNull();
  });

  it('leaves the projection unclamped without a limit', () => {
    const result = project({ current: 250, limit: null, rate: 300, resetsAt: T0 + 2 * HOUR, now: T0 });
    expect(result.projected).toBe(850);
    expect(result.exhaustionHours).toBeNull();
  });
});
