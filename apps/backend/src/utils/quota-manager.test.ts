import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { QuotaExceededError, QuotaManager } from './quota-manager';

describe('QuotaManager', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-05T10:30:00Z'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should allow calls up to the daily limit', () => {
    const quota = new QuotaManager({ dailyLimit: 2, hourlyLimit: 10 });

    expect(quota.recordCall().allowed).toBe(true);
    const second = quota.recordCall();
    expect(second.allowed).toBe(true);
    expect(second.dailyRemaining).toBe(0);

    const third = quota.recordCall();
    expect(third.allowed).toBe(false);
    expect(third.dailyRemaining).toBe(0);
    expect(third.dailyCalls).toBe(2);
  });

  it('should enforce the hourly limit independently', () => {
    const quota = new QuotaManager({ dailyLimit: 100, hourlyLimit: 1 });

    expect(quota.recordCall().allowed).toBe(true);
    const blocked = quota.recordCall();
    expect(blocked.allowed).toBe(false);
    expect(blocked.hourlyRemaining).toBe(0);
    expect(blocked.dailyRemaining).toBe(99);
  });

  it('should reset the hourly counter when the hour changes', () => {
    const quota = new QuotaManager({ dailyLimit: 100, hourlyLimit: 1 });
    quota.recordCall();

    vi.setSystemTime(new Date('2026-01-05T11:00:00Z'));

    const result = quota.recordCall();
    expect(result.allowed).toBe(true);
    expect(result.hourlyCalls).toBe(1);
    expect(result.dailyCalls).toBe(2);
  });

  it('should reset both counters on a new UTC day', () => {
    const quota = new QuotaManager({ dailyLimit: 1, hourlyLimit: 1 });
    quota.recordCall();

    vi.setSystemTime(new Date('2026-01-06T10:30:00Z'));

    expect(quota.getState()).toMatchObject({
      date: '2026-01-06',
      dailyCalls: 0,
      hourlyCalls: 0,
    });
    expect(quota.recordCall().allowed).toBe(true);
  });

  it('should flag calls past the alert threshold', () => {
    const quota = new QuotaManager({ dailyLimit: 10, hourlyLimit: 100, alertThreshold: 0.8 });

    const results = Array.from({ length: 8 }, () => quota.recordCall());

    expect(results[6].shouldAlert).toBe(false);
    expect(results[7].shouldAlert).toBe(true);
  });

  it('should leave the counters unchanged for refused calls', () => {
    const quota = new QuotaManager({ dailyLimit: 10, hourlyLimit: 2 });
    quota.recordCall();
    quota.recordCall();

    const refused = Array.from({ length: 20 }, () => quota.recordCall());

    expect(refused.every((result) => !result.allowed)).toBe(true);
    expect(quota.getStats()).toMatchObject({ dailyCalls: 2, dailyPercentage: 20, hourlyCalls: 2 });

    vi.setSystemTime(new Date('2026-01-05T11:00:00Z'));
    expect(quota.recordCall().allowed).toBe(true);
    expect(quota.getStats().dailyCalls).toBe(3);
  });

  it('should throw QuotaExceededError from reserveCall once exhausted', () => {
    const quota = new QuotaManager({ dailyLimit: 1, hourlyLimit: 10 });
    quota.reserveCall();

    expect(() => quota.reserveCall()).toThrow(QuotaExceededError);
  });

  it('should report usage percentages', () => {
    const quota = new QuotaManager({ dailyLimit: 4, hourlyLimit: 2 });
    quota.recordCall();

    expect(quota.getStats()).toEqual({
      dailyCalls: 1,
      dailyLimit: 4,
      dailyPercentage: 25,
      hourlyCalls: 1,
      hourlyLimit: 2,
      hourlyPercentage: 50,
    });
  });
});
