import { ReconnectPolicy } from './reconnect-policy';

describe('ReconnectPolicy', () => {
  it('doubles from the initial delay and caps at the maximum', () => {
    const policy = new ReconnectPolicy({ initialDelayMs: 5000, maxDelayMs: 60000, multiplier: 2 });
    expect([0, 1, 2, 3, 4, 5].map((attempt) => policy.delayFor(attempt))).toEqual([
      5000, 10000, 20000, 40000, 60000, 60000,
    ]);
  });

  it('uses a fixed delay with multiplier 1', () => {
    const policy = new ReconnectPolicy({ initialDelayMs: 3000, multiplier: 1 });
    expect(policy.delayFor(0)).toBe(3000);
    expect(policy.delayFor(7)).toBe(3000);
  });

  it('falls back to defaults', () => {
    expect(new ReconnectPolicy().delayFor(0)).toBe(5000);
  });
});
