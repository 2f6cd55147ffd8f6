import { BoundedRetryPolicy } from './retry-policy';

describe('BoundedRetryPolicy', () => {
  const noWait = jest.fn(async (_ms: number) => undefined);

  beforeEach(() => noWait.mockClear());

  it('returns the first successful attempt without waiting', async () => {
    const policy = new BoundedRetryPolicy(2, 500, noWait);
    const outcome = await policy.run(async () => 'ok');

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 1 });
    expect(noWait).not.toHaveBeenCalled();
  });

  it('prepares and retries once after a failure', async () => {
    const policy = new BoundedRetryPolicy(2, 500, noWait);
    const prepare = jest.fn(async () => undefined);
    const attempt = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new Error('port closed'))
      .mockResolvedValueOnce('sent');

    const outcome = await policy.run(attempt, prepare);

    expect(outcome).toEqual({ ok: true, value: 'sent', attempts: 2 });
    expect(noWait).toHaveBeenCalledWith(500);
    expect(prepare).toHaveBeenCalledTimes(1);
    expect(prepare).toHaveBeenCalledWith(2, new Error('port closed'));
  });

  it('gives up after maxAttempts with the last error', async () => {
    const policy = new BoundedRetryPolicy(2, 0, noWait);
    const attempt = jest.fn(async (n: number): Promise<void> => {
      throw new Error(`failure ${n}`);
    });

    const outcome = await policy.run(attempt);

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(2);
    expect(attempt).toHaveBeenCalledTimes(2);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('failure 2');
    }
  });

  it('counts a failing prepare step as a failed attempt', async () => {
    const policy = new BoundedRetryPolicy(2, 0, noWait);
    const attempt = jest.fn(async (): Promise<void> => {
      throw new Error('write failed');
    });

    const outcome = await policy.run(attempt, async () => {
      throw new Error('reopen failed');
    });

    expect(attempt).toHaveBeenCalledTimes(1);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('reopen failed');
    }
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => new BoundedRetryPolicy(0)).toThrow(RangeError);
  });
});
