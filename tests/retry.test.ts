import { DEFAULT_RETRY_POLICY, RetryError, withRetry } from '../src/utils/retry';

describe('withRetry()', () => {
  const noSleep = jest.fn(async (_ms: number) => {});

  beforeEach(() => {
    noSleep.mockClear();
  });

  it('returns the first successful result without sleeping', async () => {
    const op = jest.fn().mockResolvedValue('done');

    await expect(withRetry(op, { attempts: 3, delayMs: 5000, isRetryable: () => true, sleep: noSleep })).resolves.toBe(
      'done',
    );
    expect(op).toHaveBeenCalledTimes(1);
    expect(noSleep).not.toHaveBeenCalled();
  });

  it('retries retryable failures with the fixed delay until success', async () => {
    const op = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('blip 1'))
      .mockRejectedValueOnce(new Error('blip 2'))
      .mockResolvedValue('third time');
    const onRetry = jest.fn();

    const result = await withRetry(op, {
      attempts: 3,
      delayMs: 5000,
      isRetryable: () => true,
      onRetry,
      sleep: noSleep,
    });

    expect(result).toBe('third time');
    expect(op).toHaveBeenCalledTimes(3);
    expect(noSleep.mock.calls).toEqual([[5000], [5000]]);
    expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2]);
  });

  it('gives up after the attempt budget with exhausted=true', async () => {
    const failure = new Error('still down');
    const op = jest.fn().mockRejectedValue(failure);

    const err = await withRetry(op, { attempts: 3, delayMs: 10, isRetryable: () => true, sleep: noSleep }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(RetryError);
    expect(err).toMatchObject({ attempts: 3, exhausted: true, lastError: failure });
    expect(op).toHaveBeenCalledTimes(3);
    expect(noSleep).toHaveBeenCalledTimes(2);
  });

  it('escalates a non-retryable failure immediately', async () => {
    const failure = new Error('forbidden');
    const op = jest.fn().mockRejectedValue(failure);

    const err = await withRetry(op, { attempts: 3, delayMs: 10, isRetryable: () => false, sleep: noSleep }).catch(
      (e: unknown) => e,
    );

    expect(err).toMatchObject({ attempts: 1, exhausted: false, lastError: failure });
    expect(op).toHaveBeenCalledTimes(1);
    expect(noSleep).not.toHaveBeenCalled();
  });

  it('treats attempts below one as a single attempt', async () => {
    const op = jest.fn().mockRejectedValue(new Error('x'));

    await expect(withRetry(op, { attempts: 0, delayMs: 0, isRetryable: () => true, sleep: noSleep })).rejects.toMatchObject(
      { attempts: 1, exhausted: true },
    );
    expect(op).toHaveBeenCalledTimes(1);
  });

  it.each([[Number.NaN], [Number.POSITIVE_INFINITY], [2.5]])('rejects an attempt budget of %p', async (attempts) => {
    const op = jest.fn().mockResolvedValue('ok');

    await expect(withRetry(op, { attempts, delayMs: 0, isRetryable: () => true, sleep: noSleep })).rejects.toThrow(
      RangeError,
    );
    expect(op).not.toHaveBeenCalled();
  });

  it('default policy allows three retries after the first call', async () => {
    const op = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('blip 1'))
      .mockRejectedValueOnce(new Error('blip 2'))
      .mockRejectedValueOnce(new Error('blip 3'))
      .mockResolvedValue('ok');

    await expect(withRetry(op, { ...DEFAULT_RETRY_POLICY, isRetryable: () => true, sleep: noSleep })).resolves.toBe('ok');
    expect(op).toHaveBeenCalledTimes(4);
    expect(noSleep.mock.calls).toEqual([[5000], [5000], [5000]]);
  });

  it('uses a real timer when no sleep is injected', async () => {
    jest.useFakeTimers();
    try {
      const op = jest.fn<Promise<string>, []>().mockRejectedValueOnce(new Error('blip')).mockResolvedValue('ok');

      const pending = withRetry(op, { attempts: 2, delayMs: 5000, isRetryable: () => true });
      await jest.advanceTimersByTimeAsync(5000);

      await expect(pending).resolves.toBe('ok');
      expect(op).toHaveBeenCalledTimes(2);
    } finally {
      jest.useRealTimers();
    }
  });
});
