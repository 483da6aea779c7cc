import {
  AnalysisCancelledError,
  TimeoutError,
  raceAbort,
  throwIfCancelled,
  withTimeout,
} from '../../../src/lib/pricing/cancellation';

describe('cancellation', () => {
  it('throws only once the signal has fired', () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    expect(() => throwIfCancelled(undefined)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(AnalysisCancelledError);
  });

  describe('withTimeout', () => {
    it('resolves with the task result', async () => {
      await expect(withTimeout(1000, 'fast', async () => 42)).resolves.toBe(42);
    });

    it('rejects with TimeoutError and aborts the task signal', async () => {
      let taskSignal: AbortSignal | undefined;
      const pending = withTimeout(10, 'slow', (signal) => {
        taskSignal = signal;
        return new Promise<number>(() => undefined);
      });

      await expect(pending).rejects.toThrow(new TimeoutError('slow timed out after 10ms'));
      expect(taskSignal?.aborted).toBe(true);
    });

    it('passes task errors through', async () => {
      await expect(
        withTimeout(1000, 'broken', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
    });
  });

  describe('raceAbort', () => {
    it('returns the promise untouched without a signal', async () => {
      await expect(raceAbort(Promise.resolve('done'))).resolves.toBe('done');
    });

    it('rejects when the caller aborts first', async () => {
      const controller = new AbortController();
      const pending = raceAbort(new Promise<string>(() => undefined), controller.signal);
      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(AnalysisCancelledError);
    });

    it('rejects immediately for an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(raceAbort(Promise.resolve('done'), controller.signal)).rejects.toBeInstanceOf(
        AnalysisCancelledError
      );
    });

    it('settles with the promise when it wins', async () => {
      const controller = new AbortController();
      await expect(raceAbort(Promise.resolve('done'), controller.signal)).resolves.toBe('done');
      await expect(raceAbort(Promise.reject(new Error('nope')), controller.signal)).rejects.toThrow('nope');
    });
  });
});
