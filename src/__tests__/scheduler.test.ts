import { ReconcileScheduler } from '../reconcile/scheduler';
import { deferred } from './helpers/fakes';

describe('Reconcile scheduler', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should run the routine immediately on wake', async () => {
    const routine = jest.fn().mockResolvedValue(undefined);
    const scheduler = new ReconcileScheduler(routine, 1000);

    await scheduler.wake();

    expect(routine).toHaveBeenCalledTimes(1);
    expect(routine).toHaveBeenCalledWith('wake');
  });

  it('should coalesce wakes during a pass into one follow-up pass', async () => {
    const gate = deferred();
    const routine = jest.fn()
      .mockImplementationOnce(() => gate.promise)
      .mockResolvedValue(undefined);
    const scheduler = new ReconcileScheduler(routine, 1000);

    const first = scheduler.wake();
    const second = scheduler.wake();
    const third = scheduler.wake();

    expect(second).toBe(third);
    expect(routine).toHaveBeenCalledTimes(1);

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(routine).toHaveBeenCalledTimes(2);
  });

  it('should still run the follow-up when the current pass fails', async () => {
    const gate = deferred();
    const routine = jest.fn()
      .mockImplementationOnce(() => gate.promise)
      .mockResolvedValue(undefined);
    const scheduler = new ReconcileScheduler(routine, 1000);

    const first = scheduler.wake();
    const followUp = scheduler.wake();

    gate.reject(new Error('registry unavailable'));
    await expect(first).rejects.toThrow('registry unavailable');
    await expect(followUp).resolves.toBeUndefined();
    expect(routine).toHaveBeenCalledTimes(2);
  });

  it('should pass on the error of the pass it waited for', async () => {
    const routine = jest.fn().mockRejectedValue(new Error('boom'));
    await expect(new ReconcileScheduler(routine, 1000).wake()).rejects.toThrow('boom');
  });

  it('should tick on the interval and skip ticks while a pass runs', () => {
    jest.useFakeTimers();
    const routine = jest.fn(() => new Promise<void>(() => undefined));
    const scheduler = new ReconcileScheduler(routine, 3000);

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);

    jest.advanceTimersByTime(3000);
    expect(routine).toHaveBeenCalledTimes(1);
    expect(routine).toHaveBeenCalledWith('timer');

    jest.advanceTimersByTime(9000);
    expect(routine).toHaveBeenCalledTimes(1);

    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should stop ticking after stop()', () => {
    jest.useFakeTimers();
    const routine = jest.fn().mockResolvedValue(undefined);
    const scheduler = new ReconcileScheduler(routine, 3000);

    scheduler.start();
    scheduler.stop();
    jest.advanceTimersByTime(10000);

    expect(routine).not.toHaveBeenCalled();
  });
});
