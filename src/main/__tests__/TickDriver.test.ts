import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { TickDriver } from '../TickDriver';
import { PomodoroTimer } from '../../engine/PomodoroTimer';
import { createTimerConfig } from '../../shared/config';
import { RecordStore } from '../../store/RecordStore';
import { MemoryStorage } from '../../store/storage';

describe('TickDriver', () => {
  let timer: PomodoroTimer;
  let onError: Mock<(err: unknown) => void>;
  let driver: TickDriver;

  beforeEach(() => {
    vi.useFakeTimers();
    timer = new PomodoroTimer(createTimerConfig({ workMinutes: 1 }), new RecordStore(new MemoryStorage()));
    onError = vi.fn<(err: unknown) => void>();
    driver = new TickDriver(timer, onError);
  });

  afterEach(() => {
    driver.stop();
    vi.useRealTimers();
  });

  it('ticks the timer once a second while a session runs', () => {
    timer.start();
    driver.start();
    vi.advanceTimersByTime(3000);
    expect(timer.remainingSeconds).toBe(57);
  });

  it('leaves an idle or paused timer alone', () => {
    const tick = vi.spyOn(timer, 'tick');
    driver.start();
    vi.advanceTimersByTime(2000);
    timer.start();
    timer.pause();
    vi.advanceTimersByTime(2000);
    expect(tick).not.toHaveBeenCalled();
    expect(timer.remainingSeconds).toBe(60);
  });

  it('reports tick errors and keeps going', () => {
    const failure = new Error('boom');
    vi.spyOn(timer, 'tick').mockImplementation(() => {
      throw failure;
    });
    timer.start();
    driver.start();
    vi.advanceTimersByTime(2000);
    expect(onError).toHaveBeenCalledTimes(2);
    expect(onError).toHaveBeenCalledWith(failure);
  });

  it('starts once and stops', () => {
    timer.start();
    driver.start();
    driver.start();
    expect(driver.running).toBe(true);
    vi.advanceTimersByTime(1000);
    expect(timer.remainingSeconds).toBe(59);

    driver.stop();
    expect(driver.running).toBe(false);
    vi.advanceTimersByTime(5000);
    expect(timer.remainingSeconds).toBe(59);
  });
});
