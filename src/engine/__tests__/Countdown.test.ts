import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Countdown } from '../Countdown';

describe('Countdown', () => {
  let countdown: Countdown;

  beforeEach(() => {
    countdown = new Countdown();
  });

  describe('initial state', () => {
    it('starts idle with zero duration', () => {
      expect(countdown.snapshot()).toEqual({
        status: 'idle',
        totalSeconds: 0,
        remainingSeconds: 0,
        progress: 0,
      });
    });

    it('refuses to start without a duration', () => {
      countdown.start();
      expect(countdown.status).toBe('idle');
    });
  });

  describe('configure', () => {
    it('sets the duration and emits stateChange', () => {
      const listener = vi.fn();
      countdown.on('stateChange', listener);
      countdown.configure(90);
      expect(countdown.totalSeconds).toBe(90);
      expect(countdown.remainingSeconds).toBe(90);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(expect.objectContaining({ status: 'idle', totalSeconds: 90 }));
    });

    it('returns a running countdown to idle', () => {
      countdown.configure(60);
      countdown.start();
      countdown.configure(30);
      expect(countdown.status).toBe('idle');
      expect(countdown.remainingSeconds).toBe(30);
    });
  });

  describe('start / pause', () => {
    beforeEach(() => countdown.configure(10));

    it('runs and pauses', () => {
      countdown.start();
      expect(countdown.status).toBe('running');
      countdown.pause();
      expect(countdown.status).toBe('paused');
    });

    it('does not emit when already running', () => {
      countdown.start();
      const listener = vi.fn();
      countdown.on('stateChange', listener);
      countdown.start();
      expect(listener).not.toHaveBeenCalled();
    });

    it('pause is ignored unless running', () => {
      countdown.pause();
      expect(countdown.status).toBe('idle');
    });

    it('resumes from paused keeping the remaining time', () => {
      countdown.start();
      countdown.tick();
      countdown.tick();
      countdown.pause();
      countdown.start();
      expect(countdown.status).toBe('running');
      expect(countdown.remainingSeconds).toBe(8);
    });
  });

  describe('tick', () => {
    beforeEach(() => countdown.configure(4));

    it('is ignored unless running', () => {
      countdown.tick();
      expect(countdown.remainingSeconds).toBe(4);
    });

    it('counts down one second and reports progress', () => {
      const listener = vi.fn();
      countdown.on('tick', listener);
      countdown.start();
      countdown.tick();
      expect(listener).toHaveBeenCalledWith({
        status: 'running',
        totalSeconds: 4,
        remainingSeconds: 3,
        progress: 0.25,
      });
      expect(countdown.elapsedSeconds).toBe(1);
    });

    it('finishes at zero, emitting tick before finished', () => {
      const order: string[] = [];
      countdown.on('tick', () => order.push('tick'));
      countdown.on('finished', () => order.push('finished'));
      countdown.start();
      for (let i = 0; i < 4; i++) countdown.tick();
      expect(countdown.status).toBe('finished');
      expect(countdown.progress).toBe(1);
      expect(order).toEqual(['tick', 'tick', 'tick', 'tick', 'finished']);
    });

    it('does nothing after finishing', () => {
      countdown.start();
      for (let i = 0; i < 4; i++) countdown.tick();
      const listener = vi.fn();
      countdown.on('tick', listener);
      countdown.tick();
      expect(listener).not.toHaveBeenCalled();
      expect(countdown.remainingSeconds).toBe(0);
    });
  });

  describe('off', () => {
    it('removes a listener', () => {
      const listener = vi.fn();
      countdown.on('stateChange', listener);
      countdown.off('stateChange', listener);
      countdown.configure(5);
      expect(listener).not.toHaveBeenCalled();
    });
  });
});
