import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { type FlushEvent, TelemetryCoalescingQueue } from '../TelemetryQueue';
import type { DrillingSpeedSubmission, ProjectId } from '../../types/Telemetry';

type PostDrillingSpeed = (
  projectId: ProjectId,
  holeId: string,
  submission: DrillingSpeedSubmission
) => Promise<boolean>;

const T0 = new Date('2025-12-03T10:00:00Z');
const T1 = new Date('2025-12-03T10:00:01Z');
const T2 = new Date('2025-12-03T10:00:02Z');

describe('TelemetryCoalescingQueue', () => {
  let postDrillingSpeed: Mock<PostDrillingSpeed>;
  let queue: TelemetryCoalescingQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    postDrillingSpeed = vi.fn<PostDrillingSpeed>().mockResolvedValue(true);
    queue = new TelemetryCoalescingQueue({
      sink: { postDrillingSpeed },
      projectId: 7,
      holeId: 'H-1',
      sensorId: 'LASER_SENSOR',
      flushIntervalMs: 2000,
    });
  });

  afterEach(async () => {
    await queue.stop();
    vi.useRealTimers();
  });

  describe('buffering', () => {
    it('should keep samples oldest first', () => {
      queue.addReading(0.1, 1, T0);
      queue.addReading(0.2, 2, T1);

      expect(queue.size()).toBe(2);
      expect(queue.getSamples().map((s) => s.depthMeters)).toEqual([1, 2]);
      expect(queue.peekLatest()).toEqual({ velocityMetersPerSecond: 0.2, depthMeters: 2, capturedAt: T1 });
    });

    it('should evict the oldest samples beyond capacity', () => {
      const small = new TelemetryCoalescingQueue({ sink: { postDrillingSpeed }, projectId: 7, capacity: 2 });

      small.addReading(0.1, 1, T0);
      small.addReading(0.2, 2, T1);
      small.addReading(0.3, 3, T2);

      expect(small.getCapacity()).toBe(2);
      expect(small.getSamples().map((s) => s.depthMeters)).toEqual([2, 3]);
    });

    it('should default to a capacity of 1000', () => {
      const defaults = new TelemetryCoalescingQueue({ sink: { postDrillingSpeed }, projectId: 7 });
      expect(defaults.getCapacity()).toBe(1000);
    });
  });

  describe('flush', () => {
    it('should deliver only the newest sample and clear the buffer', async () => {
      queue.addReading(0.1, 1, T0);
      queue.addReading(0.2, 2, T1);
      queue.addReading(0.3, 3, T2);

      await expect(queue.flush()).resolves.toBe('sent');

      expect(postDrillingSpeed).toHaveBeenCalledOnce();
      expect(postDrillingSpeed).toHaveBeenCalledWith(7, 'H-1', {
        speed: 0.3,
        depth: 3,
        timestamp: T2,
        sensorId: 'LASER_SENSOR',
      });
      expect(queue.size()).toBe(0);
      expect(queue.getStats()).toMatchObject({ sent: 1, failed: 0 });
      expect(queue.getStats().lastSendTimestamp).toBeInstanceOf(Date);
    });

    it('should keep the buffer when the delivery is rejected', async () => {
      postDrillingSpeed.mockResolvedValueOnce(false);
      queue.addReading(0.1, 1, T0);
      queue.addReading(0.2, 2, T1);

      await expect(queue.flush()).resolves.toBe('failed');

      expect(queue.size()).toBe(2);
      expect(queue.getStats()).toEqual({ sent: 0, failed: 1, lastSendTimestamp: null });
    });

    it('should treat a throwing sink as a failed delivery', async () => {
      postDrillingSpeed.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      queue.addReading(0.1, 1, T0);

      await expect(queue.flush()).resolves.toBe('failed');
      expect(queue.size()).toBe(1);
    });

    it('should retry with the newest sample after a failure', async () => {
      postDrillingSpeed.mockResolvedValueOnce(false);
      queue.addReading(0.1, 1, T0);
      await queue.flush();

      queue.addReading(0.2, 2, T1);
      await queue.flush();

      expect(postDrillingSpeed).toHaveBeenCalledTimes(2);
      expect(postDrillingSpeed.mock.calls[1][2].depth).toBe(2);
      expect(queue.size()).toBe(0);
    });

    it('should not call the sink when empty or without a hole', async () => {
      await expect(queue.flush()).resolves.toBe('empty');

      const untargeted = new TelemetryCoalescingQueue({ sink: { postDrillingSpeed }, projectId: 7 });
      untargeted.addReading(0.1, 1, T0);
      await expect(untargeted.flush()).resolves.toBe('no-target');

      expect(postDrillingSpeed).not.toHaveBeenCalled();
    });

    it('should share a flush already in flight', async () => {
      queue.addReading(0.1, 1, T0);

      const first = queue.flush();
      const second = queue.flush();

      expect(second).toBe(first);
      await first;
      expect(postDrillingSpeed).toHaveBeenCalledOnce();
    });

    it('should emit flushed and flush-failed events', async () => {
      const flushed = vi.fn<(event: FlushEvent) => void>();
      const failed = vi.fn<(event: FlushEvent) => void>();
      queue.on('flushed', flushed);
      queue.on('flush-failed', failed);

      postDrillingSpeed.mockResolvedValueOnce(false);
      queue.addReading(0.1, 1, T0);
      await queue.flush();
      await queue.flush();

      const sample = { velocityMetersPerSecond: 0.1, depthMeters: 1, capturedAt: T0 };
      expect(failed).toHaveBeenCalledWith({ holeId: 'H-1', sample });
      expect(flushed).toHaveBeenCalledWith({ holeId: 'H-1', sample });
    });

    it('should send buffered samples to a newly selected hole', async () => {
      queue.addReading(0.1, 1, T0);
      queue.setHoleId('H-2');

      await queue.flush();

      expect(queue.getHoleId()).toBe('H-2');
      expect(postDrillingSpeed.mock.calls[0][1]).toBe('H-2');
    });
  });

  describe('start and stop', () => {
    it('should refuse to start without a hole', () => {
      const untargeted = new TelemetryCoalescingQueue({ sink: { postDrillingSpeed }, projectId: 7 });

      expect(untargeted.start()).toBe(false);
      expect(untargeted.isRunning()).toBe(false);
    });

    it('should flush on every interval', async () => {
      expect(queue.start()).toBe(true);
      expect(queue.start()).toBe(true);

      queue.addReading(0.1, 1, T0);
      await vi.advanceTimersByTimeAsync(1999);
      expect(postDrillingSpeed).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(postDrillingSpeed).toHaveBeenCalledOnce();

      queue.addReading(0.2, 2, T1);
      await vi.advanceTimersByTimeAsync(2000);
      expect(postDrillingSpeed).toHaveBeenCalledTimes(2);
    });

    it('should skip the sink on intervals with nothing buffered', async () => {
      queue.start();

      await vi.advanceTimersByTimeAsync(6000);

      expect(postDrillingSpeed).not.toHaveBeenCalled();
    });

    it('should flush once more on stop', async () => {
      queue.start();
      queue.addReading(0.4, 4, T2);

      await expect(queue.stop()).resolves.toBe(true);

      expect(queue.isRunning()).toBe(false);
      expect(postDrillingSpeed).toHaveBeenCalledOnce();
      expect(postDrillingSpeed.mock.calls[0][2].depth).toBe(4);

      await vi.advanceTimersByTimeAsync(10_000);
      expect(postDrillingSpeed).toHaveBeenCalledOnce();
    });

    it('should give up on a final flush that outlasts the stop timeout', async () => {
      const stuck = new TelemetryCoalescingQueue({
        sink: { postDrillingSpeed: () => new Promise<boolean>(() => {}) },
        projectId: 7,
        holeId: 'H-1',
        stopTimeoutMs: 500,
      });
      stuck.start();
      stuck.addReading(0.1, 1, T0);

      const stopped = stuck.stop();
      await vi.advanceTimersByTimeAsync(500);

      await expect(stopped).resolves.toBe(false);
    });

    it('should resolve true when stopping a queue that never started', async () => {
      const idle = new TelemetryCoalescingQueue({ sink: { postDrillingSpeed }, projectId: 7 });
      await expect(idle.stop()).resolves.toBe(true);
    });
  });
});
