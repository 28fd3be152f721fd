import { EventEmitter } from 'node:events';
import type {
  DeliveryStats,
  DrillingSpeedSubmission,
  ProjectId,
  TelemetrySample,
  TelemetrySink,
} from '../types/Telemetry';
import { createLogger } from '../utils/logger';
import { settleWithin } from '../utils/timeUtils';

/**
 * Coalescing telemetry queue
 *
 * Buffers samples from the sensor pipeline and, on every flush, delivers only
 * the most recent one. A successful delivery clears the whole buffer; a failed
 * one leaves it untouched so the next flush retries with whatever is newest then.
 *
 * Guarantees delivery of at most the freshest value per flush, never every sample.
 * Do not use it where each reading must reach the server.
 *
 * Events:
 * - 'flushed'       ({ holeId, sample })  after a successful delivery
 * - 'flush-failed'  ({ holeId, sample })  after a rejected or failed delivery
 */

// =============================================================================
// Types
// =============================================================================

export interface TelemetryQueueOptions {
  sink: TelemetrySink;
  projectId: ProjectId;
  /** Hole the samples belong to; deliveries wait until one is set */
  holeId?: string | null;
  sensorId?: string;
  /** Maximum buffered samples, oldest evicted first (default: 1000) */
  capacity?: number;
  /** Delivery cadence in milliseconds (default: 2000) */
  flushIntervalMs?: number;
  /** Upper bound for the final flush on stop (default: 5000) */
  stopTimeoutMs?: number;
}

export type FlushOutcome = 'sent' | 'failed' | 'empty' | 'no-target';

export interface FlushEvent {
  holeId: string;
  sample: TelemetrySample;
}

export const DEFAULT_QUEUE_CAPACITY = 1000;
export const DEFAULT_FLUSH_INTERVAL_MS = 2000;
export const DEFAULT_STOP_TIMEOUT_MS = 5000;

// =============================================================================
// Queue
// =============================================================================

export class TelemetryCoalescingQueue extends EventEmitter {
  private readonly logger = createLogger({ component: 'TelemetryQueue' });
  private readonly sink: TelemetrySink;
  private readonly projectId: ProjectId;
  private readonly sensorId: string | undefined;
  private readonly capacity: number;
  private readonly flushIntervalMs: number;
  private readonly stopTimeoutMs: number;

  private holeId: string | null;
  private samples: TelemetrySample[] = [];
  private flushTimer?: NodeJS.Timeout;
  private inFlight: Promise<FlushOutcome> | null = null;
  private readonly stats: DeliveryStats = {
    sent: 0,
    failed: 0,
    lastSendTimestamp: null,
  };

  constructor(options: TelemetryQueueOptions) {
    super();
    this.sink = options.sink;
    this.projectId = options.projectId;
    this.holeId = options.holeId ?? null;
    this.sensorId = options.sensorId;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_QUEUE_CAPACITY);
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  /**
   * Buffer a sample, evicting the oldest ones beyond capacity
   */
  add(sample: TelemetrySample): void {
    this.samples.push(sample);

    const overflow = this.samples.length - this.capacity;
    if (overflow > 0) {
      this.samples.splice(0, overflow);
    }
  }

  addReading(velocityMetersPerSecond: number, depthMeters: number, capturedAt: Date = new Date()): void {
    this.add({ velocityMetersPerSecond, depthMeters, capturedAt });
  }

  /**
   * Retarget deliveries; buffered samples go to the new hole on the next flush
   */
  setHoleId(holeId: string): void {
    if (holeId === this.holeId) return;
    this.logger.info({ previous: this.holeId, holeId }, 'Delivery target changed');
    this.holeId = holeId;
  }

  getHoleId(): string | null {
    return this.holeId;
  }

  size(): number {
    return this.samples.length;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /**
   * Buffered samples, oldest first
   */
  getSamples(): TelemetrySample[] {
    return [...this.samples];
  }

  peekLatest(): TelemetrySample | undefined {
    return this.samples[this.samples.length - 1];
  }

  getStats(): DeliveryStats {
    return { ...this.stats };
  }

  isRunning(): boolean {
    return this.flushTimer !== undefined;
  }

  /**
   * Start periodic delivery. Refuses to run without a target hole.
   */
  start(): boolean {
    if (this.flushTimer) {
      this.logger.warn('Telemetry queue already running');
      return true;
    }

    if (!this.holeId) {
      this.logger.warn({ projectId: this.projectId }, 'Telemetry queue not started: no hole selected');
      return false;
    }

    this.flushTimer = setInterval(async () => {
      try {
        await this.flush();
      } catch (error) {
        this.logger.error({ error }, 'Error during scheduled flush');
      }
    }, this.flushIntervalMs);

    this.logger.info(
      { projectId: this.projectId, holeId: this.holeId, intervalMs: this.flushIntervalMs },
      'Telemetry queue started'
    );
    return true;
  }

  /**
   * Stop periodic delivery after one last flush.
   * Resolves false when the final flush did not finish within the stop timeout.
   */
  async stop(): Promise<boolean> {
    if (!this.flushTimer) {
      return true;
    }

    clearInterval(this.flushTimer);
    this.flushTimer = undefined;

    const finalFlush = (async () => {
      if (this.inFlight) {
        await this.inFlight;
      }
      await this.flush();
    })();

    const finished = await settleWithin(finalFlush, this.stopTimeoutMs);
    if (!finished) {
      this.logger.warn({ timeoutMs: this.stopTimeoutMs }, 'Final flush still running after stop timeout');
    }

    this.logger.info({ stats: this.getStats(), pending: this.samples.length }, 'Telemetry queue stopped');
    return finished;
  }

  /**
   * Deliver the newest buffered sample. Concurrent calls share the flush in flight.
   */
  flush(): Promise<FlushOutcome> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const run = this.deliverLatest().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async deliverLatest(): Promise<FlushOutcome> {
    const holeId = this.holeId;
    if (!holeId) {
      return 'no-target';
    }

    const sample = this.peekLatest();
    if (!sample) {
      return 'empty';
    }

    const submission: DrillingSpeedSubmission = {
      speed: sample.velocityMetersPerSecond,
      depth: sample.depthMeters,
      timestamp: sample.capturedAt,
      sensorId: this.sensorId,
    };

    let delivered = false;
    try {
      delivered = await this.sink.postDrillingSpeed(this.projectId, holeId, submission);
    } catch (error) {
      this.logger.error({ holeId, error }, 'Error sending drilling data');
    }

    if (delivered) {
      this.samples = [];
      this.stats.sent += 1;
      this.stats.lastSendTimestamp = new Date();
      this.emit('flushed', { holeId, sample } satisfies FlushEvent);
      this.logger.debug(
        { holeId, speed: submission.speed, depth: submission.depth },
        'Drilling data delivered'
      );
      return 'sent';
    }

    this.stats.failed += 1;
    this.emit('flush-failed', { holeId, sample } satisfies FlushEvent);
    this.logger.warn({ holeId, pending: this.samples.length }, 'Failed to send drilling data');
    return 'failed';
  }
}
