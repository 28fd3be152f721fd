import { EventEmitter } from 'node:events';
import type {
  CorrelationStats,
  Hole,
  PositionFix,
  PositionTransport,
  ProjectId,
  TelemetrySample,
  TelemetrySink,
} from '../types/Telemetry';
import type { HoleDirectory } from './HoleDirectory';
import { DEFAULT_MAX_DISTANCE_M, findNearest, isWithinGate } from './NearestHoleMatcher';
import { parsePositionMessage } from './PositionParser';
import { createLogger } from '../utils/logger';
import { formatDistance } from '../utils/geoMath';
import { settleWithin } from '../utils/timeUtils';

/**
 * Position correlation service
 *
 * Subscribes to GNSS position messages, matches each fix against the project's
 * holes and, when the rig stands within the distance gate of one, submits the
 * current drilling sample for that hole.
 *
 * Without a hole directory, sink and project id it runs in position-monitoring
 * mode: fixes are parsed and counted, nothing is submitted.
 *
 * Events:
 * - 'fix'            (PositionFix)
 * - 'match'          ({ fix, hole, distance })
 * - 'match-rejected' ({ fix, hole, distance })  nearest hole missing or beyond the gate
 * - 'hole-updated'   ({ fix, hole, distance, sample })
 */

// =============================================================================
// Types
// =============================================================================

export interface CorrelationLinkage {
  projectId: ProjectId;
  holeDirectory: HoleDirectory;
  sink: TelemetrySink;
}

export interface PositionCorrelationOptions {
  transport: PositionTransport;
  /** Topic pattern, single-level wildcards allowed (default: device/+/upload) */
  topic?: string;
  linkage?: CorrelationLinkage;
  /** Distance gate in meters (default: 10) */
  maxDistanceMeters?: number;
  sensorId?: string;
  /** Include elevation in the match distance when both sides have one (default: false) */
  use3d?: boolean;
  /** Upper bound for draining in-flight messages on stop (default: 5000) */
  stopTimeoutMs?: number;
  /** Messages allowed to wait for processing; newer ones are dropped beyond it (default: 100) */
  maxPendingMessages?: number;
}

export interface HoleMatchEvent {
  fix: PositionFix;
  hole: Hole | null;
  distance: number;
}

export interface HoleUpdatedEvent {
  fix: PositionFix;
  hole: Hole;
  distance: number;
  sample: TelemetrySample;
}

export const DEFAULT_POSITION_TOPIC = 'device/+/upload';
export const DEFAULT_GNSS_SENSOR_ID = 'GNSS_RIG';
export const DEFAULT_MAX_PENDING_MESSAGES = 100;

// =============================================================================
// Service
// =============================================================================

export class PositionCorrelationService extends EventEmitter {
  private readonly logger = createLogger({ component: 'PositionCorrelation' });
  private readonly transport: PositionTransport;
  private readonly topic: string;
  private readonly linkage: CorrelationLinkage | null;
  private readonly maxDistanceMeters: number;
  private readonly sensorId: string;
  private readonly use3d: boolean;
  private readonly stopTimeoutMs: number;
  private readonly maxPendingMessages: number;

  private running = false;
  private pendingMessages = 0;
  private currentSample: TelemetrySample | null = null;
  private processing: Promise<void> = Promise.resolve();
  private readonly stats: CorrelationStats = {
    messagesReceived: 0,
    messagesDiscarded: 0,
    messagesDropped: 0,
    fixesProcessed: 0,
    matchesRejected: 0,
    holesUpdated: 0,
    submissionsFailed: 0,
    lastUpdateTimestamp: null,
    lastFix: null,
  };

  private readonly onTransportMessage = (topic: string, payload: Buffer): void => {
    this.handleMessage(topic, payload);
  };

  constructor(options: PositionCorrelationOptions) {
    super();
    this.transport = options.transport;
    this.topic = options.topic ?? DEFAULT_POSITION_TOPIC;
    this.linkage = options.linkage ?? null;
    this.maxDistanceMeters = options.maxDistanceMeters ?? DEFAULT_MAX_DISTANCE_M;
    this.sensorId = options.sensorId ?? DEFAULT_GNSS_SENSOR_ID;
    this.use3d = options.use3d ?? false;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
    this.maxPendingMessages = Math.max(1, options.maxPendingMessages ?? DEFAULT_MAX_PENDING_MESSAGES);
  }

  /**
   * Connect and subscribe. Resolves false when the broker cannot be reached.
   */
  async start(): Promise<boolean> {
    if (this.running) {
      return true;
    }

    try {
      await this.transport.connect();
      await this.transport.subscribe(this.topic);
    } catch (error) {
      this.logger.error({ topic: this.topic, error }, 'Could not start position correlation');
      await this.transport.disconnect().catch((disconnectError: unknown) => {
        this.logger.warn({ error: disconnectError }, 'Error closing transport after failed start');
      });
      return false;
    }

    this.transport.on('message', this.onTransportMessage);
    this.running = true;
    this.logger.info(
      { topic: this.topic, projectId: this.linkage?.projectId, maxDistance: this.maxDistanceMeters },
      this.linkage ? 'Position correlation started' : 'Position monitoring started (no project linkage)'
    );
    return true;
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.transport.off('message', this.onTransportMessage);

    const drained = await settleWithin(this.processing, this.stopTimeoutMs);
    if (!drained) {
      this.logger.warn('Message processing still running after stop timeout');
    }

    try {
      await this.transport.unsubscribe(this.topic);
      await this.transport.disconnect();
    } catch (error) {
      this.logger.warn({ error }, 'Error while closing transport');
    }

    this.logger.info({ stats: this.getStats() }, 'Position correlation stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  hasLinkage(): boolean {
    return this.linkage !== null;
  }

  getProjectId(): ProjectId | null {
    return this.linkage?.projectId ?? null;
  }

  getMaxDistanceMeters(): number {
    return this.maxDistanceMeters;
  }

  /**
   * Replace the drilling sample submitted on the next successful match
   */
  setDrillingData(velocityMetersPerSecond: number, depthMeters: number, capturedAt: Date = new Date()): void {
    this.currentSample = { velocityMetersPerSecond, depthMeters, capturedAt };
  }

  clearDrillingData(): void {
    this.currentSample = null;
  }

  getDrillingData(): TelemetrySample | null {
    return this.currentSample ? { ...this.currentSample } : null;
  }

  getStats(): CorrelationStats {
    return { ...this.stats };
  }

  /**
   * Messages received but not yet processed
   */
  getPendingCount(): number {
    return this.pendingMessages;
  }

  /**
   * Resolves once every message received so far has been processed
   */
  whenIdle(): Promise<void> {
    return this.processing;
  }

  /**
   * Transport callback. Messages are processed one at a time, in arrival order.
   * While maxPendingMessages are already waiting, new ones are dropped.
   */
  handleMessage(topic: string, payload: Buffer | string): void {
    if (!this.running) {
      return;
    }

    this.stats.messagesReceived += 1;

    if (this.pendingMessages >= this.maxPendingMessages) {
      this.stats.messagesDropped += 1;
      if (this.stats.messagesDropped === 1 || this.stats.messagesDropped % this.maxPendingMessages === 0) {
        this.logger.warn(
          { topic, pending: this.pendingMessages, dropped: this.stats.messagesDropped },
          'Position backlog full, dropping message'
        );
      }
      return;
    }

    this.pendingMessages += 1;
    const receivedAt = new Date();
    this.processing = this.processing.then(async () => {
      try {
        await this.processMessage(topic, payload, receivedAt);
      } finally {
        this.pendingMessages -= 1;
      }
    });
  }

  private async processMessage(topic: string, payload: Buffer | string, receivedAt: Date): Promise<void> {
    try {
      const fix = parsePositionMessage(payload, receivedAt);
      if (!fix) {
        this.stats.messagesDiscarded += 1;
        this.logger.debug({ topic }, 'No position found in message');
        return;
      }

      await this.processFix(Object.freeze(fix));
    } catch (error) {
      this.logger.error({ topic, error }, 'Error processing position message');
    }
  }

  private async processFix(fix: PositionFix): Promise<void> {
    this.stats.fixesProcessed += 1;
    this.stats.lastFix = fix;
    this.emit('fix', fix);

    if (!this.linkage) {
      return;
    }

    const { projectId, holeDirectory, sink } = this.linkage;
    const holes = await holeDirectory.getHoles(projectId);
    if (holes.length === 0) {
      this.logger.info({ projectId }, 'No holes to compare against');
      return;
    }

    const match = findNearest(holes, fix, { use3d: this.use3d });
    if (!isWithinGate(match, this.maxDistanceMeters)) {
      this.stats.matchesRejected += 1;
      this.emit('match-rejected', { fix, hole: match.hole, distance: match.distance } satisfies HoleMatchEvent);
      this.logger.debug(
        {
          hole: match.hole?.externalId,
          distance: Number.isFinite(match.distance) ? formatDistance(match.distance) : null,
          maxDistance: this.maxDistanceMeters,
        },
        'Nearest hole outside distance gate'
      );
      return;
    }

    const { hole, distance } = match;
    this.emit('match', { fix, hole, distance } satisfies HoleMatchEvent);

    const sample = this.currentSample;
    if (!sample) {
      return;
    }

    let delivered = false;
    try {
      delivered = await sink.postDrillingSpeed(projectId, hole.externalId, {
        speed: sample.velocityMetersPerSecond,
        depth: sample.depthMeters,
        timestamp: sample.capturedAt,
        sensorId: this.sensorId,
      });
    } catch (error) {
      this.logger.error({ hole: hole.externalId, error }, 'Error sending drilling-speed');
    }

    if (!delivered) {
      this.stats.submissionsFailed += 1;
      this.logger.warn({ hole: hole.externalId }, 'Could not send drilling-speed for hole');
      return;
    }

    this.stats.holesUpdated += 1;
    this.stats.lastUpdateTimestamp = new Date();
    this.emit('hole-updated', { fix, hole, distance, sample } satisfies HoleUpdatedEvent);
    this.logger.info(
      {
        hole: hole.externalId,
        distance: formatDistance(distance),
        speed: sample.velocityMetersPerSecond,
        depth: sample.depthMeters,
      },
      'Drilling-speed sent for nearest hole'
    );
  }
}
