/**
 * Core types for position correlation and drilling telemetry
 * These are transport and API agnostic
 */

export type ProjectId = string | number;

export interface PositionFix {
  latitude: number;
  longitude: number;
  elevation: number | null; // meters
  receivedAt: Date;
  source: 'sentence' | 'structured';
}

export interface Hole {
  externalId: string;
  latitude: number | null;
  longitude: number | null;
  elevation: number | null;
  name: string;
}

export interface HoleSetCache {
  holes: readonly Hole[];
  fetchedAt: number; // epoch milliseconds
  ttlMs: number;
}

export interface TelemetrySample {
  velocityMetersPerSecond: number;
  depthMeters: number;
  capturedAt: Date;
}

export interface DrillingSpeedSubmission {
  speed: number;
  depth: number;
  timestamp: Date;
  sensorId?: string;
}

export interface DeliveryStats {
  sent: number;
  failed: number;
  lastSendTimestamp: Date | null;
}

export interface CorrelationStats {
  messagesReceived: number;
  messagesDiscarded: number;
  messagesDropped: number; // backlog full
  fixesProcessed: number;
  matchesRejected: number;
  holesUpdated: number;
  submissionsFailed: number;
  lastUpdateTimestamp: Date | null;
  lastFix: PositionFix | null;
}

export interface HoleMatch {
  hole: Hole | null;
  distance: number; // meters, Infinity when nothing matched
}

export interface RankedHole {
  hole: Hole;
  distance: number;
}

/**
 * Remote listing of a project's holes
 * Resolves null when the listing could not be obtained
 */
export interface HoleSource {
  getAllHoles(projectId: ProjectId): Promise<Hole[] | null>;
}

/**
 * Remote drilling-speed endpoint
 * Resolves true only when the remote side acknowledged the submission
 */
export interface TelemetrySink {
  postDrillingSpeed(
    projectId: ProjectId,
    holeId: string,
    submission: DrillingSpeedSubmission
  ): Promise<boolean>;
}

export type TransportMessageHandler = (topic: string, payload: Buffer) => void;

/**
 * Publish/subscribe transport delivering raw position messages
 */
export interface PositionTransport {
  connect(): Promise<void>;
  subscribe(topic: string): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  disconnect(): Promise<void>;
  on(event: 'message', listener: TransportMessageHandler): this;
  off(event: 'message', listener: TransportMessageHandler): this;
}
