import axios, { type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import type {
  DrillingSpeedSubmission,
  Hole,
  HoleSource,
  ProjectId,
  TelemetrySink,
} from '../types/Telemetry';
import { createLogger } from '../utils/logger';
import { toUtcSecondsIso } from '../utils/timeUtils';

/**
 * Client for the remote holes API
 *
 * Every call reports failure as null/false instead of throwing: timeouts,
 * refused connections, non-2xx statuses and unexpected bodies are logged here
 * and never reach the caller as exceptions.
 */

// =============================================================================
// Types
// =============================================================================

export interface HolesApiClientOptions {
  /** Base URL including the /api prefix, e.g. https://example.com/api */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

export interface HoleGps {
  lat: number;
  lon: number;
  elevation: number | null;
}

export interface HoleGpsUpdate {
  lat: number;
  lon: number;
  elevation?: number;
}

const coordinate = z.union([z.number(), z.string()]).nullish();

const rawHoleSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  hole_id: z.union([z.string(), z.number()]).nullish(),
  name: z.string().nullish(),
  gps_lat: coordinate,
  gps_lon: coordinate,
  gps_elevation: coordinate,
  gps: z
    .object({
      lat: coordinate,
      lon: coordinate,
      elevation: coordinate,
    })
    .nullish(),
});

const holeListSchema = z.object({
  success: z.literal(true),
  holes: z.array(z.unknown()),
});

const holeDetailSchema = z.object({
  success: z.literal(true),
  hole: z.unknown(),
});

const acknowledgementSchema = z.object({
  success: z.boolean(),
});

type RawHole = z.infer<typeof rawHoleSchema>;

export const DEFAULT_API_BASE_URL = 'http://localhost:3000/api';
export const DEFAULT_API_TIMEOUT_MS = 10000;

// =============================================================================
// Normalization
// =============================================================================

function toCoordinate(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Map one listing entry onto a Hole. Entries without any identifier are dropped.
 */
export function normalizeHole(raw: unknown): Hole | null {
  const parsed = rawHoleSchema.safeParse(raw);
  if (!parsed.success) return null;

  const hole: RawHole = parsed.data;
  const identifier = hole.hole_id ?? hole.id;
  if (identifier === null || identifier === undefined || identifier === '') return null;

  const externalId = String(identifier);

  return {
    externalId,
    latitude: toCoordinate(hole.gps_lat ?? hole.gps?.lat),
    longitude: toCoordinate(hole.gps_lon ?? hole.gps?.lon),
    elevation: toCoordinate(hole.gps_elevation ?? hole.gps?.elevation),
    name: hole.name ?? externalId,
  };
}

// =============================================================================
// Client
// =============================================================================

export class HolesApiClient implements HoleSource, TelemetrySink {
  private readonly logger = createLogger({ component: 'HolesApiClient' });
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: HolesApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_API_TIMEOUT_MS;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * GET /projects/{projectId}/holes
   */
  async getAllHoles(projectId: ProjectId): Promise<Hole[] | null> {
    const body = await this.request('GET', `/projects/${projectId}/holes`);
    if (body === null) return null;

    const parsed = holeListSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ projectId }, 'Unexpected hole listing response');
      return null;
    }

    const holes: Hole[] = [];
    for (const entry of parsed.data.holes) {
      const hole = normalizeHole(entry);
      if (hole) {
        holes.push(hole);
      }
    }

    const dropped = parsed.data.holes.length - holes.length;
    if (dropped > 0) {
      this.logger.warn({ projectId, dropped }, 'Skipped hole entries without an identifier');
    }

    return holes;
  }

  /**
   * GET /projects/{projectId}/holes/{holeId}
   */
  async getHole(projectId: ProjectId, holeId: string | number): Promise<Hole | null> {
    const body = await this.request('GET', `/projects/${projectId}/holes/${encodeURIComponent(String(holeId))}`);
    if (body === null) return null;

    const parsed = holeDetailSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ projectId, holeId }, 'Unexpected hole detail response');
      return null;
    }

    return normalizeHole(parsed.data.hole);
  }

  /**
   * Look a hole up by its external identifier ("HK01", "LK1", ...) in the project listing
   */
  async findHoleByHoleId(projectId: ProjectId, externalId: string): Promise<Hole | null> {
    const holes = await this.getAllHoles(projectId);
    return holes?.find((hole) => hole.externalId === externalId) ?? null;
  }

  /**
   * Surveyed coordinates of one hole, null when it has none
   */
  async getHoleGps(projectId: ProjectId, holeId: string | number): Promise<HoleGps | null> {
    const hole = await this.getHole(projectId, holeId);
    if (!hole || hole.latitude === null || hole.longitude === null) {
      return null;
    }
    return { lat: hole.latitude, lon: hole.longitude, elevation: hole.elevation };
  }

  /**
   * PATCH /projects/{projectId}/holes/{holeId}/gps
   */
  async updateHoleGps(projectId: ProjectId, holeId: string | number, gps: HoleGpsUpdate): Promise<boolean> {
    const data: Record<string, number> = { lon: gps.lon, lat: gps.lat };
    if (gps.elevation !== undefined) {
      data.elevation = gps.elevation;
    }

    const body = await this.request(
      'PATCH',
      `/projects/${projectId}/holes/${encodeURIComponent(String(holeId))}/gps`,
      { data }
    );
    return this.isAcknowledged(body);
  }

  /**
   * POST /projects/{projectId}/holes/{holeId}/drilling-speed
   */
  async postDrillingSpeed(
    projectId: ProjectId,
    holeId: string,
    submission: DrillingSpeedSubmission
  ): Promise<boolean> {
    const data: Record<string, string | number> = {
      speed: submission.speed,
      depth: submission.depth,
      timestamp: toUtcSecondsIso(submission.timestamp),
    };
    if (submission.sensorId) {
      data.sensor_id = submission.sensorId;
    }

    const body = await this.request(
      'POST',
      `/projects/${projectId}/holes/${encodeURIComponent(holeId)}/drilling-speed`,
      { data }
    );
    const acknowledged = this.isAcknowledged(body);

    if (!acknowledged) {
      this.logger.warn({ projectId, holeId, response: body }, 'Drilling-speed submission not acknowledged');
    }
    return acknowledged;
  }

  /**
   * Whether the API host answers at all. 200, 403 and 404 all mean a live server.
   */
  async testConnection(): Promise<boolean> {
    try {
      const response = await axios.get(this.baseUrl, {
        timeout: Math.min(this.timeoutMs, 5000),
        validateStatus: () => true,
      });
      const reachable = [200, 403, 404].includes(response.status);
      this.logger.info({ url: this.baseUrl, status: response.status, reachable }, 'API connection test');
      return reachable;
    } catch (error) {
      this.logError('Error testing API connection', this.baseUrl, error);
      return false;
    }
  }

  private isAcknowledged(body: unknown): boolean {
    if (body === null) return false;
    const parsed = acknowledgementSchema.safeParse(body);
    return parsed.success && parsed.data.success;
  }

  /**
   * Perform a request and return its JSON body, or null on any failure
   */
  private async request(
    method: 'GET' | 'POST' | 'PATCH',
    endpoint: string,
    config: Pick<AxiosRequestConfig, 'data'> = {}
  ): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;
    const requestConfig: AxiosRequestConfig = {
      timeout: this.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
    };

    try {
      const response = method === 'GET'
        ? await axios.get<unknown>(url, requestConfig)
        : method === 'POST'
          ? await axios.post<unknown>(url, config.data, requestConfig)
          : await axios.patch<unknown>(url, config.data, requestConfig);

      return response.data ?? null;
    } catch (error) {
      this.logError(`API ${method} failed`, url, error);
      return null;
    }
  }

  private logError(message: string, url: string, error: unknown): void {
    if (axios.isAxiosError(error)) {
      this.logger.error({
        url,
        error: error.message,
        code: error.code,
        status: error.response?.status,
      }, message);
    } else {
      this.logger.error({ url, error }, message);
    }
  }
}
