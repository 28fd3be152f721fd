/**
 * PositionParser - Decode inbound GNSS messages into position fixes
 *
 * Understands GGA sentences from any constellation talker ($GPGGA, $GNGGA,
 * $GLGGA, ...) and JSON objects in several key layouts. Never throws:
 * anything it cannot read yields null.
 */

import type { PositionFix } from '../types/Telemetry';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'PositionParser' });

// =============================================================================
// Types
// =============================================================================

export type RawPositionMessage = string | Buffer | Record<string, unknown>;

export interface GgaPosition {
  latitude: number;
  longitude: number;
  altitude: number;
}

/**
 * One accepted JSON layout: where the coordinates live and which keys name them.
 * Keys are tried in order; the first key present wins.
 */
export interface ExtractionRule {
  name: string;
  path: readonly string[];
  priority: number;
  latitudeKeys: readonly string[];
  longitudeKeys: readonly string[];
  elevationKeys: readonly string[];
}

type Lookup<T> = { found: false } | { found: true; value: T };

// =============================================================================
// Extraction rules
// =============================================================================

const NESTED_LATITUDE = ['lat', 'latitude'] as const;
const NESTED_LONGITUDE = ['lon', 'longitude'] as const;
const NESTED_ELEVATION = ['elevation', 'alt'] as const;

export const EXTRACTION_RULES: readonly ExtractionRule[] = [
  {
    name: 'root',
    path: [],
    priority: 0,
    latitudeKeys: ['lat', 'latitude', 'gps_lat'],
    longitudeKeys: ['lon', 'longitude', 'gps_lon'],
    elevationKeys: ['elevation', 'alt', 'gps_elevation'],
  },
  {
    name: 'gps',
    path: ['gps'],
    priority: 1,
    latitudeKeys: NESTED_LATITUDE,
    longitudeKeys: NESTED_LONGITUDE,
    elevationKeys: NESTED_ELEVATION,
  },
  {
    name: 'location',
    path: ['location'],
    priority: 2,
    latitudeKeys: NESTED_LATITUDE,
    longitudeKeys: NESTED_LONGITUDE,
    elevationKeys: NESTED_ELEVATION,
  },
  {
    name: 'gnss',
    path: ['gnss'],
    priority: 3,
    latitudeKeys: NESTED_LATITUDE,
    longitudeKeys: NESTED_LONGITUDE,
    elevationKeys: NESTED_ELEVATION,
  },
];

const ORDERED_RULES = [...EXTRACTION_RULES].sort((a, b) => a.priority - b.priority);

// =============================================================================
// Sentence form
// =============================================================================

const MIN_GGA_FIELDS = 10;

export function isGgaSentence(text: string): boolean {
  return text.startsWith('$') && text.slice(0, 7).includes('GGA');
}

/**
 * Convert a DDMM.MMMM / DDDMM.MMMM magnitude to decimal degrees.
 * Degrees are everything before the last two digits ahead of the decimal point.
 */
function parseDegreesMinutes(raw: string): number | null {
  const dotIndex = raw.indexOf('.');
  if (dotIndex < 0) return null;

  const degreeLength = dotIndex - 2;
  if (degreeLength < 0) return null;

  const degreePart = raw.slice(0, degreeLength);
  const degrees = degreePart === '' ? 0 : Number(degreePart);
  const minutes = Number(raw.slice(degreeLength));

  if (!Number.isFinite(degrees) || !Number.isFinite(minutes)) return null;

  return degrees + minutes / 60;
}

/**
 * Parse a GGA sentence. Returns null for anything that is not a usable GGA fix.
 *
 * Format: $xxGGA,time,lat,N|S,lon,E|W,quality,numSV,HDOP,alt,M,sep,M,diffAge,station*cs
 */
export function parseGgaSentence(sentence: string): GgaPosition | null {
  const text = sentence.trim();
  if (!isGgaSentence(text)) return null;

  const fields = text.split(',');
  if (fields.length < MIN_GGA_FIELDS) return null;

  const [rawLat, latHemisphere, rawLon, lonHemisphere] = fields.slice(2, 6);
  if (!rawLat || !latHemisphere || !rawLon || !lonHemisphere) return null;

  let latitude = parseDegreesMinutes(rawLat);
  let longitude = parseDegreesMinutes(rawLon);
  if (latitude === null || longitude === null) return null;

  if (latHemisphere === 'S') latitude = -latitude;
  if (lonHemisphere === 'W') longitude = -longitude;

  const altitude = Number.parseFloat(fields[9]);

  return {
    latitude,
    longitude,
    altitude: Number.isNaN(altitude) ? 0 : altitude,
  };
}

// =============================================================================
// Structured form
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

/**
 * Decode JSON text into a key-value object, or null when it is not one
 */
export function decodeStructuredPayload(text: string): Record<string, unknown> | null {
  try {
    const decoded: unknown = JSON.parse(text);
    return isRecord(decoded) ? decoded : null;
  } catch {
    return null;
  }
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function resolvePath(payload: Record<string, unknown>, path: readonly string[]): Record<string, unknown> | null {
  let current: Record<string, unknown> = payload;
  for (const segment of path) {
    const next = current[segment];
    if (!isRecord(next)) return null;
    current = next;
  }
  return current;
}

function firstPresent(container: Record<string, unknown>, keys: readonly string[]): Lookup<unknown> {
  for (const key of keys) {
    const value = container[key];
    if (value !== undefined && value !== null) {
      return { found: true, value };
    }
  }
  return { found: false };
}

function applyRule(
  payload: Record<string, unknown>,
  rule: ExtractionRule
): { latitude: number; longitude: number; elevation: number | null } | null {
  const container = resolvePath(payload, rule.path);
  if (!container) return null;

  const lat = firstPresent(container, rule.latitudeKeys);
  const lon = firstPresent(container, rule.longitudeKeys);
  if (!lat.found || !lon.found) return null;

  const latitude = toNumber(lat.value);
  const longitude = toNumber(lon.value);
  if (latitude === null || longitude === null) return null;

  const elev = firstPresent(container, rule.elevationKeys);
  const elevation = elev.found ? toNumber(elev.value) : null;

  return { latitude, longitude, elevation };
}

/**
 * Run the extraction rules in priority order and return the first full match
 */
export function extractStructuredPosition(
  payload: Record<string, unknown>,
  rules: readonly ExtractionRule[] = ORDERED_RULES
): { latitude: number; longitude: number; elevation: number | null; rule: string } | null {
  for (const rule of rules) {
    const match = applyRule(payload, rule);
    if (match) {
      return { ...match, rule: rule.name };
    }
  }
  return null;
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Decode a raw inbound message into a position fix, or null when no position is found
 */
export function parsePositionMessage(
  raw: RawPositionMessage,
  receivedAt: Date = new Date()
): PositionFix | null {
  let structured: Record<string, unknown> | null = null;

  if (typeof raw === 'string' || Buffer.isBuffer(raw)) {
    const text = (typeof raw === 'string' ? raw : raw.toString('utf8')).trim();

    if (isGgaSentence(text)) {
      const gga = parseGgaSentence(text);
      if (gga) {
        return {
          latitude: gga.latitude,
          longitude: gga.longitude,
          elevation: gga.altitude,
          receivedAt,
          source: 'sentence',
        };
      }
    }

    structured = decodeStructuredPayload(text);
  } else if (isRecord(raw)) {
    structured = raw;
  }

  if (!structured) {
    logger.debug('Payload is neither a GGA sentence nor a JSON object');
    return null;
  }

  const position = extractStructuredPosition(structured);
  if (!position) {
    logger.debug({ keys: Object.keys(structured) }, 'No coordinates found in payload');
    return null;
  }

  logger.trace({ rule: position.rule }, 'Structured position extracted');

  return {
    latitude: position.latitude,
    longitude: position.longitude,
    elevation: position.elevation,
    receivedAt,
    source: 'structured',
  };
}
