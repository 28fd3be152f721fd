import dotenv from 'dotenv';
import { createLogger } from '../utils/logger';

dotenv.config();

const logger = createLogger({ component: 'Config' });

type Env = Record<string, string | undefined>;

export interface AppConfig {
  mqtt: {
    host: string;
    port: number;
    username?: string;
    password?: string;
    tls: boolean;
    caCertPath?: string;
    topic: string;
    clientId: string;
  };
  api: {
    baseUrl: string;
    timeoutMs: number;
  };
  correlation: {
    projectId?: string;
    sensorId: string;
    maxDistanceMeters: number;
    holeCacheTtlMs: number;
    use3d: boolean;
    maxPendingMessages: number;
  };
  delivery: {
    holeId?: string;
    sensorId: string;
    flushIntervalMs: number;
    queueCapacity: number;
    followNearestHole: boolean;
  };
  server: {
    port: number;
  };
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveNumber(env: Env, name: string, fallback: number): number {
  const raw = optional(env[name]);
  if (raw === undefined) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    logger.warn({ name, value: raw, fallback }, 'Ignoring invalid numeric setting');
    return fallback;
  }
  return parsed;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env[name]);
  if (raw === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

/**
 * Build the application config from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    mqtt: {
      host: optional(env.MQTT_HOST) ?? 'localhost',
      port: positiveNumber(env, 'MQTT_PORT', 1883),
      username: optional(env.MQTT_USERNAME),
      password: optional(env.MQTT_PASSWORD),
      tls: flag(env, 'MQTT_TLS', false),
      caCertPath: optional(env.MQTT_CA_CERT),
      topic: optional(env.MQTT_TOPIC) ?? 'device/+/upload',
      clientId: optional(env.MQTT_CLIENT_ID) ?? `drill_relay_${Math.random().toString(16).slice(3)}`,
    },
    api: {
      baseUrl: optional(env.API_BASE_URL) ?? 'http://localhost:3000/api',
      timeoutMs: positiveNumber(env, 'API_TIMEOUT_MS', 10000),
    },
    correlation: {
      projectId: optional(env.PROJECT_ID),
      sensorId: optional(env.SENSOR_ID) ?? 'GNSS_RIG',
      maxDistanceMeters: positiveNumber(env, 'MAX_MATCH_DISTANCE_M', 10),
      holeCacheTtlMs: positiveNumber(env, 'HOLE_CACHE_TTL_S', 300) * 1000,
      use3d: flag(env, 'MATCH_USE_3D', false),
      maxPendingMessages: Math.floor(positiveNumber(env, 'MAX_PENDING_MESSAGES', 100)),
    },
    delivery: {
      holeId: optional(env.DELIVERY_HOLE_ID),
      sensorId: optional(env.DELIVERY_SENSOR_ID) ?? 'LASER_SENSOR',
      flushIntervalMs: positiveNumber(env, 'DELIVERY_FLUSH_INTERVAL_S', 2) * 1000,
      queueCapacity: Math.floor(positiveNumber(env, 'DELIVERY_QUEUE_CAPACITY', 1000)),
      followNearestHole: flag(env, 'DELIVERY_FOLLOW_NEAREST', false),
    },
    server: {
      port: positiveNumber(env, 'PORT', 8080),
    },
  };
}

export const config = loadConfig();
