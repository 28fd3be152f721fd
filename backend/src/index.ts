import { config } from './config';
import { HolesApiClient } from './api/HolesApiClient';
import { createServer } from './api/server';
import { HoleDirectory } from './services/HoleDirectory';
import { type HoleMatchEvent, PositionCorrelationService } from './services/PositionCorrelationService';
import { TelemetryCoalescingQueue } from './services/TelemetryQueue';
import { MqttTransport } from './transport/MqttTransport';
import { logger } from './utils/logger';

logger.info('🚀 Starting drill telemetry relay...');

const apiClient = new HolesApiClient({
  baseUrl: config.api.baseUrl,
  timeoutMs: config.api.timeoutMs,
});

const projectId = config.correlation.projectId;

const holeDirectory = projectId
  ? new HoleDirectory(apiClient, { ttlMs: config.correlation.holeCacheTtlMs })
  : null;

const transport = new MqttTransport({
  host: config.mqtt.host,
  port: config.mqtt.port,
  username: config.mqtt.username,
  password: config.mqtt.password,
  tls: config.mqtt.tls,
  caCertPath: config.mqtt.caCertPath,
  clientId: config.mqtt.clientId,
});

const correlation = new PositionCorrelationService({
  transport,
  topic: config.mqtt.topic,
  linkage: projectId && holeDirectory
    ? { projectId, holeDirectory, sink: apiClient }
    : undefined,
  maxDistanceMeters: config.correlation.maxDistanceMeters,
  sensorId: config.correlation.sensorId,
  use3d: config.correlation.use3d,
  maxPendingMessages: config.correlation.maxPendingMessages,
});

const queue = projectId
  ? new TelemetryCoalescingQueue({
    sink: apiClient,
    projectId,
    holeId: config.delivery.holeId,
    sensorId: config.delivery.sensorId,
    capacity: config.delivery.queueCapacity,
    flushIntervalMs: config.delivery.flushIntervalMs,
  })
  : null;

if (!projectId) {
  logger.warn('⚠️  PROJECT_ID not set: running in position-monitoring mode, nothing will be submitted');
}

if (queue && config.delivery.followNearestHole) {
  logger.info('🎯 Delivery queue follows the nearest matched hole');
  correlation.on('match', ({ hole }: HoleMatchEvent) => {
    if (!hole) return;
    queue.setHoleId(hole.externalId);
    if (!queue.isRunning()) {
      queue.start();
    }
  });
}

if (await apiClient.testConnection()) {
  logger.info({ baseUrl: apiClient.getBaseUrl() }, '✅ Holes API reachable');
} else {
  logger.warn({ baseUrl: apiClient.getBaseUrl() }, '⚠️  Holes API not reachable, will keep retrying on demand');
}

const app = createServer({ correlation, holeDirectory, queue });

const server = app.listen(config.server.port, () => {
  logger.info({ port: config.server.port }, `✅ Status server running on http://localhost:${config.server.port}`);
  logger.info('   GET  /health                 - Health check');
  logger.info('   GET  /api/stats              - Correlation and delivery counters');
  logger.info('   POST /api/drilling           - Push a drilling reading { velocity, depth }');
  logger.info('   GET  /api/holes/nearest      - Holes ranked by distance from the last fix');
  logger.info('   GET  /api/holes/cache/stats  - Hole cache statistics');
  logger.info('   POST /api/holes/cache/clear  - Force a hole refetch');
});

if (!(await correlation.start())) {
  logger.error('❌ Could not connect to MQTT broker, position correlation disabled');
}

if (queue && config.delivery.holeId) {
  queue.start();
}

// Graceful shutdown
const shutdown = async () => {
  logger.info('🛑 Shutting down gracefully...');
  if (queue) {
    await queue.stop();
  }
  await correlation.stop();
  server.close(() => {
    logger.info('✅ Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
