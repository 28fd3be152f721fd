import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { HoleDirectory } from '../services/HoleDirectory';
import { sortHolesByDistance } from '../services/NearestHoleMatcher';
import type { PositionCorrelationService } from '../services/PositionCorrelationService';
import type { TelemetryCoalescingQueue } from '../services/TelemetryQueue';
import { logger } from '../utils/logger';

export interface ServerDependencies {
  correlation: PositionCorrelationService;
  holeDirectory?: HoleDirectory | null;
  queue?: TelemetryCoalescingQueue | null;
}

const drillingReadingSchema = z.object({
  velocity: z.number().finite(),
  depth: z.number().finite(),
  timestamp: z.string().datetime({ offset: true }).optional(),
});

const DEFAULT_NEAREST_LIMIT = 5;

export function createServer({ correlation, holeDirectory = null, queue = null }: ServerDependencies) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Correlation and delivery counters
  app.get('/api/stats', (_req: Request, res: Response) => {
    res.json({
      success: true,
      running: correlation.isRunning(),
      correlation: correlation.getStats(),
      delivery: queue ? queue.getStats() : null,
      queue: queue
        ? { size: queue.size(), capacity: queue.getCapacity(), holeId: queue.getHoleId(), running: queue.isRunning() }
        : null,
    });
  });

  // Sensor pipeline input: feeds both the correlation sample and the delivery queue
  app.post('/api/drilling', (req: Request, res: Response) => {
    const parsed = drillingReadingSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: 'Expected { velocity: number, depth: number, timestamp?: ISO-8601 string }',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const { velocity, depth, timestamp } = parsed.data;
    const capturedAt = timestamp ? new Date(timestamp) : new Date();

    correlation.setDrillingData(velocity, depth, capturedAt);
    queue?.add({ velocityMetersPerSecond: velocity, depthMeters: depth, capturedAt });

    res.status(202).json({
      success: true,
      queued: queue ? queue.size() : 0,
    });
  });

  // Holes ranked by distance from the last fix
  app.get('/api/holes/nearest', async (req: Request, res: Response) => {
    const projectId = correlation.getProjectId();
    if (!holeDirectory || projectId === null) {
      res.status(503).json({ success: false, error: 'No project linkage configured' });
      return;
    }

    const fix = correlation.getStats().lastFix;
    if (!fix) {
      res.status(409).json({ success: false, error: 'No position fix received yet' });
      return;
    }

    const requested = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : Number.NaN;
    const limit = Number.isNaN(requested) || requested <= 0 ? DEFAULT_NEAREST_LIMIT : requested;
    const maxDistance = correlation.getMaxDistanceMeters();

    try {
      const holes = await holeDirectory.getHoles(projectId);
      const ranked = sortHolesByDistance(holes, fix, { limit });

      res.json({
        success: true,
        fix,
        maxDistance,
        count: ranked.length,
        holes: ranked.map(({ hole, distance }) => ({
          ...hole,
          distance,
          withinGate: distance <= maxDistance,
        })),
      });
    } catch (error) {
      logger.error({ error }, 'Error ranking holes');
      res.status(500).json({ success: false, error: 'Failed to rank holes' });
    }
  });

  // Hole cache statistics
  app.get('/api/holes/cache/stats', (_req: Request, res: Response) => {
    if (!holeDirectory) {
      res.status(503).json({ success: false, error: 'No project linkage configured' });
      return;
    }

    res.json({
      success: true,
      ttlMs: holeDirectory.getTtlMs(),
      ...holeDirectory.getCacheStats(),
    });
  });

  // Force the next lookup to refetch holes
  app.post('/api/holes/cache/clear', (_req: Request, res: Response) => {
    if (!holeDirectory) {
      res.status(503).json({ success: false, error: 'No project linkage configured' });
      return;
    }

    holeDirectory.invalidate();
    res.json({
      success: true,
      message: 'Hole cache cleared',
    });
  });

  return app;
}
