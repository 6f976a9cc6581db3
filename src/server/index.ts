import express from 'express';
import { createServer } from 'http';
import client from 'prom-client';
import { Server as SocketIOServer } from 'socket.io';
import { connectRedis, disconnectRedis, getRedisClient, RedisKeyValueStore } from './cache/redis';
import { config } from './config';
import {
  FanoutMatchEventPublisher,
  RedisMatchEventPublisher,
  SocketIoMatchEventPublisher,
} from './game/MatchEventPublisher';
import { MatchStore } from './game/MatchStore';
import { TimeoutSentinel } from './game/TimeoutSentinel';
import { getMetricsService } from './services/MetricsService';
import { RatingService } from './services/RatingService';
import { logger } from './utils/logger';

const app = express();
const server = createServer(app);

const io = new SocketIOServer(server, {
  cors: { origin: config.server.corsOrigin },
});

// Spectators and players subscribe to a match room; everything else about
// the socket protocol belongs to the lobby/transport layer.
io.on('connection', (socket) => {
  socket.on('watch_match', async (matchId: unknown) => {
    if (typeof matchId !== 'string' || matchId.length === 0) {
      return;
    }
    try {
      await socket.join(SocketIoMatchEventPublisher.roomFor(matchId));
    } catch (error) {
      logger.warn('Failed to join match room', { matchId, error });
    }
  });
});

if (config.metrics.enabled) {
  // Register default Prometheus metrics for the Node.js process.
  client.collectDefaultMetrics();
}
const metricsService = getMetricsService();

let sentinel: TimeoutSentinel | null = null;

/**
 * Liveness/readiness probe. Reports 503 while Redis is not ready.
 */
app.get(['/health', '/healthz'], (_req, res) => {
  const redisReady = getRedisClient()?.isReady ?? false;
  res.status(redisReady ? 200 : 503).json({
    status: redisReady ? 'ok' : 'starting',
    version: config.app.version,
    timeoutSentinel: sentinel?.isRunning ?? false,
    timestamp: new Date().toISOString(),
  });
});

app.get('/metrics', async (_req, res) => {
  if (!config.metrics.enabled) {
    res.status(404).send('metrics_disabled');
    return;
  }
  try {
    res.set('Content-Type', metricsService.getContentType());
    res.send(await metricsService.getMetrics());
  } catch (err) {
    logger.error('Failed to generate /metrics payload', {
      error: err instanceof Error ? err.message : String(err),
    });
    res.status(500).send('metrics_unavailable');
  }
});

/** Wire the match layer onto a connected Redis client. */
export async function startServer(): Promise<MatchStore> {
  const redis = await connectRedis();
  const store = new RedisKeyValueStore(redis);

  const matches = new MatchStore({
    store,
    publisher: new FanoutMatchEventPublisher([
      new RedisMatchEventPublisher(store),
      new SocketIoMatchEventPublisher(io),
    ]),
    ratings: new RatingService(store),
    metrics: metricsService,
  });

  if (config.matches.timeoutSentinelEnabled) {
    sentinel = new TimeoutSentinel(store, matches, metricsService);
    await sentinel.start();
  } else {
    logger.warn('Timeout sentinel disabled; expired clocks are only detected on the next move');
  }

  await new Promise<void>((resolve) => {
    server.listen(config.server.port, config.server.host, () => resolve());
  });
  logger.info(`Server running on port ${config.server.port}`, {
    environment: config.nodeEnv,
    matchTtlSeconds: config.matches.ttlSeconds,
  });

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  return matches;
}

function gracefulShutdown(signal: string): void {
  logger.info(`Received ${signal}. Starting graceful shutdown...`);

  // Force close after 30 seconds
  const forceExit = setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 30000);
  forceExit.unref();

  const shutdown = async () => {
    if (sentinel) {
      await sentinel.stop();
    }
    // Closes the underlying HTTP server as well.
    await new Promise<void>((resolve) => io.close(() => resolve()));
    logger.info('HTTP server closed');
    await disconnectRedis();
  };

  shutdown().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Error during shutdown', { error });
      process.exit(1);
    }
  );
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}

export { app, server, io };
