import http from 'http';
import type { Server } from 'http';
import type { Express } from 'express';
import { config } from './core/config';
import { logger } from './core/logger';
import type { OfficeStore } from './core/store/types';
import { getErrorMessage } from './utils/errorUtils';

let isShuttingDown = false;
let httpServer: Server | null = null;
let expressApp: Express | null = null;
let officeStore: OfficeStore | null = null;

process.on('uncaughtException', (error) => {
  logger.error('[Process] Uncaught Exception', { error });
  if (error.message?.includes('EADDRINUSE')) {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('[Process] Unhandled Rejection', { error: reason instanceof Error ? reason : String(reason) });
});

process.on('SIGTERM', () => {
  logger.info('[Process] Received SIGTERM signal');
  void gracefulShutdown('SIGTERM');
});

process.on('SIGINT', () => {
  logger.info('[Process] Received SIGINT signal');
  void gracefulShutdown('SIGINT');
});

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`[Shutdown] Starting graceful shutdown (${signal})...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('[Shutdown] Timeout exceeded, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        setTimeout(resolve, 5000);
      });
    }

    if (officeStore) {
      await officeStore.close();
    }

    clearTimeout(shutdownTimeout);
    logger.info('[Shutdown] Complete');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('[Shutdown] Error', { error: getErrorMessage(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

// Answers health checks while the store and the Express app are still loading.
httpServer = http.createServer((req, res) => {
  if (req.url === '/healthz') {
    res.writeHead(200, { 'Content-Type': 'text/plain' });
    res.end('OK');
    return;
  }

  if (expressApp) {
    expressApp(req, res);
    return;
  }

  res.writeHead(503, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ ready: false, reason: 'starting_up' }));
});

httpServer.listen(config.port, '0.0.0.0', () => {
  logger.info(`[Startup] HTTP server listening on port ${config.port} - health check ready`);

  initializeApp().catch((err: unknown) => {
    logger.error('[Startup] Initialization failed', { error: err instanceof Error ? err : String(err) });
    process.exit(1);
  });
});

httpServer.on('error', (err: unknown) => {
  logger.error('[Startup] Server failed to start', { error: err instanceof Error ? err : String(err) });
  process.exit(1);
});

async function initializeApp() {
  const { initializeStore } = await import('./loaders/startup');
  const { createOfficeServices } = await import('./core/officeServices');
  const { createApp } = await import('./app');

  logger.info(`[Startup] Environment: ${config.isProduction ? 'production' : 'development'}`);
  logger.info(`[Startup] Store driver: ${config.storeDriver}, office time zone: ${config.timeZone}`);

  officeStore = await initializeStore(config);
  const services = createOfficeServices(officeStore, {
    timeZone: config.timeZone,
    maxActiveBookingsPerEmployee: config.maxActiveBookingsPerEmployee,
  });
  expressApp = createApp(services, config, { isShuttingDown: () => isShuttingDown });
  logger.info('[Startup] API routes registered');
}
