import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { loadAppContext } from './bootstrap.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { startScheduler, type ScanScheduler } from './scheduler/ScanScheduler.js';
import type { Request, Response, NextFunction } from 'express';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const context = await loadAppContext(env);

// Requests left unannounced by a previous run
await context.notificationService.dispatchPending();

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.info('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  next();
});

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  try {
    context.db.queryOne('SELECT 1 as ok');
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  } catch {
    res.status(503).json({ status: 'unavailable', timestamp: new Date().toISOString() });
  }
});

// Mount API routes
app.use(
  '/api',
  createApiRouter({
    deviceManager: context.deviceManager,
    approvalWorkflow: context.approvalWorkflow,
    scanService: context.scanService,
    auditRepo: context.auditRepo,
  })
);

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(createErrorHandler(env));

let scheduler: ScanScheduler | null = null;

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  });

  if (env.SCAN_INTERVAL_MINUTES > 0) {
    scheduler = startScheduler(env, context.scanService);
  }
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down');
  scheduler?.stop();
  server.close(() => {
    context.db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
});

export { app };
