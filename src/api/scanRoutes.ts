import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ScanReport, ScanService } from '../services/ScanService.js';

export function mapReportToResponse(report: ScanReport) {
  return {
    scanId: report.scanId,
    startedAt: report.startedAt.toISOString(),
    finishedAt: report.finishedAt.toISOString(),
    cancelled: report.cancelled,
    committed: report.committed,
    failed: report.failed,
    skipped: report.skipped,
    notifications: report.notifications,
    devices: report.devices,
  };
}

/**
 * Scan route handler
 */
export function createScanRouter(scanService: ScanService): Router {
  const router = Router();

  /**
   * GET /api/scans/status
   */
  router.get('/status', (_req: Request, res: Response) => {
    res.json({ running: scanService.isRunning() });
  });

  /**
   * POST /api/scans - Run a pass now; 409 while another pass is running
   */
  router.post('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await scanService.runPass();
      res.json(mapReportToResponse(report));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
