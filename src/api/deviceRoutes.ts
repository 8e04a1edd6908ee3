import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { DeviceStateManager, DeviceStatus } from '../services/DeviceStateManager.js';

function mapStatusToResponse(status: DeviceStatus) {
  return {
    ...status,
    lastScanAt: status.lastScanAt ? status.lastScanAt.toISOString() : null,
    tierStartedAt: status.tierStartedAt.toISOString(),
  };
}

/**
 * Device status route handler (read-only)
 */
export function createDeviceRouter(deviceManager: DeviceStateManager): Router {
  const router = Router();

  /**
   * GET /api/devices - Progress of every device plus the tier distribution
   */
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = deviceManager.getStatus();
      res.json({
        devices: report.devices.map(mapStatusToResponse),
        tierSummary: report.tierSummary,
        pausedDevices: report.pausedDevices,
        lastScanAt: report.lastScanAt ? report.lastScanAt.toISOString() : null,
        generatedAt: report.generatedAt.toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/devices/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ device: mapStatusToResponse(deviceManager.getDeviceStatus(req.params.id)) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
