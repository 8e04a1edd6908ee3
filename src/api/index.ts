import { Router } from 'express';
import { createApprovalRouter } from './approvalRoutes.js';
import { createAuditRouter } from './auditRoutes.js';
import { createDeviceRouter } from './deviceRoutes.js';
import { createScanRouter } from './scanRoutes.js';
import type { ApprovalWorkflow } from '../services/ApprovalWorkflow.js';
import type { DeviceStateManager } from '../services/DeviceStateManager.js';
import type { ScanService } from '../services/ScanService.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';

/**
 * Main API router - composes all route handlers
 * Dependencies injected from the composition root
 */
export function createApiRouter(deps: {
  deviceManager: DeviceStateManager;
  approvalWorkflow: ApprovalWorkflow;
  scanService: ScanService;
  auditRepo: AuditRepository;
}): Router {
  const router = Router();

  router.use('/devices', createDeviceRouter(deps.deviceManager));
  router.use('/approvals', createApprovalRouter(deps.approvalWorkflow));
  router.use('/scans', createScanRouter(deps.scanService));
  router.use('/audit', createAuditRouter(deps.auditRepo));

  return router;
}
