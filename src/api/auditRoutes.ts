import { Router } from 'express';
import { z } from 'zod';
import type { AuditEntry } from '../domain/entities/AuditEntry.js';
import { ValidationError } from '../domain/errors.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { Request, Response, NextFunction } from 'express';

const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  entityType: z.enum(['device', 'approval_request', 'scan']).optional(),
  entityId: z.string().min(1).optional(),
});

function mapAuditEntryToResponse(e: AuditEntry) {
  return {
    id: e.id,
    eventType: e.eventType,
    entityType: e.entityType,
    entityId: e.entityId,
    metadata: e.metadata,
    timestamp: e.timestamp.toISOString(),
  };
}

/**
 * Audit route handler
 */
export function createAuditRouter(auditRepo: AuditRepository): Router {
  const router = Router();

  /**
   * GET /api/audit?limit=...&entityType=...&entityId=... - Recent audit events
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    const parsed = auditQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return next(new ValidationError('Invalid audit query', parsed.error.flatten()));
    }

    try {
      const events = auditRepo.getRecent(parsed.data);
      res.json({ events: events.map(mapAuditEntryToResponse) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
