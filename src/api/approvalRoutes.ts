import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import type { ApprovalWorkflow } from '../services/ApprovalWorkflow.js';
import { mapDeviceToResponse, mapHistoryToResponse, mapRequestToResponse } from './approvalMapper.js';

const decisionSchema = z.object({
  verdict: z.enum(['approve', 'reject']),
  actor: z.string().trim().min(1),
  comment: z.string().max(2000).optional(),
});

const bulkDecisionSchema = decisionSchema.extend({
  requestIds: z.array(z.string().min(1)).min(1).max(500),
});

const DEFAULT_HISTORY_PAGE = 100;

const historyQuerySchema = z.object({
  deviceId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  beforeId: z.coerce.number().int().positive().optional(),
});

/**
 * Approval route handler
 * HTTP layer delegates to the approval workflow
 */
export function createApprovalRouter(approvalWorkflow: ApprovalWorkflow): Router {
  const router = Router();

  /**
   * GET /api/approvals/pending - Requests awaiting a decision, oldest first
   */
  router.get('/pending', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const requests = approvalWorkflow.listPending();
      res.json({ requests: requests.map(mapRequestToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/approvals/history?deviceId=...&limit=...&beforeId=...
   * `nextBeforeId` is null on the last page.
   */
  router.get('/history', (req: Request, res: Response, next: NextFunction) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return next(new ValidationError('Invalid history query', parsed.error.flatten()));
    }

    try {
      const limit = parsed.data.limit ?? DEFAULT_HISTORY_PAGE;
      const entries = approvalWorkflow.listHistory({ ...parsed.data, limit });
      const last = entries[entries.length - 1];
      res.json({
        history: entries.map(mapHistoryToResponse),
        nextBeforeId: last && entries.length === limit ? last.id : null,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/approvals/decisions - Same verdict for several requests
   */
  router.post('/decisions', (req: Request, res: Response, next: NextFunction) => {
    const parsed = bulkDecisionSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid bulk decision payload', parsed.error.flatten()));
    }

    try {
      const { requestIds, verdict, actor, comment } = parsed.data;
      const results = approvalWorkflow.decideMany(requestIds, verdict, actor, comment ?? null);

      res.json({
        results: results.map((result) =>
          result.ok
            ? {
                requestId: result.requestId,
                ok: true,
                request: mapRequestToResponse(result.request),
                device: mapDeviceToResponse(result.device),
              }
            : { requestId: result.requestId, ok: false, error: result.error }
        ),
        decided: results.filter((result) => result.ok).length,
        failed: results.filter((result) => !result.ok).length,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/approvals/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = approvalWorkflow.getRequest(req.params.id);
      res.json({ request: mapRequestToResponse(request) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/approvals/:id/decision - Approve or reject one request
   */
  router.post('/:id/decision', (req: Request, res: Response, next: NextFunction) => {
    const parsed = decisionSchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid decision payload', parsed.error.flatten()));
    }

    try {
      const { verdict, actor, comment } = parsed.data;
      const outcome = approvalWorkflow.decide(req.params.id, verdict, actor, comment ?? null);
      res.json({
        request: mapRequestToResponse(outcome.request),
        device: mapDeviceToResponse(outcome.device),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
