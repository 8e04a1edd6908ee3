import { randomUUID } from 'node:crypto';
import {
  createApprovalRequest,
  verdictToStatus,
  type ApprovalRequest,
  type DecisionHistoryEntry,
} from '../domain/entities/ApprovalRequest.js';
import type { DecisionVerdict, DeviceRecord } from '../domain/entities/Device.js';
import {
  AlreadyDecidedError,
  ConfigurationError,
  ConflictError,
  isAppError,
  UnknownRequestError,
  ValidationError,
} from '../domain/errors.js';
import { formatTransition, type TierTransition } from '../domain/tiers.js';
import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import { logger } from '../infra/logger.js';
import type { ApprovalRequestRepository } from '../infra/repositories/ApprovalRequestRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type {
  DecisionHistoryRepository,
  HistoryQuery,
} from '../infra/repositories/DecisionHistoryRepository.js';
import type { DeviceRepository } from '../infra/repositories/DeviceRepository.js';
import type { DeviceStateManager } from './DeviceStateManager.js';

export interface DecisionOutcome {
  request: ApprovalRequest;
  device: DeviceRecord;
}

export type BulkDecisionResult =
  | { requestId: string; ok: true; request: ApprovalRequest; device: DeviceRecord }
  | { requestId: string; ok: false; error: { code: string; message: string } };

export interface ApprovalWorkflowOptions {
  clock?: () => Date;
  idFactory?: () => string;
}

/**
 * ApprovalWorkflow - creates approval requests when a device crosses its
 * threshold and records the approver's verdict.
 * A decision changes the device, the request and the decision history in
 * one transaction; the first decision on a request wins.
 */
export class ApprovalWorkflow {
  private readonly clock: () => Date;
  private readonly idFactory: () => string;

  constructor(
    private db: DatabaseAdapter,
    private requestRepo: ApprovalRequestRepository,
    private historyRepo: DecisionHistoryRepository,
    private deviceRepo: DeviceRepository,
    private auditRepo: AuditRepository,
    private deviceManager: DeviceStateManager,
    options: ApprovalWorkflowOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Records a new pending request. Runs inside the caller's transaction
   * when there is one, so a scan commit and its request land together.
   */
  createRequest(deviceId: string, transition: TierTransition, fileCount: number): ApprovalRequest {
    return this.db.transaction(() => {
      if (!this.deviceRepo.getById(deviceId)) {
        throw new ConfigurationError(`Device ${deviceId} is not registered`, { deviceId });
      }

      const pending = this.requestRepo.getPendingForDevice(deviceId);
      if (pending) {
        throw new ConflictError(`Device ${deviceId} already has a pending approval request`, {
          deviceId,
          requestId: pending.id,
        });
      }

      const request = createApprovalRequest({
        id: this.idFactory(),
        deviceId,
        transition,
        fileCount,
        createdAt: this.clock(),
      });

      this.requestRepo.create(request);
      this.auditRepo.log({
        eventType: 'approval_requested',
        entityType: 'approval_request',
        entityId: request.id,
        metadata: { deviceId, transition: formatTransition(transition), fileCount },
      });

      logger.info('Approval requested', {
        requestId: request.id,
        deviceId,
        transition: formatTransition(transition),
        fileCount,
      });
      return request;
    });
  }

  decide(
    requestId: string,
    verdict: DecisionVerdict,
    actor: string,
    comment: string | null = null
  ): DecisionOutcome {
    if (!actor.trim()) {
      throw new ValidationError('A decision needs an actor');
    }

    const request = this.requestRepo.getById(requestId);
    if (!request) {
      throw new UnknownRequestError(requestId);
    }
    if (request.status !== 'pending') {
      throw new AlreadyDecidedError(requestId, request.status);
    }

    const outcome = this.deviceManager.commitWithRetry(request.deviceId, null, (record) =>
      this.db.transaction(() => {
        // A decision committed by another process since the read above wins
        const current = this.requestRepo.getById(requestId);
        if (!current) {
          throw new UnknownRequestError(requestId);
        }
        if (current.status !== 'pending') {
          throw new AlreadyDecidedError(requestId, current.status);
        }

        let decidedAt = this.clock();
        const commit = this.deviceManager.commitDecision(current, verdict, record.version, (result) => {
          decidedAt = result.record.updatedAt;
          const marked = this.requestRepo.markDecided({
            requestId,
            status: verdictToStatus(verdict),
            decidedBy: actor,
            decidedAt,
            comment,
          });
          if (!marked) {
            throw new AlreadyDecidedError(requestId, 'decided');
          }

          this.historyRepo.append({
            requestId,
            deviceId: current.deviceId,
            transition: current.transition,
            fileCount: current.fileCount,
            verdict,
            decidedBy: actor,
            decidedAt,
            requestedAt: current.createdAt,
            comment,
          });

          this.auditRepo.log({
            eventType: verdict === 'approve' ? 'approval_approved' : 'approval_rejected',
            entityType: 'approval_request',
            entityId: requestId,
            metadata: {
              deviceId: current.deviceId,
              transition: formatTransition(current.transition),
              actor,
              tier: result.record.currentTier,
              countSinceThreshold: result.record.countSinceThreshold,
            },
          });
        });

        return {
          request: {
            ...current,
            status: verdictToStatus(verdict),
            decidedBy: actor,
            decidedAt,
            comment,
          },
          device: commit.record,
        };
      })
    );

    logger.info('Approval request decided', {
      requestId,
      deviceId: request.deviceId,
      verdict,
      actor,
      tier: outcome.device.currentTier,
    });
    return outcome;
  }

  /**
   * Decides several requests with the same verdict. Each id succeeds or
   * fails on its own.
   */
  decideMany(
    requestIds: readonly string[],
    verdict: DecisionVerdict,
    actor: string,
    comment: string | null = null
  ): BulkDecisionResult[] {
    return requestIds.map((requestId): BulkDecisionResult => {
      try {
        const outcome = this.decide(requestId, verdict, actor, comment);
        return { requestId, ok: true, request: outcome.request, device: outcome.device };
      } catch (error) {
        if (isAppError(error)) {
          logger.warn('Bulk decision failed for request', { requestId, code: error.code });
          return { requestId, ok: false, error: { code: error.code, message: error.message } };
        }
        logger.error('Bulk decision failed unexpectedly', { requestId, error });
        return {
          requestId,
          ok: false,
          error: {
            code: 'INTERNAL_ERROR',
            message: error instanceof Error ? error.message : String(error),
          },
        };
      }
    });
  }

  listPending(): ApprovalRequest[] {
    return this.requestRepo.listPending();
  }

  listHistory(params: HistoryQuery = {}): DecisionHistoryEntry[] {
    return this.historyRepo.list(params);
  }

  getRequest(requestId: string): ApprovalRequest {
    const request = this.requestRepo.getById(requestId);
    if (!request) {
      throw new UnknownRequestError(requestId);
    }
    return request;
  }
}
