import type { ApprovalRequest } from '../domain/entities/ApprovalRequest.js';
import { formatTransition } from '../domain/tiers.js';
import { logger } from '../infra/logger.js';
import {
  buildApprovalLink,
  type NotificationDispatcher,
} from '../infra/notifications/NotificationDispatcher.js';
import type { ApprovalRequestRepository } from '../infra/repositories/ApprovalRequestRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';

export interface DispatchSummary {
  sent: number;
  failed: number;
}

/**
 * NotificationService - delivers pending approval requests that have not
 * been announced yet. Requests stay pending whatever the channel does;
 * an undelivered one is offered again on the next call.
 */
export class NotificationService {
  private inFlight: Promise<DispatchSummary> | null = null;
  private followUp: Promise<DispatchSummary> | null = null;

  constructor(
    private requestRepo: ApprovalRequestRepository,
    private auditRepo: AuditRepository,
    private dispatcher: NotificationDispatcher,
    private approvalUrl: string | null,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Never rejects. A round lists its requests when it starts, so a caller
   * arriving while one runs gets the next round, which starts as soon as
   * the running one ends. Callers arriving meanwhile share that next round.
   */
  dispatchPending(): Promise<DispatchSummary> {
    const running = this.inFlight;
    if (!running) {
      return this.startRound();
    }

    if (!this.followUp) {
      this.followUp = running.then(() => {
        this.followUp = null;
        return this.startRound();
      });
    }
    return this.followUp;
  }

  private startRound(): Promise<DispatchSummary> {
    const round: Promise<DispatchSummary> = this.dispatchAll().finally(() => {
      if (this.inFlight === round) {
        this.inFlight = null;
      }
    });
    this.inFlight = round;
    return round;
  }

  private async dispatchAll(): Promise<DispatchSummary> {
    const summary: DispatchSummary = { sent: 0, failed: 0 };

    let requests: ApprovalRequest[];
    try {
      requests = this.requestRepo.listUnnotified();
    } catch (error) {
      logger.error('Could not load unnotified approval requests', { error });
      return summary;
    }

    for (const request of requests) {
      try {
        await this.dispatcher.dispatch({
          requestId: request.id,
          deviceId: request.deviceId,
          transition: request.transition,
          fileCount: request.fileCount,
          requestedAt: request.createdAt,
          approvalUrl: buildApprovalLink(this.approvalUrl, request.id),
        });
        this.requestRepo.markNotified(request.id, this.clock());
        this.auditRepo.log({
          eventType: 'notification_sent',
          entityType: 'approval_request',
          entityId: request.id,
          metadata: { channel: this.dispatcher.getChannelName() },
        });
        summary.sent += 1;
      } catch (error) {
        summary.failed += 1;
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Approval notification failed', {
          requestId: request.id,
          deviceId: request.deviceId,
          transition: formatTransition(request.transition),
          channel: this.dispatcher.getChannelName(),
          error: message,
        });
        this.auditRepo.log({
          eventType: 'notification_failed',
          entityType: 'approval_request',
          entityId: request.id,
          metadata: { channel: this.dispatcher.getChannelName(), error: message },
        });
      }
    }

    if (summary.sent > 0 || summary.failed > 0) {
      logger.info('Approval notifications dispatched', { ...summary });
    }
    return summary;
  }
}
