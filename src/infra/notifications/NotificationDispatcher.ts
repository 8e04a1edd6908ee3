/**
 * Common interface for approval notification channels
 */

import type { TierTransition } from '../../domain/tiers.js';

/** What an approver needs to act on a pending request */
export interface ApprovalNotice {
  requestId: string;
  deviceId: string;
  transition: TierTransition;
  fileCount: number;
  requestedAt: Date;
  /** Link to the decision page, null when no approval URL is configured */
  approvalUrl: string | null;
}

/**
 * Implementations: LogNotificationDispatcher, WebhookNotificationDispatcher.
 * A rejected promise means the notice was not delivered; the request
 * stays pending and is offered again on the next dispatch.
 */
export interface NotificationDispatcher {
  dispatch(notice: ApprovalNotice): Promise<void>;

  /** Name of the channel (for logging) */
  getChannelName(): string;
}

/**
 * Builds `<approvalUrl>?id=<requestId>`, keeping any query the base already has
 */
export function buildApprovalLink(approvalUrl: string | null, requestId: string): string | null {
  if (!approvalUrl) {
    return null;
  }
  const url = new URL(approvalUrl);
  url.searchParams.set('id', requestId);
  return url.toString();
}
