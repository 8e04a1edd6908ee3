import { formatTransition } from '../../domain/tiers.js';
import { logger } from '../logger.js';
import type { ApprovalNotice, NotificationDispatcher } from './NotificationDispatcher.js';

export interface WebhookOptions {
  url: string;
  timeoutMs?: number;
}

/**
 * Posts each notice as JSON to a webhook endpoint
 */
export class WebhookNotificationDispatcher implements NotificationDispatcher {
  private readonly timeoutMs: number;

  constructor(private options: WebhookOptions) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async dispatch(notice: ApprovalNotice): Promise<void> {
    const body = {
      requestId: notice.requestId,
      deviceId: notice.deviceId,
      from: notice.transition.from,
      to: notice.transition.to,
      transition: formatTransition(notice.transition),
      fileCount: notice.fileCount,
      requestedAt: notice.requestedAt.toISOString(),
      approvalUrl: notice.approvalUrl,
    };

    const response = await fetch(this.options.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Webhook responded with ${response.status} ${response.statusText}`);
    }

    logger.debug('Webhook notification delivered', {
      requestId: notice.requestId,
      status: response.status,
    });
  }

  getChannelName(): string {
    return 'webhook';
  }
}
