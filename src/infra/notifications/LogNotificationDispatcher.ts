import { formatTransition } from '../../domain/tiers.js';
import { logger } from '../logger.js';
import type { ApprovalNotice, NotificationDispatcher } from './NotificationDispatcher.js';

/**
 * Default channel: writes the notice to the application log
 */
export class LogNotificationDispatcher implements NotificationDispatcher {
  async dispatch(notice: ApprovalNotice): Promise<void> {
    logger.info('Tier advancement awaiting approval', {
      requestId: notice.requestId,
      deviceId: notice.deviceId,
      transition: formatTransition(notice.transition),
      fileCount: notice.fileCount,
      approvalUrl: notice.approvalUrl,
    });
  }

  getChannelName(): string {
    return 'log';
  }
}
