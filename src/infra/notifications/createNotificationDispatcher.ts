import type { Env } from '../env.js';
import { logger } from '../logger.js';
import { LogNotificationDispatcher } from './LogNotificationDispatcher.js';
import type { NotificationDispatcher } from './NotificationDispatcher.js';
import { WebhookNotificationDispatcher } from './WebhookNotificationDispatcher.js';

/**
 * Picks the webhook channel when NOTIFICATION_WEBHOOK_URL is set, the log otherwise
 */
export function createNotificationDispatcher(
  env: Pick<Env, 'NOTIFICATION_WEBHOOK_URL'>
): NotificationDispatcher {
  if (env.NOTIFICATION_WEBHOOK_URL) {
    logger.info('Approval notifications go to webhook', {
      host: new URL(env.NOTIFICATION_WEBHOOK_URL).host,
    });
    return new WebhookNotificationDispatcher({ url: env.NOTIFICATION_WEBHOOK_URL });
  }

  logger.info('Approval notifications go to the log (NOTIFICATION_WEBHOOK_URL not set)');
  return new LogNotificationDispatcher();
}
