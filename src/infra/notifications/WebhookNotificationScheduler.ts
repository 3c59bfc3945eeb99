import {
  describeGoalCrossing,
  type GoalCrossingEvent,
} from '../../domain/entities/GoalCrossingEvent.js';
import { NotificationDeliveryError, describeError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { NotificationScheduler } from './NotificationScheduler.js';

/**
 * POSTs each crossing as JSON to a webhook
 */
export class WebhookNotificationScheduler implements NotificationScheduler {
  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs: number
  ) {}

  async scheduleNotification(event: GoalCrossingEvent): Promise<void> {
    const { title, body } = describeGoalCrossing(event);
    const payload = {
      title,
      body,
      direction: event.direction,
      projectedTotal: event.projectedTotal,
      goal: event.goal,
      detectedAt: event.detectedAt.toISOString(),
    };

    let res: Response;
    try {
      res = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new NotificationDeliveryError('Notification webhook unreachable', {
        reason: describeError(error),
      });
    }

    if (!res.ok) {
      throw new NotificationDeliveryError(`Notification webhook returned ${res.status}`, {
        status: res.status,
      });
    }

    logger.info('Goal crossing notification delivered', { direction: event.direction });
  }
}
