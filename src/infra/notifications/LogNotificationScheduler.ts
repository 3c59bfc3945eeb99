import {
  describeGoalCrossing,
  type GoalCrossingEvent,
} from '../../domain/entities/GoalCrossingEvent.js';
import { logger } from '../logger.js';
import type { NotificationScheduler } from './NotificationScheduler.js';

/**
 * Used when no webhook is configured
 */
export class LogNotificationScheduler implements NotificationScheduler {
  async scheduleNotification(event: GoalCrossingEvent): Promise<void> {
    const { title, body } = describeGoalCrossing(event);
    logger.info('Goal crossing notification', { title, body, direction: event.direction });
  }
}
