import type { GoalCrossingEvent } from '../../domain/entities/GoalCrossingEvent.js';

/**
 * Delivery channel for goal-crossing notifications
 */
export interface NotificationScheduler {
  scheduleNotification(event: GoalCrossingEvent): Promise<void>;
}
