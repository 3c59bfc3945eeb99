import type { GoalCrossingEvent } from './entities/GoalCrossingEvent.js';

/**
 * Compare two projections against the goal. No previous projection or no goal
 * (goal <= 0) means nothing to compare.
 */
export function detectCrossing(
  previous: number | null,
  current: number,
  goal: number,
  detectedAt: Date = new Date()
): GoalCrossingEvent | null {
  if (previous === null) return null;
  if (goal <= 0) return null;

  if (previous < goal && current >= goal) {
    return { direction: 'belowToAbove', projectedTotal: current, goal, detectedAt };
  }

  if (previous >= goal && current < goal) {
    return { direction: 'aboveToBelow', projectedTotal: current, goal, detectedAt };
  }

  return null;
}
