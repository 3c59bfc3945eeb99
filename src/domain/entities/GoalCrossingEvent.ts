export type GoalCrossingDirection = 'belowToAbove' | 'aboveToBelow';

export interface GoalCrossingEvent {
  direction: GoalCrossingDirection;
  projectedTotal: number;
  goal: number;
  detectedAt: Date;
}

/**
 * Notification copy for a crossing event
 */
export function describeGoalCrossing(event: GoalCrossingEvent): { title: string; body: string } {
  const projected = Math.round(event.projectedTotal);
  const goal = Math.round(event.goal);

  switch (event.direction) {
    case 'belowToAbove':
      return {
        title: 'On Track!',
        body: `You're now projected to reach your goal! Projected: ${projected} cal / Goal: ${goal} cal`,
      };
    case 'aboveToBelow':
      return {
        title: 'Falling Behind',
        body: `Your pace has slowed. Projected: ${projected} cal / Goal: ${goal} cal`,
      };
  }
}
