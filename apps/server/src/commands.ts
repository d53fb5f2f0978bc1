import type { Maneuver } from '@lanepath/shared';

/**
 * Numeric command vocabulary reported to telemetry consumers
 */
export enum RoadOption {
  REACH_GOAL = 0,
  LANE_FOLLOW = 2,
  TURN_LEFT = 3,
  TURN_RIGHT = 4,
  GO_STRAIGHT = 5,
}

export function commandFor(maneuver: Maneuver | null): RoadOption {
  if (maneuver === null) return RoadOption.REACH_GOAL;

  switch (maneuver) {
    case 'lane_follow':
    case 'change_lane_left':
    case 'change_lane_right':
      return RoadOption.LANE_FOLLOW;
    case 'left':
      return RoadOption.TURN_LEFT;
    case 'right':
      return RoadOption.TURN_RIGHT;
    case 'straight':
      return RoadOption.GO_STRAIGHT;
    default: {
      const unknown: never = maneuver;
      throw new Error(`Unhandled maneuver ${String(unknown)}`);
    }
  }
}
