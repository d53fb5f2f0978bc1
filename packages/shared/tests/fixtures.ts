import type { LaneSegment, RoadTopology } from '../src/road-network/types';

export function lane(id: string, poly: LaneSegment['poly'], extra: Partial<LaneSegment> = {}): LaneSegment {
  return { id, roadId: 1, laneId: -1, poly, successors: [], ...extra };
}

/** One 100 m lane heading east from the origin */
export function straightRoad(): RoadTopology {
  return { name: 'straight', lanes: [lane('a', [[0, 0], [100, 0]])] };
}

/**
 * Approach lane, a junction lane turning onto a northbound road, and the exit lane.
 * Lane ends coincide, so no link edges are needed.
 */
export function leftTurn(): RoadTopology {
  return {
    name: 'left-turn',
    lanes: [
      lane('in', [[0, 0], [20, 0]], { successors: ['turn'] }),
      lane('turn', [[20, 0], [30, 0], [30, 10]], { roadId: 10, junctionId: 'j1', successors: ['out'] }),
      lane('out', [[30, 10], [30, 30]], { roadId: 2 }),
    ],
  };
}

/** Two parallel eastbound lanes; l2 is 3.5 m to the right of l1 */
export function twoLanes(): RoadTopology {
  return {
    name: 'two-lanes',
    lanes: [
      lane('l1', [[0, 0], [20, 0]], { right: 'l2' }),
      lane('l2', [[0, -3.5], [20, -3.5]], { laneId: -2, left: 'l1' }),
    ],
  };
}
