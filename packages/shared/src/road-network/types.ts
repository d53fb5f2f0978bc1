// Core types for the lane graph and planned routes
import type { Vec2 } from '../types';

/**
 * Driving action required at a point of the route
 */
export type Maneuver =
  | 'lane_follow'
  | 'straight'
  | 'left'
  | 'right'
  | 'change_lane_left'
  | 'change_lane_right';

export const MANEUVERS: readonly Maneuver[] = [
  'lane_follow',
  'straight',
  'left',
  'right',
  'change_lane_left',
  'change_lane_right',
];

export function isManeuver(value: unknown): value is Maneuver {
  return typeof value === 'string' && (MANEUVERS as readonly string[]).includes(value);
}

/**
 * Single driving lane as delivered by the map provider
 */
export interface LaneSegment {
  id: string;
  roadId: number;
  laneId: number;
  poly: Vec2[];             // centerline in driving direction
  maxSpeed?: number;        // m/s
  junctionId?: string;      // set on connecting lanes inside a junction
  successors: string[];     // LaneSegment.id array
  left?: string;            // same-direction neighbour reachable by a lane change
  right?: string;
}

/**
 * Raw road topology consumed once by the graph builder
 */
export interface RoadTopology {
  name?: string;
  lanes: LaneSegment[];
}

/**
 * Lane metadata kept in the graph, referenced by index from edges
 */
export interface LaneInfo {
  readonly index: number;
  readonly id: string;
  readonly roadId: number;
  readonly laneId: number;
  readonly maxSpeed?: number;
  readonly junctionId?: string;
  readonly length: number;
}

/**
 * Sampled position along a lane
 */
export interface GraphNode {
  readonly index: number;
  readonly position: Readonly<Vec2>;
  readonly heading: number;   // radians CCW from +x
  readonly roadId: number;
  readonly laneId: number;
  readonly s: number;         // longitudinal position along its lane
}

export type EdgeKind = 'lane' | 'link' | 'lane_change';

/**
 * Directed connection between two nodes
 */
export interface GraphEdge {
  readonly index: number;
  readonly from: number;      // GraphNode.index
  readonly to: number;        // GraphNode.index
  readonly length: number;    // m, straight chord between the endpoints
  readonly maneuver: Maneuver;
  readonly kind: EdgeKind;
  readonly lane: number;      // LaneInfo.index of the lane the edge drives on
}

/**
 * One interpolated sample of a planned route
 */
export interface PathPoint {
  readonly position: Readonly<Vec2>;
  readonly heading: number;
  readonly maneuver: Maneuver;
  readonly node: number | null;   // GraphNode.index, null for interpolated samples
  readonly edge: number | null;   // GraphEdge.index the sample lies on, null on a single-node route
  readonly roadId: number;
  readonly laneId: number;
  readonly speedLimit?: number;   // m/s
  readonly s: number;             // distance from the route start
}

/**
 * Ordered, immutable sequence of path points from start to destination
 */
export interface Route {
  readonly points: readonly PathPoint[];
  readonly nodes: readonly number[];  // graph nodes visited, in order
  readonly length: number;            // m
}
