import { headingOf, lerp } from '../geometry';
import type { RoadGraph } from '../road-network/RoadGraph';
import type { GraphEdge, Maneuver, PathPoint, Route } from '../road-network/types';

export interface ManeuverRun {
  maneuver: Maneuver;
  from: number;   // index of the first point of the run
  to: number;     // index of the last point of the run
  length: number; // m
}

/**
 * Expand a chain of graph edges into evenly spaced path points.
 *
 * Each edge contributes its start node plus interior samples so that
 * consecutive points are never further apart than the graph resolution.
 * Points carry the maneuver of the edge they lie on; the closing node
 * inherits the tag of the last edge.
 */
export function expandPath(graph: RoadGraph, startNode: number, edges: readonly GraphEdge[]): Route {
  const points: PathPoint[] = [];
  const nodes: number[] = [startNode];
  let s = 0;

  if (edges.length === 0) {
    const node = graph.getNode(startNode);
    points.push({
      position: node.position,
      heading: node.heading,
      maneuver: 'lane_follow',
      node: node.index,
      edge: null,
      roadId: node.roadId,
      laneId: node.laneId,
      s: 0,
    });
    return freezeRoute(points, nodes, 0);
  }

  for (const edge of edges) {
    const from = graph.getNode(edge.from);
    const to = graph.getNode(edge.to);
    const lane = graph.getLane(edge.lane);
    const edgeHeading = headingOf(from.position, to.position);
    const steps = Math.max(1, Math.ceil(edge.length / graph.resolution - 1e-9));

    for (let k = 0; k < steps; k++) {
      const t = k / steps;
      const atNode = k === 0;
      points.push({
        position: atNode ? from.position : lerp(from.position, to.position, t),
        heading: atNode ? from.heading : edgeHeading,
        maneuver: edge.maneuver,
        node: atNode ? from.index : null,
        edge: edge.index,
        roadId: atNode ? from.roadId : lane.roadId,
        laneId: atNode ? from.laneId : lane.laneId,
        speedLimit: lane.maxSpeed,
        s: s + edge.length * t,
      });
    }

    s += edge.length;
    nodes.push(edge.to);
  }

  const lastEdge = edges[edges.length - 1];
  const end = graph.getNode(lastEdge.to);
  points.push({
    position: end.position,
    heading: end.heading,
    maneuver: lastEdge.maneuver,
    node: end.index,
    edge: lastEdge.index,
    roadId: end.roadId,
    laneId: end.laneId,
    speedLimit: graph.getLane(lastEdge.lane).maxSpeed,
    s,
  });

  return freezeRoute(points, nodes, s);
}

/**
 * Collapse the maneuver stream of a route into consecutive runs
 */
export function maneuverSummary(route: Route): ManeuverRun[] {
  const runs: ManeuverRun[] = [];

  route.points.forEach((point, i) => {
    const current = runs[runs.length - 1];
    if (current && current.maneuver === point.maneuver) {
      current.to = i;
      current.length = point.s - route.points[current.from].s;
    } else {
      runs.push({ maneuver: point.maneuver, from: i, to: i, length: 0 });
    }
  });

  return runs;
}

function freezeRoute(points: PathPoint[], nodes: number[], length: number): Route {
  return Object.freeze({
    points: Object.freeze(points.map((point) => Object.freeze(point))),
    nodes: Object.freeze(nodes),
    length,
  });
}
