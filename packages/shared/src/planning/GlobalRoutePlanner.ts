import { DEFAULT_MAX_PROJECTION_DISTANCE } from '../constants';
import { InvalidLocation, NoPathFound } from '../errors';
import { distance } from '../geometry';
import { logger } from '../logger';
import type { RoadGraph } from '../road-network/RoadGraph';
import type { GraphEdge, Route } from '../road-network/types';
import type { Vec2 } from '../types';
import { expandPath } from './route';

export interface GlobalRoutePlannerOptions {
  maxProjectionDistance?: number; // m, locations further from every lane are rejected
}

export interface Localization {
  node: number;
  edge: number;
  distance: number;               // from the location to the lane
}

const log = logger.scope('GlobalRoutePlanner');

/**
 * Shortest-path routing over a shared, read-only road graph.
 * Holds no per-trip state, so one instance may serve any number of vehicles.
 */
export class GlobalRoutePlanner {
  private readonly maxProjectionDistance: number;

  constructor(readonly graph: RoadGraph, options: GlobalRoutePlannerOptions = {}) {
    this.maxProjectionDistance = options.maxProjectionDistance ?? DEFAULT_MAX_PROJECTION_DISTANCE;
  }

  /**
   * Plan a maneuver-tagged route between two world locations
   */
  planRoute(start: Vec2, end: Vec2): Route {
    return this.planRouteVia([start, end]);
  }

  /**
   * Plan a route visiting every location in order, as one continuous route
   */
  planRouteVia(locations: readonly Vec2[]): Route {
    if (locations.length < 2) {
      throw new RangeError(`A route needs at least two locations, got ${locations.length}`);
    }

    const stops = locations.map((location) => this.localize(location).node);
    const edges: GraphEdge[] = [];

    for (let i = 0; i < stops.length - 1; i++) {
      if (stops[i] === stops[i + 1]) continue;
      const leg = this.search(stops[i], stops[i + 1]);
      if (!leg) {
        log.warn(`No path between nodes ${stops[i]} and ${stops[i + 1]}`);
        throw new NoPathFound(stops[i], stops[i + 1]);
      }
      edges.push(...leg);
    }

    const route = expandPath(this.graph, stops[0], edges);
    log.debug(`Planned route: ${route.points.length} points, ${route.length.toFixed(1)} m`);
    return route;
  }

  /**
   * Project a location onto the nearest lane and pick the closer end of that edge
   */
  localize(location: Vec2): Localization {
    if (!Number.isFinite(location[0]) || !Number.isFinite(location[1])) {
      throw new InvalidLocation(location, 'coordinates are not finite');
    }

    const projection = this.graph.findNearestEdge(location, this.maxProjectionDistance);
    if (!projection) {
      throw new InvalidLocation(location, `no lane within ${this.maxProjectionDistance} m`);
    }

    const { edge } = projection;
    return {
      node: projection.t < 0.5 ? edge.from : edge.to,
      edge: edge.index,
      distance: projection.distance,
    };
  }

  /**
   * A* search with edge length as cost and straight-line distance as heuristic.
   * Edge lengths are chords, so the heuristic never overestimates.
   * Returns null when the goal is unreachable.
   */
  search(startNode: number, goalNode: number): GraphEdge[] | null {
    const goal = this.graph.getNode(goalNode).position;
    const heuristic = (node: number) => distance(this.graph.nodes[node].position, goal);

    const costs = new Map<number, number>([[startNode, 0]]);
    const prevEdge = new Map<number, GraphEdge>();
    const heap = new MinHeap();
    heap.push({ node: startNode, cost: 0, priority: heuristic(startNode) });

    while (!heap.isEmpty()) {
      const current = heap.pop();
      if (!current) {
        break;
      }
      const bestCost = costs.get(current.node);
      if (bestCost === undefined || current.cost > bestCost) {
        continue;
      }
      if (current.node === goalNode) {
        break;
      }
      for (const edge of this.graph.outgoing(current.node)) {
        const nextCost = current.cost + edge.length;
        const prevCost = costs.get(edge.to);
        // Strict: on equal cost the first edge found (lane-follow before lane change) stays
        if (prevCost === undefined || nextCost < prevCost) {
          costs.set(edge.to, nextCost);
          prevEdge.set(edge.to, edge);
          heap.push({ node: edge.to, cost: nextCost, priority: nextCost + heuristic(edge.to) });
        }
      }
    }

    if (!costs.has(goalNode)) {
      return null;
    }

    const edges: GraphEdge[] = [];
    let current = goalNode;
    while (current !== startNode) {
      const edge = prevEdge.get(current);
      if (!edge) {
        return null;
      }
      edges.push(edge);
      current = edge.from;
    }
    edges.reverse();
    return edges;
  }
}

interface HeapItem {
  node: number;
  cost: number;
  priority: number;
  seq?: number;
}

/**
 * Binary min-heap on priority; equal priorities pop in insertion order
 */
class MinHeap {
  private data: Required<HeapItem>[] = [];
  private counter = 0;

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  push(item: HeapItem): void {
    this.data.push({ ...item, seq: this.counter++ });
    this.bubbleUp(this.data.length - 1);
  }

  pop(): HeapItem | null {
    if (this.data.length === 0) {
      return null;
    }
    const root = this.data[0];
    const last = this.data.pop();
    if (this.data.length > 0 && last) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return root;
  }

  private less(a: Required<HeapItem>, b: Required<HeapItem>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
  }

  private bubbleUp(index: number): void {
    let idx = index;
    while (idx > 0) {
      const parent = Math.floor((idx - 1) / 2);
      if (!this.less(this.data[idx], this.data[parent])) {
        break;
      }
      [this.data[parent], this.data[idx]] = [this.data[idx], this.data[parent]];
      idx = parent;
    }
  }

  private bubbleDown(index: number): void {
    let idx = index;
    const length = this.data.length;
    while (true) {
      const left = idx * 2 + 1;
      const right = idx * 2 + 2;
      let smallest = idx;
      if (left < length && this.less(this.data[left], this.data[smallest])) {
        smallest = left;
      }
      if (right < length && this.less(this.data[right], this.data[smallest])) {
        smallest = right;
      }
      if (smallest === idx) {
        break;
      }
      [this.data[smallest], this.data[idx]] = [this.data[idx], this.data[smallest]];
      idx = smallest;
    }
  }
}
