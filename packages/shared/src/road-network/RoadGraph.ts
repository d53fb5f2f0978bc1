import { TopologyError } from '../errors';
import { projectOnSegment } from '../geometry';
import type { Vec2 } from '../types';
import type { GraphEdge, GraphNode, LaneInfo } from './types';

export interface RoadGraphData {
  name?: string;
  resolution: number;
  nodes: GraphNode[];
  edges: GraphEdge[];
  lanes: LaneInfo[];
}

export interface EdgeProjection {
  edge: GraphEdge;
  point: Vec2;
  t: number;
  distance: number;
}

/**
 * Immutable lane graph. Nodes, edges and lanes live in arenas and reference
 * each other by index; a single instance is shared read-only by every planner
 * working on the same map.
 */
export class RoadGraph {
  readonly name?: string;
  readonly resolution: number;
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  readonly lanes: readonly LaneInfo[];
  private readonly adjacency: readonly (readonly GraphEdge[])[];

  constructor(data: RoadGraphData) {
    this.name = data.name;
    this.resolution = data.resolution;
    this.nodes = Object.freeze(data.nodes.map((node) => Object.freeze({ ...node, position: freezePoint(node.position) })));
    this.edges = Object.freeze(data.edges.map((edge) => Object.freeze({ ...edge })));
    this.lanes = Object.freeze(data.lanes.map((lane) => Object.freeze({ ...lane })));

    const adjacency: GraphEdge[][] = this.nodes.map(() => []);
    const dangling = this.edges.filter((edge) => !this.nodes[edge.from] || !this.nodes[edge.to] || !this.lanes[edge.lane]);
    if (dangling.length > 0) {
      throw new TopologyError(dangling.map((edge) => `edge ${edge.index} references a missing node or lane`));
    }
    for (const edge of this.edges) {
      adjacency[edge.from].push(edge);
    }
    this.adjacency = Object.freeze(adjacency.map((list) => Object.freeze(list)));
    Object.freeze(this);
  }

  getNode(index: number): GraphNode {
    const node = this.nodes[index];
    if (!node) {
      throw new RangeError(`Unknown graph node ${index}`);
    }
    return node;
  }

  getEdge(index: number): GraphEdge {
    const edge = this.edges[index];
    if (!edge) {
      throw new RangeError(`Unknown graph edge ${index}`);
    }
    return edge;
  }

  getLane(index: number): LaneInfo {
    const lane = this.lanes[index];
    if (!lane) {
      throw new RangeError(`Unknown lane ${index}`);
    }
    return lane;
  }

  /**
   * Edges leaving a node, in construction order
   */
  outgoing(nodeIndex: number): readonly GraphEdge[] {
    return this.adjacency[nodeIndex] ?? [];
  }

  /**
   * Find the drivable edge nearest to a world position.
   * Lane change edges are skipped: they connect lanes but are not lanes.
   */
  findNearestEdge(worldPos: Vec2, maxDistance = Infinity): EdgeProjection | null {
    let nearest: EdgeProjection | null = null;
    let minDistance = maxDistance;

    for (const edge of this.edges) {
      if (edge.kind === 'lane_change') continue;
      const projection = projectOnSegment(worldPos, this.nodes[edge.from].position, this.nodes[edge.to].position);
      // Strict comparison keeps the lowest edge index on ties
      if (projection.distance < minDistance || (nearest === null && projection.distance <= minDistance)) {
        minDistance = projection.distance;
        nearest = { edge, point: projection.point, t: projection.t, distance: projection.distance };
      }
    }

    return nearest;
  }

  /**
   * Get graph statistics
   */
  getStats() {
    const junctions = new Set<string>();
    for (const lane of this.lanes) {
      if (lane.junctionId !== undefined) junctions.add(lane.junctionId);
    }

    return {
      name: this.name,
      resolution: this.resolution,
      nodes: this.nodes.length,
      edges: this.edges.length,
      lanes: this.lanes.length,
      junctions: junctions.size,
      laneChanges: this.edges.filter((edge) => edge.kind === 'lane_change').length,
    };
  }
}

function freezePoint(point: Readonly<Vec2>): Readonly<Vec2> {
  const copy: Vec2 = [point[0], point[1]];
  return Object.freeze(copy);
}
