import { distance } from '../../geometry';
import type { Vec2 } from '../../types';
import { RoadGraph } from '../RoadGraph';
import type { GraphEdge, GraphNode, LaneInfo } from '../types';

/**
 * Mutable arenas used while a graph is being built; frozen into a RoadGraph at the end.
 */
export class GraphDraft {
  readonly nodes: GraphNode[] = [];
  readonly edges: GraphEdge[] = [];
  readonly lanes: LaneInfo[] = [];
  private readonly endpoints = new Map<string, number[]>();

  constructor(private readonly mergeTolerance: number) {}

  addLane(lane: Omit<LaneInfo, 'index'>): LaneInfo {
    const info: LaneInfo = { ...lane, index: this.lanes.length };
    this.lanes.push(info);
    return info;
  }

  addNode(node: Omit<GraphNode, 'index'>): number {
    const index = this.nodes.length;
    this.nodes.push({ ...node, index });
    return index;
  }

  /**
   * Node for a lane end point; end points within the merge tolerance share one node
   */
  endpointNode(node: Omit<GraphNode, 'index'>): number {
    const existing = this.findEndpoint(node.position);
    if (existing !== null) return existing;

    const index = this.addNode(node);
    const key = this.cellKey(this.cellOf(node.position));
    const bucket = this.endpoints.get(key);
    if (bucket) {
      bucket.push(index);
    } else {
      this.endpoints.set(key, [index]);
    }
    return index;
  }

  addEdge(edge: Omit<GraphEdge, 'index' | 'length'>): GraphEdge {
    const created: GraphEdge = {
      ...edge,
      index: this.edges.length,
      length: distance(this.nodes[edge.from].position, this.nodes[edge.to].position),
    };
    this.edges.push(created);
    return created;
  }

  toGraph(resolution: number, name?: string): RoadGraph {
    return new RoadGraph({
      name,
      resolution,
      nodes: this.nodes,
      edges: this.edges,
      lanes: this.lanes,
    });
  }

  private findEndpoint(position: Readonly<Vec2>): number | null {
    const [cx, cy] = this.cellOf(position);
    let best: number | null = null;
    let bestDistance = Infinity;

    // Neighbouring cells too, a point near a cell border may match across it
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (const index of this.endpoints.get(this.cellKey([cx + dx, cy + dy])) ?? []) {
          const d = distance(this.nodes[index].position, position);
          if (d > this.mergeTolerance) continue;
          if (best === null || d < bestDistance || (d === bestDistance && index < best)) {
            bestDistance = d;
            best = index;
          }
        }
      }
    }

    return best;
  }

  private cellOf(position: Readonly<Vec2>): Vec2 {
    const size = Math.max(this.mergeTolerance, 1e-9);
    return [Math.floor(position[0] / size), Math.floor(position[1] / size)];
  }

  private cellKey(cell: Vec2): string {
    return `${cell[0]},${cell[1]}`;
  }
}
