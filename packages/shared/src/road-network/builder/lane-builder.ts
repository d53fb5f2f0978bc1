import { samplePolyline } from '../../geometry';
import type { LaneInfo, LaneSegment, Maneuver } from '../types';
import type { GraphDraft } from './graph-draft';

/**
 * Lane sampling into graph nodes and lane-follow edges
 */
export class LaneBuilder {

  /**
   * Sample a lane every `resolution` metres and chain the samples with edges.
   * Returns the node indices of the lane in driving order.
   */
  static buildLane(
    draft: GraphDraft,
    lane: LaneSegment,
    info: LaneInfo,
    resolution: number,
    maneuver: Maneuver
  ): number[] {
    const samples = samplePolyline(lane.poly, resolution);
    const nodes: number[] = [];

    samples.forEach((sample, i) => {
      const node = {
        position: sample.position,
        heading: sample.heading,
        roadId: lane.roadId,
        laneId: lane.laneId,
        s: sample.s,
      };
      // Only lane ends can be shared with other lanes
      const isEndpoint = i === 0 || i === samples.length - 1;
      nodes.push(isEndpoint ? draft.endpointNode(node) : draft.addNode(node));
    });

    for (let i = 0; i < nodes.length - 1; i++) {
      if (nodes[i] === nodes[i + 1]) continue;
      draft.addEdge({
        from: nodes[i],
        to: nodes[i + 1],
        maneuver,
        kind: 'lane',
        lane: info.index,
      });
    }

    return nodes;
  }

  /**
   * Index of the lane node nearest to a node of another lane
   */
  static nearestLaneNode(draft: GraphDraft, laneNodes: readonly number[], target: number): number {
    const [tx, ty] = draft.nodes[target].position;
    let best = laneNodes[0];
    let bestDistanceSq = Infinity;

    for (const index of laneNodes) {
      const [x, y] = draft.nodes[index].position;
      const d = (x - tx) ** 2 + (y - ty) ** 2;
      if (d < bestDistanceSq) {
        bestDistanceSq = d;
        best = index;
      }
    }

    return best;
  }
}
