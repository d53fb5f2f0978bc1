import { headingOf, normalizeAngle } from '../../geometry';
import type { LaneSegment, Maneuver } from '../types';
import type { GraphDraft } from './graph-draft';

/**
 * Junction turn classification and lane-to-lane connections
 */
export class IntersectionBuilder {

  /**
   * Deflection between a lane's entry and exit heading (-π to π], positive = left
   */
  static calculateTurnAngle(lane: LaneSegment): number {
    const poly = lane.poly;
    const entryHeading = headingOf(poly[0], poly[1]);
    const exitHeading = headingOf(poly[poly.length - 2], poly[poly.length - 1]);
    return normalizeAngle(exitHeading - entryHeading);
  }

  /**
   * Classify a turn angle against the straight threshold
   */
  static classifyTurn(turnAngle: number, straightThreshold: number): Maneuver {
    if (Math.abs(turnAngle) < straightThreshold) return 'straight';
    return turnAngle > 0 ? 'left' : 'right';
  }

  /**
   * Maneuver tag of every edge along a lane
   */
  static laneManeuver(lane: LaneSegment, straightThreshold: number): Maneuver {
    if (lane.junctionId === undefined) return 'lane_follow';
    return this.classifyTurn(this.calculateTurnAngle(lane), straightThreshold);
  }

  /**
   * Connect each lane's end to its successors' starts.
   * Coinciding end points already share a node; gaps get a link edge
   * tagged like the successor lane.
   */
  static linkSuccessors(
    draft: GraphDraft,
    lanes: readonly LaneSegment[],
    laneNodes: ReadonlyMap<string, readonly number[]>,
    laneIndex: ReadonlyMap<string, number>,
    maneuvers: ReadonlyMap<string, Maneuver>
  ): number {
    let links = 0;

    for (const lane of lanes) {
      const nodes = laneNodes.get(lane.id);
      if (!nodes) continue;
      const exit = nodes[nodes.length - 1];

      for (const successorId of lane.successors) {
        const successorNodes = laneNodes.get(successorId);
        const successorIndex = laneIndex.get(successorId);
        const maneuver = maneuvers.get(successorId);
        if (!successorNodes || successorIndex === undefined || !maneuver) continue;

        const entry = successorNodes[0];
        if (entry === exit) continue;

        draft.addEdge({
          from: exit,
          to: entry,
          maneuver,
          kind: 'link',
          lane: successorIndex,
        });
        links++;
      }
    }

    return links;
  }
}
