import {
  DEFAULT_MERGE_TOLERANCE,
  DEFAULT_SAMPLING_RESOLUTION,
  DEFAULT_STRAIGHT_THRESHOLD_DEG,
} from '../../constants';
import { TopologyError } from '../../errors';
import { degToRad, polylineLength } from '../../geometry';
import { logger } from '../../logger';
import type { RoadGraph } from '../RoadGraph';
import { validateTopology } from '../topology';
import type { LaneSegment, Maneuver, RoadTopology } from '../types';
import { GraphDraft } from './graph-draft';
import { IntersectionBuilder } from './intersection-builder';
import { LaneBuilder } from './lane-builder';

export interface RoadGraphBuilderOptions {
  resolution?: number;            // m between nodes along a lane
  straightThresholdDeg?: number;  // junction deflection still counted as straight
  mergeTolerance?: number;        // m, lane ends closer than this share a node
}

const log = logger.scope('RoadGraphBuilder');

/**
 * Converts raw lane topology into the immutable lane graph used for routing
 */
export class RoadGraphBuilder {
  private readonly resolution: number;
  private readonly straightThreshold: number;
  private readonly mergeTolerance: number;

  constructor(options: RoadGraphBuilderOptions = {}) {
    this.resolution = options.resolution ?? DEFAULT_SAMPLING_RESOLUTION;
    this.straightThreshold = degToRad(options.straightThresholdDeg ?? DEFAULT_STRAIGHT_THRESHOLD_DEG);
    this.mergeTolerance = options.mergeTolerance ?? DEFAULT_MERGE_TOLERANCE;

    if (!(this.resolution > 0)) {
      throw new RangeError(`Sampling resolution must be positive, got ${this.resolution}`);
    }
  }

  /**
   * Shorthand for a one-off build with the given options
   */
  static build(topology: RoadTopology, options?: RoadGraphBuilderOptions): RoadGraph {
    return new RoadGraphBuilder(options).build(topology);
  }

  /**
   * Validate the topology and build the graph.
   * Every problem is reported at once as a TopologyError.
   */
  build(topology: RoadTopology): RoadGraph {
    const issues = validateTopology(topology);
    if (issues.length > 0) {
      log.error(`Rejected topology with ${issues.length} issue(s)`);
      throw new TopologyError(issues);
    }

    const draft = new GraphDraft(this.mergeTolerance);
    const laneNodes = new Map<string, number[]>();
    const laneIndex = new Map<string, number>();
    const maneuvers = new Map<string, Maneuver>();

    // Step 1: sample lanes into nodes and lane edges
    for (const lane of topology.lanes) {
      const maneuver = IntersectionBuilder.laneManeuver(lane, this.straightThreshold);
      const info = draft.addLane({
        id: lane.id,
        roadId: lane.roadId,
        laneId: lane.laneId,
        maxSpeed: lane.maxSpeed,
        junctionId: lane.junctionId,
        length: polylineLength(lane.poly),
      });

      laneIndex.set(lane.id, info.index);
      maneuvers.set(lane.id, maneuver);
      laneNodes.set(lane.id, LaneBuilder.buildLane(draft, lane, info, this.resolution, maneuver));
    }

    // Step 2: connect successors across gaps
    const links = IntersectionBuilder.linkSuccessors(draft, topology.lanes, laneNodes, laneIndex, maneuvers);

    // Step 3: lane change edges between neighbouring lanes
    const laneChanges = this.buildLaneChanges(draft, topology.lanes, laneNodes, laneIndex);

    const graph = draft.toGraph(this.resolution, topology.name);

    log.info('Road graph built', {
      lanes: graph.lanes.length,
      nodes: graph.nodes.length,
      edges: graph.edges.length,
      links,
      laneChanges,
    });

    return graph;
  }

  /**
   * From every sample but the last, an edge to the neighbour lane's sample
   * nearest the next sample ahead
   */
  private buildLaneChanges(
    draft: GraphDraft,
    lanes: readonly LaneSegment[],
    laneNodes: ReadonlyMap<string, readonly number[]>,
    laneIndex: ReadonlyMap<string, number>
  ): number {
    let created = 0;

    for (const lane of lanes) {
      const nodes = laneNodes.get(lane.id);
      if (!nodes) continue;

      const sides: Array<[string | undefined, Maneuver]> = [
        [lane.left, 'change_lane_left'],
        [lane.right, 'change_lane_right'],
      ];

      for (const [neighbourId, maneuver] of sides) {
        if (neighbourId === undefined) continue;
        const neighbourNodes = laneNodes.get(neighbourId);
        const neighbourIndex = laneIndex.get(neighbourId);
        if (!neighbourNodes || neighbourIndex === undefined) continue;

        for (let i = 0; i < nodes.length - 1; i++) {
          const target = LaneBuilder.nearestLaneNode(draft, neighbourNodes, nodes[i + 1]);
          if (target === nodes[i]) continue;

          draft.addEdge({
            from: nodes[i],
            to: target,
            maneuver,
            kind: 'lane_change',
            lane: neighbourIndex,
          });
          created++;
        }
      }
    }

    return created;
  }
}
