import { TopologyError } from '../src/errors';
import { degToRad } from '../src/geometry';
import { RoadGraphBuilder } from '../src/road-network/builder/graph-builder';
import { IntersectionBuilder } from '../src/road-network/builder/intersection-builder';
import { RoadGraph } from '../src/road-network/RoadGraph';
import { lane, leftTurn, straightRoad, twoLanes } from './fixtures';

describe('RoadGraphBuilder', () => {
  it('should sample a lane at the resolution', () => {
    const graph = RoadGraphBuilder.build(straightRoad());

    expect(graph.nodes).toHaveLength(51);
    expect(graph.edges).toHaveLength(50);
    graph.nodes.forEach((node, k) => {
      expect(node.position[0]).toBeCloseTo(2 * k);
      expect(node.position[1]).toBeCloseTo(0);
      expect(node.heading).toBeCloseTo(0);
    });
    graph.edges.forEach((edge) => {
      expect(edge.kind).toBe('lane');
      expect(edge.maneuver).toBe('lane_follow');
      expect(edge.length).toBeCloseTo(2);
    });
  });

  it('should honour a custom resolution', () => {
    const graph = RoadGraphBuilder.build(straightRoad(), { resolution: 10 });
    expect(graph.resolution).toBe(10);
    expect(graph.nodes).toHaveLength(11);
  });

  it('should reject a non-positive resolution', () => {
    expect(() => new RoadGraphBuilder({ resolution: 0 })).toThrow(RangeError);
  });

  it('should share nodes where lane ends meet', () => {
    const graph = RoadGraphBuilder.build(leftTurn());

    // 11 samples per 20 m lane, two of them shared
    expect(graph.nodes).toHaveLength(31);
    expect(graph.edges).toHaveLength(30);
    expect(graph.edges.some((edge) => edge.kind === 'link')).toBe(false);
    expect(graph.edges[9].to).toBe(graph.edges[10].from);
    expect(graph.edges[19].to).toBe(graph.edges[20].from);
  });

  it('should tag junction lanes with their turn', () => {
    const graph = RoadGraphBuilder.build(leftTurn());
    const maneuvers = graph.edges.map((edge) => edge.maneuver);

    expect(maneuvers.slice(0, 10).every((m) => m === 'lane_follow')).toBe(true);
    expect(maneuvers.slice(10, 20).every((m) => m === 'left')).toBe(true);
    expect(maneuvers.slice(20).every((m) => m === 'lane_follow')).toBe(true);
  });

  it('should classify right and straight junction lanes', () => {
    const graph = RoadGraphBuilder.build({
      lanes: [
        lane('in', [[0, 0], [10, 0]], { successors: ['r', 's'] }),
        lane('r', [[10, 0], [20, 0], [20, -10]], { junctionId: 'j' }),
        lane('s', [[10, 0], [30, 1]], { junctionId: 'j' }),
      ],
    });
    const junctionManeuvers = (laneIndex: number) =>
      new Set(graph.edges.filter((edge) => edge.lane === laneIndex).map((edge) => edge.maneuver));

    expect(junctionManeuvers(1)).toEqual(new Set(['right']));
    expect(junctionManeuvers(2)).toEqual(new Set(['straight']));
    expect(graph.getStats().junctions).toBe(1);
  });

  it('should link successors across a gap', () => {
    const graph = RoadGraphBuilder.build({
      lanes: [
        lane('in', [[0, 0], [20, 0]], { successors: ['next'] }),
        lane('next', [[21, 0], [41, 0]]),
      ],
    });
    const links = graph.edges.filter((edge) => edge.kind === 'link');

    expect(graph.nodes).toHaveLength(22);
    expect(links).toHaveLength(1);
    expect(links[0]).toMatchObject({ from: 10, to: 11, maneuver: 'lane_follow', lane: 1 });
    expect(links[0].length).toBeCloseTo(1);
  });

  it('should merge lane ends within the tolerance', () => {
    const graph = RoadGraphBuilder.build({
      lanes: [
        lane('in', [[0, 0], [20, 0]], { successors: ['next'] }),
        lane('next', [[20.005, 0], [40, 0]]),
      ],
    });

    expect(graph.nodes).toHaveLength(21);
    expect(graph.edges.filter((edge) => edge.kind === 'link')).toHaveLength(0);
  });

  it('should add lane change edges towards the next sample of the neighbour', () => {
    const graph = RoadGraphBuilder.build(twoLanes());
    const changes = graph.edges.filter((edge) => edge.kind === 'lane_change');

    expect(graph.getStats().laneChanges).toBe(20);
    expect(changes.filter((edge) => edge.maneuver === 'change_lane_right')).toHaveLength(10);
    expect(changes.filter((edge) => edge.maneuver === 'change_lane_left')).toHaveLength(10);

    // l1 nodes are 0..10, l2 nodes 11..21
    const outgoing = graph.outgoing(0);
    expect(outgoing.map((edge) => edge.kind)).toEqual(['lane', 'lane_change']);
    expect(outgoing[1]).toMatchObject({ to: 12, maneuver: 'change_lane_right', lane: 1 });
    expect(outgoing[1].length).toBeCloseTo(Math.sqrt(16.25));
  });

  it('should refuse a topology with an orphan lane', () => {
    const build = () =>
      RoadGraphBuilder.build({
        lanes: [
          lane('a', [[0, 0], [20, 0]], { successors: ['b'] }),
          lane('b', [[20, 0], [40, 0]]),
          lane('orphan', [[500, 500], [520, 500]]),
        ],
      });
    expect(build).toThrow(TopologyError);
    expect(build).toThrow('lane "orphan" is not connected to any other lane');
  });

  it('should refuse an invalid topology', () => {
    const build = () => RoadGraphBuilder.build({ lanes: [lane('a', [[0, 0], [10, 0]], { successors: ['zz'] })] });
    expect(build).toThrow(TopologyError);
    expect(build).toThrow('lane "a" links to unknown successor "zz"');
  });
});

describe('IntersectionBuilder', () => {
  const threshold = degToRad(10);

  it('should measure the deflection of a junction lane', () => {
    const turn = lane('t', [[0, 0], [10, 0], [10, 10]], { junctionId: 'j' });
    expect(IntersectionBuilder.calculateTurnAngle(turn)).toBeCloseTo(Math.PI / 2);
  });

  it('should classify against the straight threshold', () => {
    expect(IntersectionBuilder.classifyTurn(degToRad(5), threshold)).toBe('straight');
    expect(IntersectionBuilder.classifyTurn(degToRad(-9), threshold)).toBe('straight');
    expect(IntersectionBuilder.classifyTurn(degToRad(95), threshold)).toBe('left');
    expect(IntersectionBuilder.classifyTurn(degToRad(-30), threshold)).toBe('right');
  });

  it('should leave lanes outside junctions as lane follow', () => {
    const bend = lane('b', [[0, 0], [10, 0], [10, 10]]);
    expect(IntersectionBuilder.laneManeuver(bend, threshold)).toBe('lane_follow');
  });
});

describe('RoadGraph', () => {
  it('should be frozen after construction', () => {
    const graph = RoadGraphBuilder.build(straightRoad());
    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.nodes)).toBe(true);
    expect(Object.isFrozen(graph.nodes[0])).toBe(true);
    expect(Object.isFrozen(graph.nodes[0].position)).toBe(true);
    expect(Object.isFrozen(graph.edges[0])).toBe(true);
  });

  it('should find the nearest lane edge, ignoring lane changes', () => {
    const graph = RoadGraphBuilder.build(twoLanes());
    // Equidistant from edge 0 (l1) and edge 10 (l2), on top of a lane change edge
    const nearest = graph.findNearestEdge([1, -1.75]);

    expect(nearest?.edge.index).toBe(0);
    expect(nearest?.distance).toBeCloseTo(1.75);
    expect(nearest?.t).toBeCloseTo(0.5);
  });

  it('should respect the search radius', () => {
    const graph = RoadGraphBuilder.build(straightRoad());
    expect(graph.findNearestEdge([50, 30], 10)).toBeNull();
    expect(graph.findNearestEdge([50, 5], 10)?.distance).toBeCloseTo(5);
  });

  it('should reject edges pointing at missing nodes', () => {
    expect(
      () =>
        new RoadGraph({
          resolution: 2,
          nodes: [{ index: 0, position: [0, 0], heading: 0, roadId: 1, laneId: -1, s: 0 }],
          edges: [{ index: 0, from: 0, to: 1, length: 1, maneuver: 'lane_follow', kind: 'lane', lane: 0 }],
          lanes: [{ index: 0, id: 'a', roadId: 1, laneId: -1, length: 1 }],
        })
    ).toThrow(TopologyError);
  });

  it('should throw on unknown indices', () => {
    const graph = RoadGraphBuilder.build(straightRoad());
    expect(() => graph.getNode(51)).toThrow(RangeError);
    expect(() => graph.getEdge(-1)).toThrow(RangeError);
    expect(graph.outgoing(50)).toEqual([]);
  });
});
