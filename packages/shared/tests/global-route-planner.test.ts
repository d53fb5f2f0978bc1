import { InvalidLocation, NoPathFound } from '../src/errors';
import { GlobalRoutePlanner } from '../src/planning/GlobalRoutePlanner';
import { maneuverSummary } from '../src/planning/route';
import { RoadGraphBuilder } from '../src/road-network/builder/graph-builder';
import { RoadGraph } from '../src/road-network/RoadGraph';
import { lane, leftTurn, straightRoad, twoLanes } from './fixtures';

describe('GlobalRoutePlanner', () => {
  describe('planRoute', () => {
    it('should follow a straight lane at the graph resolution', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));
      const route = planner.planRoute([0, 0], [100, 0]);

      expect(route.points).toHaveLength(51);
      expect(route.length).toBeCloseTo(100);
      route.points.forEach((point, k) => {
        expect(point.position[0]).toBeCloseTo(2 * k);
        expect(point.position[1]).toBeCloseTo(0);
        expect(point.maneuver).toBe('lane_follow');
        expect(point.s).toBeCloseTo(2 * k);
      });
    });

    it('should interpolate long edges down to the resolution', () => {
      const graph = new RoadGraph({
        resolution: 2,
        nodes: [
          { index: 0, position: [0, 0], heading: 0, roadId: 1, laneId: -1, s: 0 },
          { index: 1, position: [100, 0], heading: 0, roadId: 1, laneId: -1, s: 100 },
        ],
        edges: [{ index: 0, from: 0, to: 1, length: 100, maneuver: 'lane_follow', kind: 'lane', lane: 0 }],
        lanes: [{ index: 0, id: 'a', roadId: 1, laneId: -1, maxSpeed: 10, length: 100 }],
      });
      const route = new GlobalRoutePlanner(graph).planRoute([0, 0], [100, 0]);

      expect(route.points).toHaveLength(51);
      expect(route.nodes).toEqual([0, 1]);
      route.points.forEach((point, k) => {
        expect(point.position[0]).toBeCloseTo(2 * k);
        expect(point.maneuver).toBe('lane_follow');
        expect(point.speedLimit).toBe(10);
      });
      expect(route.points[0].node).toBe(0);
      expect(route.points[1].node).toBeNull();
      expect(route.points[50].node).toBe(1);
    });

    it('should start the turn at the junction entry', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(leftTurn()));
      const route = planner.planRoute([0, 0], [30, 30]);

      expect(route.points).toHaveLength(31);
      expect(route.length).toBeCloseTo(60);
      expect(route.points[9].maneuver).toBe('lane_follow');
      expect(route.points[10].maneuver).toBe('left');
      expect(route.points[10].position[0]).toBeCloseTo(20);
      expect(route.points[10].position[1]).toBeCloseTo(0);
      expect(route.points[19].maneuver).toBe('left');
      expect(route.points[20].maneuver).toBe('lane_follow');
      expect(route.points[30].position[0]).toBeCloseTo(30);
      expect(route.points[30].position[1]).toBeCloseTo(30);
    });

    it('should keep maneuver runs contiguous', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(leftTurn()));
      const runs = maneuverSummary(planner.planRoute([0, 0], [30, 30]));

      expect(runs.map(({ maneuver, from, to }) => ({ maneuver, from, to }))).toEqual([
        { maneuver: 'lane_follow', from: 0, to: 9 },
        { maneuver: 'left', from: 10, to: 19 },
        { maneuver: 'lane_follow', from: 20, to: 30 },
      ]);
      expect(runs[0].length).toBeCloseTo(18);
      expect(runs[1].length).toBeCloseTo(18);
      expect(runs[2].length).toBeCloseTo(20);
    });

    it('should produce identical routes for identical requests', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(twoLanes()));
      const first = planner.planRoute([0, 0], [20, -3.5]);
      const second = planner.planRoute([0, 0], [20, -3.5]);
      expect(second).toEqual(first);
    });

    it('should not change lanes unless the destination needs it', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(twoLanes()));
      const route = planner.planRoute([0, 0], [20, 0]);

      expect(route.points).toHaveLength(11);
      expect(route.points.every((point) => point.maneuver === 'lane_follow')).toBe(true);
    });

    it('should change lanes once to reach a neighbour lane', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(twoLanes()));
      const route = planner.planRoute([0, 0], [20, -3.5]);
      const maneuvers = route.points.map((point) => point.maneuver);
      const runs = maneuverSummary(route).filter((run) => run.maneuver === 'change_lane_right');

      expect(runs).toHaveLength(1);
      expect(maneuvers).not.toContain('change_lane_left');
      expect(maneuvers.slice(0, runs[0].from).every((m) => m === 'lane_follow')).toBe(true);
      expect(route.points[route.points.length - 1].laneId).toBe(-2);
      expect(route.length).toBeCloseTo(18 + Math.sqrt(16.25));
    });

    it('should return a single point when start and end share a node', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));
      const route = planner.planRoute([10, 0.3], [10.4, 0]);

      expect(route.points).toHaveLength(1);
      expect(route.length).toBe(0);
      expect(route.points[0].edge).toBeNull();
      expect(route.points[0].position[0]).toBeCloseTo(10);
    });

    it('should return frozen routes', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));
      const route = planner.planRoute([0, 0], [10, 0]);
      expect(Object.isFrozen(route)).toBe(true);
      expect(Object.isFrozen(route.points)).toBe(true);
      expect(Object.isFrozen(route.points[0])).toBe(true);
    });

    it('should throw NoPathFound against the direction of travel', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));
      expect(() => planner.planRoute([100, 0], [0, 0])).toThrow(NoPathFound);
    });

    it('should throw NoPathFound between disconnected lanes', () => {
      const planner = new GlobalRoutePlanner(
        RoadGraphBuilder.build({
          // c feeds into b, but nothing leads from a to c
          lanes: [
            lane('a', [[0, 0], [20, 0]], { successors: ['b'] }),
            lane('b', [[20, 0], [40, 0]], { roadId: 2 }),
            lane('c', [[0, 40], [20, 40]], { roadId: 3, successors: ['b'] }),
          ],
        })
      );

      let caught: unknown;
      try {
        planner.planRoute([0, 0], [20, 40]);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(NoPathFound);
      if (caught instanceof NoPathFound) {
        expect(caught.code).toBe('NO_PATH_FOUND');
        expect(caught.startNode).toBe(0);
        expect(caught.endNode).toBe(31);
      }
    });

    it('should throw InvalidLocation far from every lane', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));
      expect(() => planner.planRoute([0, 0], [50, 500])).toThrow(InvalidLocation);
      expect(() => planner.planRoute([Number.NaN, 0], [50, 0])).toThrow('coordinates are not finite');
    });

    it('should honour a custom projection distance', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()), { maxProjectionDistance: 1 });
      expect(() => planner.planRoute([0, 2], [50, 0])).toThrow('no lane within 1 m');
    });
  });

  describe('localize', () => {
    it('should snap to the nearer end of the nearest edge', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));

      expect(planner.localize([10.4, 1])).toEqual({ node: 5, edge: 5, distance: 1 });
      expect(planner.localize([11.6, -2])).toEqual({ node: 6, edge: 5, distance: 2 });
    });
  });

  describe('planRouteVia', () => {
    it('should chain legs into one route', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));
      const route = planner.planRouteVia([[0, 0], [50, 0], [100, 0]]);

      expect(route.points).toHaveLength(51);
      expect(route.nodes[25]).toBe(25);
      expect(route.length).toBeCloseTo(100);
    });

    it('should need at least two locations', () => {
      const planner = new GlobalRoutePlanner(RoadGraphBuilder.build(straightRoad()));
      expect(() => planner.planRouteVia([[0, 0]])).toThrow(RangeError);
    });
  });
});
