import { TopologyError } from '../errors';
import { distance } from '../geometry';
import type { Vec2 } from '../types';
import type { LaneSegment, RoadTopology } from './types';

/**
 * Collect every structural problem of a topology; empty when it can be built
 */
export function validateTopology(topology: RoadTopology): string[] {
  const issues: string[] = [];

  if (topology.lanes.length === 0) {
    issues.push('topology has no lanes');
    return issues;
  }

  const byId = new Map<string, LaneSegment>();
  for (const lane of topology.lanes) {
    if (byId.has(lane.id)) {
      issues.push(`duplicate lane id "${lane.id}"`);
    }
    byId.set(lane.id, lane);
  }

  for (const lane of topology.lanes) {
    if (lane.poly.length < 2) {
      issues.push(`lane "${lane.id}" needs at least two points`);
      continue;
    }
    if (lane.poly.some(([x, y]) => !Number.isFinite(x) || !Number.isFinite(y))) {
      issues.push(`lane "${lane.id}" has non-finite coordinates`);
      continue;
    }
    for (let i = 0; i < lane.poly.length - 1; i++) {
      if (distance(lane.poly[i], lane.poly[i + 1]) === 0) {
        issues.push(`lane "${lane.id}" repeats point ${i}`);
        break;
      }
    }
    if (lane.maxSpeed !== undefined && !(lane.maxSpeed > 0)) {
      issues.push(`lane "${lane.id}" has a non-positive speed limit`);
    }

    for (const successor of lane.successors) {
      if (!byId.has(successor)) {
        issues.push(`lane "${lane.id}" links to unknown successor "${successor}"`);
      }
    }

    for (const side of ['left', 'right'] as const) {
      const neighbourId = lane[side];
      if (neighbourId === undefined) continue;
      const neighbour = byId.get(neighbourId);
      if (!neighbour) {
        issues.push(`lane "${lane.id}" has unknown ${side} neighbour "${neighbourId}"`);
      } else if (neighbour.junctionId !== undefined || lane.junctionId !== undefined) {
        issues.push(`lane "${lane.id}" cannot change ${side} inside a junction`);
      } else if (neighbourId === lane.id) {
        issues.push(`lane "${lane.id}" is its own ${side} neighbour`);
      }
    }
  }

  // Orphans: lanes nothing leads into or out of
  if (topology.lanes.length > 1) {
    const linked = new Set<string>();
    for (const lane of topology.lanes) {
      const references = [...lane.successors, lane.left, lane.right].filter((id): id is string => id !== undefined);
      if (references.length > 0) linked.add(lane.id);
      references.forEach((id) => linked.add(id));
    }
    for (const lane of topology.lanes) {
      if (!linked.has(lane.id)) {
        issues.push(`lane "${lane.id}" is not connected to any other lane`);
      }
    }
  }

  return issues;
}

/**
 * Validate raw JSON (e.g. a map file) into a RoadTopology
 */
export function parseTopology(json: unknown): RoadTopology {
  if (!isRecord(json) || !Array.isArray(json.lanes)) {
    throw new TopologyError(['expected an object with a "lanes" array']);
  }

  const issues: string[] = [];
  const lanes: LaneSegment[] = [];

  json.lanes.forEach((raw: unknown, i: number) => {
    const lane = parseLane(raw);
    if (typeof lane === 'string') {
      issues.push(`lanes[${i}]: ${lane}`);
    } else {
      lanes.push(lane);
    }
  });

  if (issues.length > 0) {
    throw new TopologyError(issues);
  }

  return {
    name: typeof json.name === 'string' ? json.name : undefined,
    lanes,
  };
}

function parseLane(raw: unknown): LaneSegment | string {
  if (!isRecord(raw)) return 'not an object';
  const { id, roadId, laneId, poly, maxSpeed, junctionId, successors, left, right } = raw;

  if (typeof id !== 'string' || id.length === 0) return 'missing string "id"';
  if (typeof roadId !== 'number' || !Number.isInteger(roadId)) return `lane "${id}" needs an integer "roadId"`;
  if (typeof laneId !== 'number' || !Number.isInteger(laneId)) return `lane "${id}" needs an integer "laneId"`;
  if (!Array.isArray(poly) || !poly.every(isVec2)) return `lane "${id}" needs "poly" as [x, y] pairs`;
  if (maxSpeed !== undefined && typeof maxSpeed !== 'number') return `lane "${id}" has a non-numeric "maxSpeed"`;
  if (junctionId !== undefined && typeof junctionId !== 'string') return `lane "${id}" has a non-string "junctionId"`;
  const successorIds = successors === undefined ? [] : successors;
  if (!isStringArray(successorIds)) return `lane "${id}" needs "successors" as lane ids`;
  if (left !== undefined && typeof left !== 'string') return `lane "${id}" has a non-string "left"`;
  if (right !== undefined && typeof right !== 'string') return `lane "${id}" has a non-string "right"`;

  return {
    id,
    roadId,
    laneId,
    poly: poly.map(([x, y]): Vec2 => [x, y]),
    maxSpeed,
    junctionId,
    successors: [...successorIds],
    left,
    right,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isVec2(value: unknown): value is Vec2 {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === 'number' && typeof value[1] === 'number';
}
