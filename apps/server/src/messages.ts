import type { Maneuver, ManeuverRun, Vec2, VehicleControl, VehicleState } from '@lanepath/shared';
import type { RoadOption } from './commands';

// Client -> server

export interface RouteRequest {
  start: Vec2;
  end: Vec2;
  append: boolean;
}

// Server -> client

export interface RouteMessage {
  points: number;
  length: number;
  appended: boolean;
  maneuvers: ManeuverRun[];
}

export interface TargetMessage {
  position: Vec2 | null;
  heading: number | null;
  maneuver: Maneuver | null;
  command: RoadOption;
  targetSpeed: number;
  queueLength: number;
  remainingDistance: number;    // m
  planLength: number;           // m
  done: boolean;
}

export interface ErrorMessage {
  code: string;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function toVec2(value: unknown): Vec2 | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const [x, y]: unknown[] = value;
  return isFiniteNumber(x) && isFiniteNumber(y) ? [x, y] : null;
}

export function parseRouteRequest(message: unknown): RouteRequest | null {
  if (!isRecord(message)) return null;
  const start = toVec2(message.start);
  const end = toVec2(message.end);
  if (!start || !end) return null;
  if (message.append !== undefined && typeof message.append !== 'boolean') return null;
  return { start, end, append: message.append === true };
}

export function parseVehicleState(message: unknown): VehicleState | null {
  if (!isRecord(message)) return null;
  const position = toVec2(message.position);
  if (!position || !isFiniteNumber(message.speed)) return null;
  return { position, speed: message.speed };
}

export function parseVehicleControl(message: unknown): VehicleControl | null {
  if (!isRecord(message)) return null;
  const { throttle, brake, steer } = message;
  if (!isFiniteNumber(throttle) || !isFiniteNumber(brake) || !isFiniteNumber(steer)) return null;
  return { throttle, brake, steer };
}
