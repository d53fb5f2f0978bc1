import { projectOnSegment } from '../geometry';
import type { Maneuver, PathPoint } from '../road-network/types';
import type { VehicleState } from '../types';

/**
 * Queued path point. `seq` grows monotonically over the planner's lifetime,
 * `s` is the distance along the whole plan (routes appended later continue it).
 */
export interface QueueEntry {
  readonly seq: number;
  readonly point: PathPoint;
  readonly maneuver: Maneuver;
  readonly s: number;
}

export interface PruneParams {
  baseMinDistance: number;
  distanceRatio: number;
  finalMinDistance: number;     // m, reach radius of the final point
  planExhausted: boolean;     // nothing left to enqueue after this queue
}

export interface RefillResult {
  queue: QueueEntry[];
  cursor: number;
}

export interface PruneResult {
  queue: QueueEntry[];
  consumed: QueueEntry[];
  progress: number;           // along-path position of the vehicle
}

// Tolerance for a stationary vehicle sitting on a point
const PROGRESS_EPSILON = 1e-6;

/**
 * Move entries from the pending plan to the queue tail until the horizon is full
 */
export function refillQueue(
  queue: readonly QueueEntry[],
  pending: readonly QueueEntry[],
  cursor: number,
  horizon: number
): RefillResult {
  const room = Math.max(0, horizon - queue.length);
  const next = Math.min(pending.length, cursor + room);
  return {
    queue: [...queue, ...pending.slice(cursor, next)],
    cursor: next,
  };
}

/**
 * Distance a moving vehicle consumes ahead of itself; zero when stationary
 */
export function consumptionDistance(speed: number, baseMinDistance: number, distanceRatio: number): number {
  if (!(speed > 0)) return 0;
  return baseMinDistance + distanceRatio * speed;
}

/**
 * Along-path position of a vehicle, projected onto the nearest segment of `window`.
 * Projections may run before the first point or past the last one.
 */
export function alongPathProgress(window: readonly QueueEntry[], position: VehicleState['position']): number {
  if (window.length === 0) return -Infinity;

  if (window.length === 1) {
    const { point, s } = window[0];
    const [x, y] = point.position;
    return s + (position[0] - x) * Math.cos(point.heading) + (position[1] - y) * Math.sin(point.heading);
  }

  let best = 0;
  let bestDistance = Infinity;
  for (let k = 0; k < window.length - 1; k++) {
    const projection = projectOnSegment(position, window[k].point.position, window[k + 1].point.position);
    if (projection.distance < bestDistance) {
      bestDistance = projection.distance;
      best = k;
    }
  }

  const a = window[best];
  const b = window[best + 1];
  let t = projectOnSegment(position, a.point.position, b.point.position, false).t;
  if (best > 0) t = Math.max(t, 0);
  if (best < window.length - 2) t = Math.min(t, 1);

  return a.s + t * (b.s - a.s);
}

/**
 * Drop head entries the vehicle has passed.
 *
 * An entry is passed when its remaining distance ahead of the vehicle is
 * below the consumption distance (base + ratio * speed). A stationary vehicle
 * only passes entries behind it. The final point of the plan is passed within
 * `finalMinDistance` at any speed.
 * Scanning stops at the first entry kept, so order is never changed.
 */
export function pruneQueue(
  queue: readonly QueueEntry[],
  anchor: QueueEntry | null,
  vehicle: VehicleState,
  params: PruneParams
): PruneResult {
  const window = anchor ? [anchor, ...queue] : [...queue];
  const progress = alongPathProgress(window, vehicle.position);
  const lookahead = consumptionDistance(vehicle.speed, params.baseMinDistance, params.distanceRatio);

  let removed = 0;
  while (removed < queue.length) {
    const entry = queue[removed];
    const isFinal = params.planExhausted && removed === queue.length - 1;
    // The destination is reached within finalMinDistance, moving or not
    const threshold = isFinal ? params.finalMinDistance : lookahead > 0 ? lookahead : -PROGRESS_EPSILON;

    if (entry.s - progress < threshold) {
      removed++;
    } else {
      break;
    }
  }

  return {
    queue: queue.slice(removed),
    consumed: queue.slice(0, removed),
    progress,
  };
}
