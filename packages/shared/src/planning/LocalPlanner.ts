import {
  DEFAULT_BASE_MIN_DISTANCE,
  DEFAULT_DISTANCE_RATIO,
  DEFAULT_FINAL_MIN_DISTANCE,
  DEFAULT_HORIZON_DISTANCE,
  DEFAULT_SAMPLE_SPACING,
  DEFAULT_TARGET_SPEED,
} from '../constants';
import { EventBus } from '../eventBus';
import { distance, offsetPoint } from '../geometry';
import { logger } from '../logger';
import type { Maneuver, PathPoint, Route } from '../road-network/types';
import type { Vec2, VehicleActuator, VehicleControl, VehicleState } from '../types';
import { pruneQueue, refillQueue, type QueueEntry } from './waypointQueue';

export interface LocalPlannerOptions {
  targetSpeed?: number;         // m/s
  laneOffset?: number;          // m, positive = right of the path
  sampleSpacing?: number;       // m between route points, sizes the default horizon
  horizonDistance?: number;     // m of route kept queued
  horizon?: number;             // queued entries; overrides horizonDistance / sampleSpacing
  baseMinDistance?: number;     // m consumed ahead of a moving vehicle
  distanceRatio?: number;       // extra m consumed per m/s of speed
  finalMinDistance?: number;    // m, destination reached within this distance
  followSpeedLimits?: boolean;  // clamp target speed to the lane limit
}

export type PlannerState = 'uninitialized' | 'active' | 'done';

/**
 * Navigation target handed to the external controller every tick
 */
export interface Target {
  point: PathPoint | null;
  position: Vec2 | null;        // head position shifted by the lane offset
  heading: number | null;
  maneuver: Maneuver | null;
  targetSpeed: number;          // m/s
  queueLength: number;
  remainingDistance: number;    // m to the end of the plan
  planLength: number;           // m, appended routes included
  done: boolean;
}

/**
 * Progress along the whole plan, appended routes included
 */
export interface RouteInfo {
  planLength: number;           // m
  travelled: number;            // m
  remainingDistance: number;    // m
  completion: number;           // 0..1
}

export interface PlannerEvents {
  'route:assigned': { points: number; length: number; appended: boolean };
  'route:empty': { appended: boolean };
  'waypoint:consumed': { entries: readonly QueueEntry[] };
  'target:stale': { refilled: number };
  'route:done': { lastSeq: number | null };
}

const log = logger.scope('LocalPlanner');

/**
 * Tracks progress along an assigned route and exposes the next target.
 * Pure tracker: actuation is computed elsewhere and only passed through.
 */
export class LocalPlanner {
  readonly events = new EventBus<PlannerEvents>();

  private targetSpeed: number;
  private laneOffset: number;
  private speedLimited: boolean;
  private readonly horizon: number;
  private readonly baseMinDistance: number;
  private readonly distanceRatio: number;
  private readonly finalMinDistance: number;

  private state: PlannerState = 'uninitialized';
  private queue: QueueEntry[] = [];
  private pending: QueueEntry[] = [];
  private cursor = 0;
  private anchor: QueueEntry | null = null;
  private nextSeq = 0;
  private progress = 0;
  private control: VehicleControl | null = null;

  constructor(options: LocalPlannerOptions = {}, private readonly actuator?: VehicleActuator) {
    this.targetSpeed = options.targetSpeed ?? DEFAULT_TARGET_SPEED;
    this.laneOffset = options.laneOffset ?? 0;
    this.speedLimited = options.followSpeedLimits ?? false;
    this.baseMinDistance = options.baseMinDistance ?? DEFAULT_BASE_MIN_DISTANCE;
    this.distanceRatio = options.distanceRatio ?? DEFAULT_DISTANCE_RATIO;
    this.finalMinDistance = options.finalMinDistance ?? DEFAULT_FINAL_MIN_DISTANCE;

    const sampleSpacing = options.sampleSpacing ?? DEFAULT_SAMPLE_SPACING;
    const horizonDistance = options.horizonDistance ?? DEFAULT_HORIZON_DISTANCE;
    if (!(sampleSpacing > 0)) {
      throw new RangeError(`Sample spacing must be positive, got ${sampleSpacing}`);
    }
    this.horizon = Math.max(1, Math.floor(options.horizon ?? Math.ceil(horizonDistance / sampleSpacing)));
  }

  /**
   * Assign a route. With `cleanQueue` the current plan is discarded, otherwise
   * the route is appended after everything not yet consumed.
   */
  setRoute(route: Route, cleanQueue = true): void {
    const appended = !cleanQueue && this.state !== 'uninitialized';

    if (!appended) {
      this.queue = [];
      this.pending = [];
      this.cursor = 0;
      this.anchor = null;
      this.progress = 0;
    } else {
      this.pending = this.pending.slice(this.cursor);
      this.cursor = 0;
    }

    if (route.points.length === 0) {
      log.warn(appended ? 'Ignoring empty route extension' : 'Assigned an empty route');
      this.events.emit('route:empty', { appended });
      if (!appended) this.state = 'active';
      this.updateState();
      return;
    }

    const tail = this.planTail();
    const first = route.points[0];
    const offset = tail ? tail.s + distance(tail.point.position, first.position) - first.s : -first.s;

    for (const point of route.points) {
      this.pending.push({ seq: this.nextSeq++, point, maneuver: point.maneuver, s: point.s + offset });
    }

    this.state = 'active';
    log.info(`Route ${appended ? 'appended' : 'assigned'}: ${route.points.length} points, ${route.length.toFixed(1)} m`);
    this.events.emit('route:assigned', { points: route.points.length, length: route.length, appended });
  }

  /**
   * Per-tick update: refill, prune, report. Never throws.
   */
  step(vehicle: VehicleState): Target {
    this.refill();

    while (this.queue.length > 0) {
      const result = pruneQueue(this.queue, this.anchor, vehicle, {
        baseMinDistance: this.baseMinDistance,
        distanceRatio: this.distanceRatio,
        finalMinDistance: this.finalMinDistance,
        planExhausted: this.cursor >= this.pending.length,
      });

      this.progress = result.progress;
      if (result.consumed.length > 0) {
        this.anchor = result.consumed[result.consumed.length - 1];
        this.queue = result.queue;
        this.events.emit('waypoint:consumed', { entries: result.consumed });
      }

      if (this.queue.length > 0 || this.cursor >= this.pending.length) break;

      // Vehicle is ahead of everything queued: refill from the route instead of
      // reporting a point already passed
      const refilled = this.refill();
      log.debug(`Vehicle ahead of the queue, refilled ${refilled} entries`);
      this.events.emit('target:stale', { refilled });
    }

    this.updateState();
    return this.report();
  }

  /**
   * Forward control computed by an external controller to the actuator
   */
  applyExternalControl(control: VehicleControl): VehicleControl {
    this.control = { ...control };
    this.actuator?.applyControl(this.control);
    return this.control;
  }

  get lastControl(): VehicleControl | null {
    return this.control;
  }

  /**
   * Distance travelled and left along the plan, measured at the last step
   */
  getRouteInfo(): RouteInfo {
    const planLength = this.planTail()?.s ?? 0;
    if (this.done()) {
      return { planLength, travelled: planLength, remainingDistance: 0, completion: 1 };
    }

    const travelled = Math.min(Math.max(this.progress, 0), planLength);
    return {
      planLength,
      travelled,
      remainingDistance: planLength - travelled,
      completion: planLength > 0 ? travelled / planLength : 0,
    };
  }

  /**
   * Whether the vehicle is within `threshold` metres of the end of the plan
   */
  isRouteCompleted(threshold = this.finalMinDistance): boolean {
    if (this.state === 'uninitialized') return false;
    return this.done() || this.getRouteInfo().remainingDistance <= threshold;
  }

  done(): boolean {
    return this.queue.length === 0 && this.cursor >= this.pending.length;
  }

  getState(): PlannerState {
    return this.state;
  }

  getHorizon(): number {
    return this.horizon;
  }

  /**
   * Snapshot of the queued entries, head first
   */
  getPlan(): readonly QueueEntry[] {
    return [...this.queue];
  }

  /**
   * Entry `steps` places after the head, or the queue tail when the queue is shorter
   */
  getIncomingWaypointAndManeuver(steps = 3): QueueEntry | null {
    if (this.queue.length === 0) return null;
    return this.queue[Math.min(Math.max(0, steps), this.queue.length - 1)];
  }

  setSpeed(speed: number): void {
    if (this.speedLimited) {
      log.warn('Target speed changed while following speed limits; lane limits still apply');
    }
    this.targetSpeed = speed;
  }

  followSpeedLimits(value = true): void {
    this.speedLimited = value;
  }

  setLaneOffset(offset: number): void {
    this.laneOffset = offset;
  }

  /**
   * Drop the route and queue, back to the uninitialized state
   */
  reset(): void {
    this.queue = [];
    this.pending = [];
    this.cursor = 0;
    this.anchor = null;
    this.progress = 0;
    this.control = null;
    this.state = 'uninitialized';
  }

  private planTail(): QueueEntry | null {
    return this.pending[this.pending.length - 1] ?? this.queue[this.queue.length - 1] ?? this.anchor;
  }

  private refill(): number {
    const before = this.queue.length;
    const result = refillQueue(this.queue, this.pending, this.cursor, this.horizon);
    this.queue = result.queue;
    this.cursor = result.cursor;
    return this.queue.length - before;
  }

  private updateState(): void {
    // Only a route assignment leaves the initial state
    if (this.state === 'uninitialized') return;

    if (this.done()) {
      if (this.state !== 'done') {
        this.state = 'done';
        log.info('Route completed');
        this.events.emit('route:done', { lastSeq: this.anchor?.seq ?? null });
      }
    } else {
      this.state = 'active';
    }
  }

  private report(): Target {
    const head = this.queue[0];
    const { remainingDistance, planLength } = this.getRouteInfo();
    if (!head) {
      return {
        point: null,
        position: null,
        heading: null,
        maneuver: null,
        targetSpeed: this.targetSpeed,
        queueLength: 0,
        remainingDistance,
        planLength,
        done: this.done(),
      };
    }

    const { point } = head;
    const targetSpeed = this.speedLimited && point.speedLimit !== undefined
      ? Math.min(this.targetSpeed, point.speedLimit)
      : this.targetSpeed;

    return {
      point,
      position: offsetPoint(point.position, point.heading, this.laneOffset),
      heading: point.heading,
      maneuver: head.maneuver,
      targetSpeed,
      queueLength: this.queue.length,
      remainingDistance,
      planLength,
      done: false,
    };
  }
}
