import {
  type GlobalRoutePlanner,
  LocalPlanner,
  maneuverSummary,
  type LocalPlannerOptions,
  type Vec2,
  type VehicleActuator,
  type VehicleControl,
  type VehicleState,
} from '@lanepath/shared';
import { commandFor } from './commands';
import type { RouteMessage, TargetMessage } from './messages';

/**
 * One vehicle's planning state on the server: its own local planner,
 * routed through the planner shared by every session on the map.
 */
export class PlannerSession {
  readonly planner: LocalPlanner;

  constructor(
    private readonly routes: GlobalRoutePlanner,
    options: LocalPlannerOptions = {},
    actuator?: VehicleActuator
  ) {
    this.planner = new LocalPlanner(options, actuator);
  }

  /**
   * Plan from `start` to `end` and hand the route to the local planner.
   * Planning errors propagate; the current plan is kept when planning fails.
   */
  requestRoute(start: Vec2, end: Vec2, append = false): RouteMessage {
    const route = this.routes.planRoute(start, end);
    this.planner.setRoute(route, !append);

    return {
      points: route.points.length,
      length: route.length,
      appended: append,
      maneuvers: maneuverSummary(route),
    };
  }

  tick(state: VehicleState): TargetMessage {
    const target = this.planner.step(state);

    return {
      position: target.position,
      heading: target.heading,
      maneuver: target.maneuver,
      command: commandFor(target.maneuver),
      targetSpeed: target.targetSpeed,
      queueLength: target.queueLength,
      remainingDistance: target.remainingDistance,
      planLength: target.planLength,
      done: target.done,
    };
  }

  applyControl(control: VehicleControl): VehicleControl {
    return this.planner.applyExternalControl(control);
  }

  dispose(): void {
    this.planner.events.clear();
    this.planner.reset();
  }
}
