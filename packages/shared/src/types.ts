/** Planar world position in metres: x east, y north */
export type Vec2 = [number, number];

/**
 * Vehicle state fed to the local planner every tick
 */
export interface VehicleState {
  position: Vec2;
  speed: number;            // m/s, magnitude of velocity
}

/**
 * Actuation values produced by an external controller
 */
export interface VehicleControl {
  throttle: number;         // 0..1
  brake: number;            // 0..1
  steer: number;            // -1..1, negative = left
}

/**
 * Narrow sink the local planner forwards external control to.
 * The planner never computes actuation itself.
 */
export interface VehicleActuator {
  applyControl(control: VehicleControl): void;
}
