import type { Vec2 } from './types';

export type PlanningErrorCode = 'INVALID_TOPOLOGY' | 'INVALID_LOCATION' | 'NO_PATH_FOUND';

/**
 * Base class for failures surfaced to callers of graph construction and route planning
 */
export abstract class PlanningError extends Error {
  abstract readonly code: PlanningErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raw topology could not be turned into a road graph
 */
export class TopologyError extends PlanningError {
  readonly code = 'INVALID_TOPOLOGY';

  constructor(readonly issues: string[]) {
    super(`Invalid road topology: ${issues.join('; ')}`);
  }
}

/**
 * Location cannot be projected onto any lane
 */
export class InvalidLocation extends PlanningError {
  readonly code = 'INVALID_LOCATION';

  constructor(readonly location: Vec2, reason: string) {
    super(`Cannot localize (${location[0]}, ${location[1]}): ${reason}`);
  }
}

/**
 * Search exhausted every reachable node without reaching the destination
 */
export class NoPathFound extends PlanningError {
  readonly code = 'NO_PATH_FOUND';

  constructor(readonly startNode: number, readonly endNode: number) {
    super(`No path from node ${startNode} to node ${endNode}`);
  }
}

export function isPlanningError(value: unknown): value is PlanningError {
  return value instanceof PlanningError;
}
