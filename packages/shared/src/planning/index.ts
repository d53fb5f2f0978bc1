export { GlobalRoutePlanner } from './GlobalRoutePlanner';
export type { GlobalRoutePlannerOptions, Localization } from './GlobalRoutePlanner';
export { LocalPlanner } from './LocalPlanner';
export type { LocalPlannerOptions, PlannerEvents, PlannerState, RouteInfo, Target } from './LocalPlanner';
export { expandPath, maneuverSummary } from './route';
export type { ManeuverRun } from './route';
export { alongPathProgress, consumptionDistance, pruneQueue, refillQueue } from './waypointQueue';
export type { PruneParams, PruneResult, QueueEntry, RefillResult } from './waypointQueue';
