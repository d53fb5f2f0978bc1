// Lane graph model
export * from './types';
export { RoadGraph } from './RoadGraph';
export type { EdgeProjection, RoadGraphData } from './RoadGraph';
export { parseTopology, validateTopology } from './topology';

// Topology -> graph pipeline
export { RoadGraphBuilder } from './builder/graph-builder';
export type { RoadGraphBuilderOptions } from './builder/graph-builder';
export { LaneBuilder } from './builder/lane-builder';
export { IntersectionBuilder } from './builder/intersection-builder';
