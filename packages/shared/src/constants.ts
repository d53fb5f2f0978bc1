/** Simulation ticks per second the server steps planners at */
export const TICK_RATE = 20;

export const kmh = (mps: number) => mps * 3.6;
export const mps = (kmh: number) => kmh / 3.6;

// Road graph
export const DEFAULT_SAMPLING_RESOLUTION = 2.0;     // m between graph nodes
export const DEFAULT_STRAIGHT_THRESHOLD_DEG = 10;   // |deflection| below this = straight
export const DEFAULT_MERGE_TOLERANCE = 0.01;        // m, lane ends closer than this share a node

// Global route planner
export const DEFAULT_MAX_PROJECTION_DISTANCE = 50;  // m from the nearest lane

// Local planner
export const DEFAULT_TARGET_SPEED = mps(20);
export const DEFAULT_SAMPLE_SPACING = 2.0;          // m
export const DEFAULT_HORIZON_DISTANCE = 100;        // m of lookahead kept queued
export const DEFAULT_BASE_MIN_DISTANCE = 3.0;       // m
export const DEFAULT_DISTANCE_RATIO = 0.5;          // s, consumption distance per m/s
export const DEFAULT_FINAL_MIN_DISTANCE = 1.0;      // m, the destination counts as reached within this
