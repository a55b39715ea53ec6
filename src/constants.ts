// The search stops refining once the scan range is at or below this size...
export const MIN_SCAN_RANGE = 0.01

// ...and the best score improved by no more than this between two passes.
export const MIN_SCORE_IMPROVEMENT = 1e-4

// Passes allowed beyond the halvings needed to reach MIN_SCAN_RANGE.
export const EXTRA_ITERATIONS = 2

// Candidates per axis in one grid pass. The grid steps by half the scan range and
// stops short of the far edge.
export const GRID_STEPS = 4

// Demo defaults.
export const DEFAULT_NUM_POINTS = 50
export const DEFAULT_ARC_RATIO = 0.3
export const DEFAULT_JITTER_RATIO = 0.05
export const DEFAULT_CIRCLE_RADIUS = 10

