export { Tactic } from './types/fit'
export type { FitIteration, FitOptions, FitReport, FitResult } from './types/fit'
export type { BoundingBox, Circle, LineSegment, Point, PointSequence, Vector } from './types/base'
export type { ArcOptions, RandomSource } from './types/arc'
export type { PlotOptions, PlotScene } from './types/plot'
export { fit, fitCircle, initialScanRange, iterationLimit } from './fitting/fitter'
export { enumerateCandidates, fitAt } from './fitting/grid'
export {
  buildSegments,
  minimumPoints,
  score,
  scoreSegments,
  validatePoints
} from './fitting/scorer'
export { DegenerateSegmentError, InsufficientPointsError } from './fitting/errors'
export {
  averageRadius,
  calculateBoundingBox,
  calculateCentroid,
  segmentNormal,
  type SegmentNormal
} from './utils/geometry'
export {
  GeneratorError,
  createSeededRandom,
  generateArc,
  generateCirclePoints,
  randomCenter,
  takeArc
} from './generator/arc'
export { PlotWriteError, SvgPlotWriter } from './writer/base'
export { runCircleFit, type CircleFitHooks, type CircleFitRun } from './main'
