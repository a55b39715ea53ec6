import { EXTRA_ITERATIONS, MIN_SCAN_RANGE, MIN_SCORE_IMPROVEMENT } from '../constants'
import type { Point, PointSequence } from '../types/base'
import type { FitIteration, FitOptions, FitReport, FitResult, Tactic } from '../types/fit'
import { averageRadius, calculateBoundingBox, calculateCentroid } from '../utils/geometry'
import { fitAt } from './grid'
import { validatePoints } from './scorer'

// Passes needed to halve `scanRange` down to `minScanRange`, plus slack for the
// improvement check. Never fewer than two, since stopping needs two scores.
export function iterationLimit(scanRange: number, minScanRange = MIN_SCAN_RANGE): number {
  const halvings = Math.ceil(Math.log2(scanRange / minScanRange))
  return Math.max(2, halvings + EXTRA_ITERATIONS)
}

export function initialScanRange(points: PointSequence): number {
  const box = calculateBoundingBox(points)
  return Math.max(box.xMax - box.xMin, box.yMax - box.yMin)
}

/**
 * Estimate the center of the circle an ordered run of points was sampled from, with
 * the full search trace.
 *
 * Starts at the centroid and repeatedly searches a grid around the best center so
 * far, halving the grid each pass. Stops once the grid is small and the score has
 * stopped improving. This is a local search: a flat or tied residual can leave it in a
 * local minimum.
 */
export function fitCircle(
  points: PointSequence,
  tactic: Tactic,
  options: FitOptions = {}
): FitReport {
  const minScanRange = options.minScanRange ?? MIN_SCAN_RANGE
  const minImprovement = options.minImprovement ?? MIN_SCORE_IMPROVEMENT

  validatePoints(points, tactic)

  const centroid = calculateCentroid(points)
  let scanRange = initialScanRange(points)
  const history: FitIteration[] = []

  if (scanRange === 0) {
    // Every point is in the same place; there is nothing to search.
    return { center: centroid, radius: 0, score: 0, iterations: 0, history }
  }

  const maxIterations = options.maxIterations ?? iterationLimit(scanRange, minScanRange)
  if (maxIterations < 1) {
    throw new RangeError(`maxIterations must be at least 1, got ${maxIterations}`)
  }

  const search = (centerHint: Point): FitResult => {
    const result = fitAt(centerHint, scanRange, points, tactic)
    const iteration: FitIteration = { ...result, scanRange }
    history.push(iteration)
    options.onIteration?.(iteration)
    scanRange /= 2
    return result
  }

  let best = search(centroid)
  let lastScore: number | undefined

  while (
    history.length < maxIterations &&
    (lastScore === undefined || lastScore - best.score > minImprovement || scanRange > minScanRange)
  ) {
    lastScore = best.score
    best = search(best.center)
  }

  return {
    center: best.center,
    radius: averageRadius(best.center, points),
    score: best.score,
    iterations: history.length,
    history
  }
}

// Estimated circle center for `points`.
export function fit(points: PointSequence, tactic: Tactic, options: FitOptions = {}): Point {
  return fitCircle(points, tactic, options).center
}
