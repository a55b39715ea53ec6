import { GRID_STEPS } from '../constants'
import type { Point, PointSequence } from '../types/base'
import { type FitResult, Tactic } from '../types/fit'
import { averageRadius } from '../utils/geometry'
import { buildSegments, scoreSegments, validatePoints } from './scorer'

// Candidate centers in the square of half-width `scanRange` around `centerHint`, x-major.
// The far edge is excluded, so the hint itself is always a candidate.
export function enumerateCandidates(centerHint: Point, scanRange: number): Point[] {
  const step = scanRange / 2
  // Offsets run -scanRange, -scanRange / 2, 0, scanRange / 2.
  const offset = (i: number): number => (i - GRID_STEPS / 2) * step
  const candidates: Point[] = []
  for (let i = 0; i < GRID_STEPS; i++) {
    const x = centerHint.x + offset(i)
    for (let j = 0; j < GRID_STEPS; j++) {
      candidates.push({ x, y: centerHint.y + offset(j) })
    }
  }
  return candidates
}

/**
 * Best center within `scanRange` of `centerHint` at a single resolution.
 *
 * Ties keep the candidate enumerated first.
 */
export function fitAt(
  centerHint: Point,
  scanRange: number,
  points: PointSequence,
  tactic: Tactic
): FitResult {
  if (!(scanRange > 0)) {
    throw new RangeError(`Scan range must be positive, got ${scanRange}`)
  }
  validatePoints(points, tactic)
  const segments = buildSegments(points)

  const scored = enumerateCandidates(centerHint, scanRange).map(
    (center): FitResult => ({
      center,
      score: scoreSegments(
        tactic,
        center,
        points,
        segments,
        tactic === Tactic.Radius ? averageRadius(center, points) : undefined
      )
    })
  )

  return scored.reduce((best, candidate) => (candidate.score < best.score ? candidate : best))
}
