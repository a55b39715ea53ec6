import type { LineSegment, Point, PointSequence } from '../types/base'
import { Tactic } from '../types/fit'
import {
  averageRadius,
  computeMidpoint,
  computePointToPointDistance,
  segmentNormal
} from '../utils/geometry'
import { lineAngleDifference, vectorAngle, vectorBetween } from '../utils/vector'
import { DegenerateSegmentError, InsufficientPointsError } from './errors'

export function minimumPoints(tactic: Tactic): number {
  switch (tactic) {
    case Tactic.Angle:
      return 2
    case Tactic.Radius:
      return 1
  }
}

export function buildSegments(points: PointSequence): LineSegment[] {
  const segments: LineSegment[] = []
  for (let i = 0; i < points.length - 1; i++) {
    segments.push({ start: points[i], end: points[i + 1] })
  }
  return segments
}

// Throws if `points` cannot be scored with `tactic`.
export function validatePoints(points: PointSequence, tactic: Tactic): void {
  const required = minimumPoints(tactic)
  if (points.length < required) {
    throw new InsufficientPointsError(required, points.length, `Fitting with the ${tactic} tactic`)
  }

  // Only the angle tactic needs a direction for each segment.
  if (tactic === Tactic.Angle) {
    buildSegments(points).forEach((segment, i) => {
      if (segment.start.x === segment.end.x && segment.start.y === segment.end.y) {
        throw new DegenerateSegmentError(i)
      }
    })
  }
}

function scoreAngle(candidate: Point, segments: LineSegment[]): number {
  let total = 0
  segments.forEach((segment, i) => {
    const { midpoint, normalAngle } = segmentNormal(segment.start, segment.end, i)
    const angleToCenter = vectorAngle(vectorBetween(midpoint, candidate))
    total += lineAngleDifference(angleToCenter, normalAngle)
  })
  return total / segments.length
}

function scoreRadius(candidate: Point, segments: LineSegment[], avgRadius: number): number {
  let total = 0
  for (const segment of segments) {
    const midpoint = computeMidpoint(segment.start, segment.end)
    total += Math.abs(computePointToPointDistance(midpoint, candidate) - avgRadius)
  }
  return total / segments.length
}

// Residual over segments already built from `points`. Callers validate `points` first.
export function scoreSegments(
  tactic: Tactic,
  candidate: Point,
  points: PointSequence,
  segments: LineSegment[],
  avgRadius?: number
): number {
  if (segments.length === 0) {
    // A lone point fits every circle through it.
    return 0
  }

  switch (tactic) {
    case Tactic.Angle:
      return scoreAngle(candidate, segments)
    case Tactic.Radius:
      return scoreRadius(candidate, segments, avgRadius ?? averageRadius(candidate, points))
  }
}

/**
 * Residual of `candidate` as the center of the circle through `points`. Lower is
 * better; 0 is a perfect fit.
 *
 * @param avgRadius - Mean distance from `candidate` to `points`, used by the radius
 * tactic. Computed when omitted.
 */
export function score(
  tactic: Tactic,
  candidate: Point,
  points: PointSequence,
  avgRadius?: number
): number {
  validatePoints(points, tactic)
  return scoreSegments(tactic, candidate, points, buildSegments(points), avgRadius)
}
