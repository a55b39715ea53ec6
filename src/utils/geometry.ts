import { DegenerateSegmentError, InsufficientPointsError } from '../fitting/errors'
import type { BoundingBox, Point, PointSequence } from '../types/base'
import { isZeroVector, perpendicular, vectorAngle, vectorBetween } from './vector'

export interface SegmentNormal {
  midpoint: Point
  normalAngle: number // Angle of the perpendicular to the segment, radians in [-π, π]
}

export function computePointToPointDistance(point1: Point, point2: Point): number {
  return Math.sqrt((point1.x - point2.x) ** 2 + (point1.y - point2.y) ** 2)
}

export function computeMidpoint(point1: Point, point2: Point): Point {
  return {
    x: (point1.x + point2.x) / 2,
    y: (point1.y + point2.y) / 2
  }
}

/**
 * Midpoint of the segment from `start` to `end` and the angle of its normal.
 *
 * The normal is the segment direction rotated 90° anticlockwise, so for points walked
 * anticlockwise around a circle it points at the center.
 *
 * @param segmentIndex - Reported in the error when the segment has zero length.
 */
export function segmentNormal(start: Point, end: Point, segmentIndex = 0): SegmentNormal {
  const direction = vectorBetween(start, end)
  if (isZeroVector(direction)) {
    throw new DegenerateSegmentError(segmentIndex)
  }

  return {
    midpoint: computeMidpoint(start, end),
    normalAngle: vectorAngle(perpendicular(direction))
  }
}

export function calculateCentroid(points: PointSequence): Point {
  if (points.length === 0) {
    throw new InsufficientPointsError(1, 0, 'Centroid')
  }

  let sumX = 0
  let sumY = 0

  for (const point of points) {
    sumX += point.x
    sumY += point.y
  }

  return {
    x: sumX / points.length,
    y: sumY / points.length
  }
}

export function calculateBoundingBox(points: PointSequence): BoundingBox {
  if (points.length === 0) {
    throw new InsufficientPointsError(1, 0, 'Bounding box')
  }

  let xMin = Infinity
  let xMax = -Infinity
  let yMin = Infinity
  let yMax = -Infinity

  for (const point of points) {
    xMin = Math.min(xMin, point.x)
    xMax = Math.max(xMax, point.x)
    yMin = Math.min(yMin, point.y)
    yMax = Math.max(yMax, point.y)
  }

  return { xMin, xMax, yMin, yMax }
}

// Mean distance from `center` to every point.
export function averageRadius(center: Point, points: PointSequence): number {
  if (points.length === 0) {
    throw new InsufficientPointsError(1, 0, 'Average radius')
  }

  let totalDistance = 0
  for (const point of points) {
    totalDistance += computePointToPointDistance(center, point)
  }
  return totalDistance / points.length
}
