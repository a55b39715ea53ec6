import type { Point, Vector } from '../types/base'

export function vectorBetween(from: Point, to: Point): Vector {
  return { x: to.x - from.x, y: to.y - from.y }
}

// Rotated 90° anticlockwise.
export function perpendicular(vector: Vector): Vector {
  return { x: -vector.y, y: vector.x }
}

export function vectorAngle(vector: Vector): number {
  // Signed angle from the positive x axis, range [-π, π].
  return Math.atan2(vector.y, vector.x)
}

export function isZeroVector(vector: Vector): boolean {
  return vector.x === 0 && vector.y === 0
}

export function lineAngleDifference(angle1: number, angle2: number): number {
  // Angle between two undirected lines, range [0, π/2]. Directions that differ by π
  // describe the same line.
  const delta = angle1 - angle2
  const wrapped = Math.abs(Math.atan2(Math.sin(delta), Math.cos(delta)))
  return Math.min(wrapped, Math.PI - wrapped)
}
