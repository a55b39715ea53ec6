import { generateCirclePoints } from '../../src/generator/arc'
import type { Point } from '../../src/types/base'

// 50 evenly spaced points on the circle of radius 10 around the origin.
export function unitTestCircle(): Point[] {
  return generateCirclePoints({ x: 0, y: 0 }, 10, 50)
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y)
}
