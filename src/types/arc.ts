import type { Point } from './base'

// Source of uniform values in [0, 1).
export type RandomSource = () => number

export type ArcOptions = {
  center: Point
  radius: number
  numPoints: number
  arcRatio: number
  jitterRatio: number
}
