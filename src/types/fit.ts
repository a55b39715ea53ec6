import type { Point } from './base'

// Residual scoring strategy.
export enum Tactic {
  // Compare each segment's normal with the direction from its midpoint to the candidate.
  Angle = 'angle',
  // Compare each segment midpoint's distance to the candidate with the average radius.
  Radius = 'radius'
}

export type FitResult = {
  center: Point
  score: number
}

// One pass of the multi-resolution search.
export type FitIteration = FitResult & {
  // Half-width of the square that was searched.
  scanRange: number
}

export type FitOptions = {
  minScanRange?: number
  minImprovement?: number
  maxIterations?: number
  onIteration?: (iteration: FitIteration) => void
}

export type FitReport = {
  center: Point
  radius: number
  score: number
  iterations: number
  history: FitIteration[]
}
