export type Point = {
  readonly x: number
  readonly y: number
}

export type Vector = {
  readonly x: number
  readonly y: number
}

export type LineSegment = {
  start: Point
  end: Point
}

export type BoundingBox = {
  xMin: number
  xMax: number
  yMin: number
  yMax: number
}

export type Circle = {
  center: Point
  radius: number
}

// Consecutive points define the segments used for scoring, so order matters.
export type PointSequence = readonly Point[]
