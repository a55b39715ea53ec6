export class InsufficientPointsError extends Error {
  constructor(
    public readonly required: number,
    public readonly actual: number,
    context: string
  ) {
    super(`${context} needs at least ${required} point(s), got ${actual}`)
    this.name = 'InsufficientPointsError'
  }
}

export class DegenerateSegmentError extends Error {
  constructor(public readonly segmentIndex: number) {
    super(`Segment ${segmentIndex} has coincident end points; its direction is undefined`)
    this.name = 'DegenerateSegmentError'
  }
}
