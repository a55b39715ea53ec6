import type { Point, PointSequence } from '../types/base'
import type { ArcOptions, RandomSource } from '../types/arc'

export class GeneratorError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GeneratorError'
  }
}

/**
 * Points evenly spaced by angle around a circle, walked anticlockwise from angle 0.
 *
 * Each coordinate is perturbed by a uniform offset in [-j, j), where j is
 * `jitterRatio` times the arc length between neighbouring points.
 */
export function generateCirclePoints(
  center: Point,
  radius: number,
  numPoints: number,
  jitterRatio = 0,
  random: RandomSource = Math.random
): Point[] {
  if (!Number.isInteger(numPoints) || numPoints < 1) {
    throw new GeneratorError(`Number of points must be a positive integer, got ${numPoints}`)
  }
  if (!(radius >= 0)) {
    throw new GeneratorError(`Radius must not be negative, got ${radius}`)
  }
  if (!(jitterRatio >= 0)) {
    throw new GeneratorError(`Jitter ratio must not be negative, got ${jitterRatio}`)
  }

  const jitterSize = (jitterRatio * 2 * Math.PI * radius) / numPoints
  const jitter = (): number =>
    jitterSize === 0 ? 0 : random() * 2 * jitterSize - jitterSize

  const points: Point[] = []
  for (let i = 0; i < numPoints; i++) {
    const angle = (2 * Math.PI * i) / numPoints
    points.push({
      x: center.x + radius * Math.cos(angle) + jitter(),
      y: center.y + radius * Math.sin(angle) + jitter()
    })
  }
  return points
}

// Leading `arcRatio` share of `points`, rounded down.
export function takeArc(points: PointSequence, arcRatio: number): Point[] {
  if (!(arcRatio > 0 && arcRatio <= 1)) {
    throw new GeneratorError(`Arc ratio must be in (0, 1], got ${arcRatio}`)
  }
  return points.slice(0, Math.floor(arcRatio * points.length))
}

// A center uniform in [-extent, extent) on both axes.
export function randomCenter(extent: number, random: RandomSource = Math.random): Point {
  return {
    x: random() * 2 * extent - extent,
    y: random() * 2 * extent - extent
  }
}

// Linear congruential generator; the same seed always yields the same sequence.
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.abs(Math.trunc(seed)) & 0x7fffffff
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff
    return state / 0x80000000
  }
}

// The leading `arcRatio` share of a jittered circle.
export function generateArc(options: ArcOptions, random: RandomSource = Math.random): Point[] {
  const circle = generateCirclePoints(
    options.center,
    options.radius,
    options.numPoints,
    options.jitterRatio,
    random
  )
  return takeArc(circle, options.arcRatio)
}
