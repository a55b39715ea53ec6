import { describe, expect, it } from 'vitest'
import { DegenerateSegmentError, InsufficientPointsError } from '../../src/fitting/errors'
import { fit, fitCircle, initialScanRange, iterationLimit } from '../../src/fitting/fitter'
import {
  createSeededRandom,
  generateArc,
  generateCirclePoints,
  takeArc
} from '../../src/generator/arc'
import { Tactic, type FitIteration } from '../../src/types/fit'
import { distance, unitTestCircle } from './helpers'

const origin = { x: 0, y: 0 }

describe('Iteration limit', () => {
  it('should allow the halvings down to the minimum range plus two', () => {
    // 20 / 2^11 is the first halving at or below 0.01.
    expect(iterationLimit(20)).toBe(13)
  })

  it('should add the slack before applying the two-pass floor', () => {
    expect(iterationLimit(0.015)).toBe(3)
    expect(iterationLimit(0.008)).toBe(2)
    expect(iterationLimit(0.005)).toBe(2)
    expect(iterationLimit(0.001)).toBe(2)
  })

  it('should start from the larger side of the bounding box', () => {
    const points = [
      { x: 0, y: 0 },
      { x: 4, y: 1 },
      { x: 2, y: -2 }
    ]

    expect(initialScanRange(points)).toBe(4)
  })
})

describe('Full circle', () => {
  const circle = unitTestCircle()

  it('should find the center with the radius tactic', () => {
    expect(distance(fit(circle, Tactic.Radius), origin)).toBeLessThan(0.05)
  })

  it('should find the center with the angle tactic', () => {
    expect(distance(fit(circle, Tactic.Angle), origin)).toBeLessThan(0.05)
  })

  it('should stay within the iteration bound', () => {
    const bound = Math.ceil(Math.log2(initialScanRange(circle) / 0.01)) + 2

    for (const tactic of [Tactic.Angle, Tactic.Radius]) {
      expect(fitCircle(circle, tactic).iterations).toBeLessThanOrEqual(bound)
    }
  })

  it('should report the radius of the fitted circle', () => {
    const report = fitCircle(circle, Tactic.Angle)

    expect(report.radius).toBeCloseTo(10, 6)
    expect(report.score).toBeCloseTo(0, 9)
    expect(report.history).toHaveLength(report.iterations)
  })

  it('should find an offset center', () => {
    const offset = generateCirclePoints({ x: 3, y: -2 }, 5, 40)
    const center = fit(offset, Tactic.Angle)

    expect(center.x).toBeCloseTo(3, 6)
    expect(center.y).toBeCloseTo(-2, 6)
  })
})

describe('Small arcs', () => {
  it('should stay within the iteration bound when the range starts near the minimum', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const arc = generateArc(
        {
          center: { x: 0, y: 0 },
          radius: 0.0099,
          numPoints: 20,
          arcRatio: 0.5,
          jitterRatio: 0.05
        },
        createSeededRandom(seed)
      )
      const bound = Math.ceil(Math.log2(initialScanRange(arc) / 0.01)) + 2

      for (const tactic of [Tactic.Angle, Tactic.Radius]) {
        expect(fitCircle(arc, tactic).iterations).toBeLessThanOrEqual(bound)
      }
    }
  })
})

describe('Partial arc', () => {
  const arc = takeArc(unitTestCircle(), 0.3)

  it('should use the first 15 points', () => {
    expect(arc).toHaveLength(15)
  })

  it('should land near the center with the radius tactic', () => {
    expect(distance(fit(arc, Tactic.Radius), origin)).toBeLessThan(0.5)
  })

  it('should land near the center with the angle tactic', () => {
    expect(distance(fit(arc, Tactic.Angle), origin)).toBeLessThan(0.05)
  })

  it('should fit the same circle whichever way the arc is walked', () => {
    const forward = fit(arc, Tactic.Angle)
    const backward = fit([...arc].reverse(), Tactic.Angle)

    expect(backward.x).toBeCloseTo(forward.x, 6)
    expect(backward.y).toBeCloseTo(forward.y, 6)
  })
})

describe('Search trace', () => {
  const circle = unitTestCircle()

  it('should report every pass as it happens', () => {
    const seen: FitIteration[] = []
    const report = fitCircle(circle, Tactic.Radius, { onIteration: (pass) => seen.push(pass) })

    expect(seen).toEqual(report.history)
    expect(seen[0].scanRange).toBe(initialScanRange(circle))
    expect(seen[1].scanRange).toBe(seen[0].scanRange / 2)
  })

  it('should never get worse from one pass to the next', () => {
    const { history } = fitCircle(circle, Tactic.Radius)

    for (let i = 1; i < history.length; i++) {
      expect(history[i].score).toBeLessThanOrEqual(history[i - 1].score)
    }
  })

  it('should stop at the iteration cap', () => {
    expect(fitCircle(circle, Tactic.Angle, { maxIterations: 3 }).iterations).toBe(3)
  })

  it('should stop earlier with a coarser minimum range', () => {
    const fine = fitCircle(circle, Tactic.Angle)
    const coarse = fitCircle(circle, Tactic.Angle, { minScanRange: 1 })

    expect(coarse.iterations).toBeLessThan(fine.iterations)
  })

  it('should reject a cap below one pass', () => {
    expect(() => fitCircle(circle, Tactic.Angle, { maxIterations: 0 })).toThrow(RangeError)
  })
})

describe('Degenerate input', () => {
  it('should reject an empty sequence', () => {
    expect(() => fit([], Tactic.Radius)).toThrow(InsufficientPointsError)
    expect(() => fit([], Tactic.Angle)).toThrow(InsufficientPointsError)
  })

  it('should reject a single point with the angle tactic', () => {
    expect(() => fit([{ x: 1, y: 2 }], Tactic.Angle)).toThrow(InsufficientPointsError)
  })

  it('should return a single point unchanged with the radius tactic', () => {
    const report = fitCircle([{ x: 1, y: 2 }], Tactic.Radius)

    expect(report.center).toEqual({ x: 1, y: 2 })
    expect(report.iterations).toBe(0)
  })

  it('should reject repeated points with the angle tactic before searching', () => {
    const points = [
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 1, y: 1 }
    ]
    let passes = 0

    expect(() =>
      fitCircle(points, Tactic.Angle, { onIteration: () => (passes += 1) })
    ).toThrow(DegenerateSegmentError)
    expect(passes).toBe(0)
  })

  it('should stop at the cap when the score keeps moving', () => {
    const points = [
      { x: 10, y: 0 },
      { x: 0, y: 10 },
      { x: -10, y: 0 }
    ]

    expect(fitCircle(points, Tactic.Radius).iterations).toBeLessThanOrEqual(iterationLimit(20))
  })
})
