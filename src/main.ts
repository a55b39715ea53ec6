import { pathToFileURL } from 'node:url'
import { ArgumentError, parseArguments, USAGE, type CliOptions } from './cli/args'
import { exitCodeFor } from './cli/exit_codes'
import { DEFAULT_CIRCLE_RADIUS } from './constants'
import { fitCircle } from './fitting/fitter'
import { createSeededRandom, generateArc, randomCenter } from './generator/arc'
import type { RandomSource } from './types/arc'
import type { Circle, Point } from './types/base'
import type { FitIteration, FitReport } from './types/fit'
import { SvgPlotWriter } from './writer/base'

export type CircleFitRun = {
  generated: Circle
  points: Point[]
  report: FitReport
  plot?: string
}

export type CircleFitHooks = {
  // Called with the generated circle before fitting starts.
  onGenerated?: (generated: Circle) => void
  onIteration?: (iteration: FitIteration) => void
}

// Generate a jittered arc, fit a circle to it and optionally plot the result.
export async function runCircleFit(
  options: CliOptions,
  random: RandomSource = options.seed === undefined
    ? Math.random
    : createSeededRandom(options.seed),
  hooks: CircleFitHooks = {}
): Promise<CircleFitRun> {
  const generated: Circle = {
    center: randomCenter(DEFAULT_CIRCLE_RADIUS, random),
    radius: DEFAULT_CIRCLE_RADIUS
  }
  hooks.onGenerated?.(generated)

  const points = generateArc(
    {
      center: generated.center,
      radius: generated.radius,
      numPoints: options.numPoints,
      arcRatio: options.arcRatio,
      jitterRatio: options.jitterRatio
    },
    random
  )

  const report = fitCircle(points, options.tactic, { onIteration: hooks.onIteration })

  if (options.plotPath === undefined) {
    return { generated, points, report }
  }

  const writer = new SvgPlotWriter()
  const plot = await writer.formatAndWrite(
    { points, reference: generated, fitted: { center: report.center, radius: report.radius } },
    options.plotPath
  )
  return { generated, points, report, plot }
}

function formatPoint(point: Point): string {
  return `(${point.x}, ${point.y})`
}

async function main() {
  let options: CliOptions
  try {
    options = parseArguments(process.argv.slice(2))
  } catch (error) {
    console.error(error instanceof Error ? error.message : error)
    if (error instanceof ArgumentError) {
      console.log(USAGE)
    }
    process.exitCode = exitCodeFor(error)
    return
  }

  const usePoints = Math.floor(options.arcRatio * options.numPoints)
  console.log(`Using ${options.tactic.toUpperCase()} to determine best fit.`)
  console.log('Number of points in generated circle:', options.numPoints)
  console.log('Ratio of circle to use:', options.arcRatio, `ie: ${usePoints} points`)
  console.log('Ratio of distance between points to perturb coordinates by:', options.jitterRatio)
  console.log('Radius of generated circle:', DEFAULT_CIRCLE_RADIUS)

  try {
    const run = await runCircleFit(options, undefined, {
      onGenerated: (generated) => {
        console.log('Center of generated circle:', formatPoint(generated.center))
        console.log()
      },
      onIteration: (iteration) =>
        console.log(formatPoint(iteration.center), iteration.score, iteration.scanRange)
    })
    console.log('Calculated center:', formatPoint(run.report.center))
    console.log('Calculated radius:', run.report.radius)
    if (options.plotPath !== undefined) {
      console.log(`Plot written to ${options.plotPath}`)
    }
  } catch (error) {
    console.error('Fit failed:', error instanceof Error ? error.message : error)
    process.exitCode = exitCodeFor(error)
  }
}

// Run the main function if this file is executed directly.
const isMainModule =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href
if (isMainModule) {
  main().catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}
