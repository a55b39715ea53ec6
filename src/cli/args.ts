import {
  DEFAULT_ARC_RATIO,
  DEFAULT_JITTER_RATIO,
  DEFAULT_NUM_POINTS
} from '../constants'
import { Tactic } from '../types/fit'

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ArgumentError'
  }
}

export type CliOptions = {
  numPoints: number
  arcRatio: number
  jitterRatio: number
  tactic: Tactic
  plotPath?: string
  seed?: number
}

export const USAGE = [
  'Usage: circle-fit [NUMBER_OF_POINTS_IN_CIRCLE] [RATIO_OF_POINTS_DISPLAYED] [RATIO_OF_JITTER] [RADIUS/ANGLE] [--plot=FILE] [--seed=N]',
  'Example: circle-fit 50 0.3 0.05 radius --plot=./fit.svg --seed=7'
].join('\n')

const TACTIC_NAMES = Object.values(Tactic).map((tactic) => tactic.toUpperCase())

function parseInteger(value: string): number | undefined {
  const trimmed = value.trim()
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : undefined
}

function parseRatio(value: string, position: number): number {
  const trimmed = value.trim()
  const ratio = trimmed === '' ? NaN : Number(trimmed)
  if (!(ratio > 0 && ratio <= 1)) {
    throw new ArgumentError(
      `Invalid parameter ${position}: ${trimmed}. Should be a number between 0 and 1.`
    )
  }
  return ratio
}

export function parseTactic(value: string): Tactic {
  const name = value.trim().toLowerCase()
  const tactic = Object.values(Tactic).find((candidate) => candidate === name)
  if (tactic === undefined) {
    throw new ArgumentError(
      `Invalid parameter: ${value.trim()}. Should be one of ${TACTIC_NAMES.join(', ')}.`
    )
  }
  return tactic
}

function parseFlag(flag: string, options: CliOptions): void {
  const [name, ...rest] = flag.slice(2).split('=')
  const value = rest.join('=')

  switch (name) {
    case 'plot':
      if (value === '') {
        throw new ArgumentError('--plot needs a file path, as in --plot=./fit.svg')
      }
      options.plotPath = value
      return
    case 'seed': {
      const seed = parseInteger(value)
      if (seed === undefined) {
        throw new ArgumentError(`Invalid seed: ${value}. Should be an integer.`)
      }
      options.seed = seed
      return
    }
    default:
      throw new ArgumentError(`Unknown option: ${flag}`)
  }
}

// Positional arguments in order, each optional, then any flags.
export function parseArguments(args: readonly string[]): CliOptions {
  const flags = args.filter((arg) => arg.startsWith('--'))
  const positional = args.filter((arg) => !arg.startsWith('--'))

  if (positional.length > 4) {
    throw new ArgumentError('Too many arguments.')
  }

  const options: CliOptions = {
    numPoints: DEFAULT_NUM_POINTS,
    arcRatio: DEFAULT_ARC_RATIO,
    jitterRatio: DEFAULT_JITTER_RATIO,
    tactic: Tactic.Radius
  }

  const [numPoints, arcRatio, jitterRatio, tactic] = positional
  if (numPoints !== undefined) {
    const parsed = parseInteger(numPoints)
    if (parsed === undefined || parsed < 1) {
      throw new ArgumentError(
        `Invalid parameter 1: ${numPoints.trim()}. Should be a positive integer.`
      )
    }
    options.numPoints = parsed
  }
  if (arcRatio !== undefined) {
    options.arcRatio = parseRatio(arcRatio, 2)
  }
  if (jitterRatio !== undefined) {
    options.jitterRatio = parseRatio(jitterRatio, 3)
  }
  if (tactic !== undefined) {
    options.tactic = parseTactic(tactic)
  }

  for (const flag of flags) {
    parseFlag(flag, options)
  }

  return options
}
