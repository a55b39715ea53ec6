import { DegenerateSegmentError, InsufficientPointsError } from '../fitting/errors'
import { GeneratorError } from '../generator/arc'
import { PlotWriteError } from '../writer/base'
import { ArgumentError } from './args'

export enum ExitCode {
  Failure = 1,
  Usage = 2,
  InsufficientPoints = 3,
  DegenerateSegment = 4,
  Generator = 5,
  PlotWrite = 6
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ArgumentError) return ExitCode.Usage
  if (error instanceof InsufficientPointsError) return ExitCode.InsufficientPoints
  if (error instanceof DegenerateSegmentError) return ExitCode.DegenerateSegment
  if (error instanceof GeneratorError) return ExitCode.Generator
  if (error instanceof PlotWriteError) return ExitCode.PlotWrite
  return ExitCode.Failure
}
