import type { Circle, Point, PointSequence } from './base'

export type PlotScene = {
  points: PointSequence
  fitted: Circle
  reference?: Circle
}

export type PlotOptions = {
  // Pixel size of the rendered image.
  width?: number
  height?: number
  // Padding around the drawn geometry, as a fraction of its extent.
  margin?: number
}

export type PlotMarker = {
  center: Point
  color: string
}
