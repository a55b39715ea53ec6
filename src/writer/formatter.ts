import { XMLBuilder } from 'fast-xml-parser'
import type { BoundingBox, Circle, PointSequence } from '../types/base'
import type { PlotMarker, PlotOptions, PlotScene } from '../types/plot'
import { calculateBoundingBox } from '../utils/geometry'

export class FormatterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatterError'
  }
}

// SVG's y axis points down; the plot reads with y up.
const INVERT_Y = true

const DEFAULT_OPTIONS: Required<PlotOptions> = {
  width: 800,
  height: 800,
  margin: 0.05
}

// Marker radius as a fraction of the plotted extent.
const MARKER_SCALE = 0.01

type SvgAttributes = Record<string, string | number>

export class Formatter {
  private builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true
  })

  private options: Required<PlotOptions>

  constructor(options: PlotOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
  }

  private formatNumber(value: number): number {
    return Number(value.toFixed(3))
  }

  private formatY(value: number): number {
    return this.formatNumber(INVERT_Y ? -value : value)
  }

  private formatPoints(points: PointSequence): string {
    return points.map((point) => `${this.formatNumber(point.x)},${this.formatY(point.y)}`).join(' ')
  }

  private circleBounds(circle: Circle): BoundingBox {
    return {
      xMin: circle.center.x - circle.radius,
      xMax: circle.center.x + circle.radius,
      yMin: circle.center.y - circle.radius,
      yMax: circle.center.y + circle.radius
    }
  }

  private sceneBounds(scene: PlotScene): BoundingBox {
    const boxes = [this.circleBounds(scene.fitted)]
    if (scene.points.length > 0) {
      boxes.push(calculateBoundingBox(scene.points))
    }
    if (scene.reference) {
      boxes.push(this.circleBounds(scene.reference))
    }

    return {
      xMin: Math.min(...boxes.map((box) => box.xMin)),
      xMax: Math.max(...boxes.map((box) => box.xMax)),
      yMin: Math.min(...boxes.map((box) => box.yMin)),
      yMax: Math.max(...boxes.map((box) => box.yMax))
    }
  }

  private circle(id: string, circle: Circle, attributes: SvgAttributes): SvgAttributes {
    return {
      '@_id': id,
      '@_cx': this.formatNumber(circle.center.x),
      '@_cy': this.formatY(circle.center.y),
      '@_r': this.formatNumber(circle.radius),
      ...attributes
    }
  }

  private marker(id: string, marker: PlotMarker, radius: number): SvgAttributes {
    return this.circle(id, { center: marker.center, radius }, { '@_fill': marker.color })
  }

  private stroke(color: string, width: number): SvgAttributes {
    return {
      '@_fill': 'none',
      '@_stroke': color,
      '@_stroke-width': width,
      '@_vector-effect': 'non-scaling-stroke'
    }
  }

  private validate(scene: PlotScene): void {
    const circles = scene.reference ? [scene.fitted, scene.reference] : [scene.fitted]
    for (const circle of circles) {
      const values = [circle.center.x, circle.center.y, circle.radius]
      if (!values.every(Number.isFinite) || circle.radius < 0) {
        throw new FormatterError('Circles must have a finite center and non-negative radius')
      }
    }
  }

  public format(scene: PlotScene): string {
    this.validate(scene)

    const bounds = this.sceneBounds(scene)
    const extent = Math.max(bounds.xMax - bounds.xMin, bounds.yMax - bounds.yMin) || 1
    const pad = extent * this.options.margin
    const top = INVERT_Y ? -bounds.yMax : bounds.yMin
    const viewBox = [
      bounds.xMin - pad,
      top - pad,
      bounds.xMax - bounds.xMin + 2 * pad,
      bounds.yMax - bounds.yMin + 2 * pad
    ].map((value) => this.formatNumber(value))

    const markerRadius = extent * MARKER_SCALE
    const circles: SvgAttributes[] = []
    if (scene.reference) {
      circles.push(
        this.circle('reference-circle', scene.reference, {
          ...this.stroke('gray', 1),
          '@_stroke-dasharray': '4 4'
        }),
        this.marker(
          'reference-center',
          { center: scene.reference.center, color: 'black' },
          markerRadius
        )
      )
    }
    circles.push(
      this.circle('fitted-circle', scene.fitted, this.stroke('red', 1)),
      this.marker('fitted-center', { center: scene.fitted.center, color: 'red' }, markerRadius)
    )

    const svg = {
      svg: {
        '@_xmlns': 'http://www.w3.org/2000/svg',
        '@_width': this.options.width,
        '@_height': this.options.height,
        '@_viewBox': viewBox.join(' '),
        polyline: {
          '@_id': 'points',
          '@_points': this.formatPoints(scene.points),
          ...this.stroke('black', 2)
        },
        circle: circles
      }
    }

    const xml: string = this.builder.build(svg)
    return xml
  }
}
