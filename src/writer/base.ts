import { promises as fs } from 'node:fs'
import type { PlotOptions, PlotScene } from '../types/plot'
import { Formatter } from './formatter'

export class PlotWriteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PlotWriteError'
  }
}

// Renders a fitted circle against the points it was fitted to.
export class SvgPlotWriter {
  private formatter: Formatter

  constructor(options: PlotOptions = {}) {
    this.formatter = new Formatter(options)
  }

  public format(scene: PlotScene): string {
    try {
      return this.formatter.format(scene)
    } catch (error) {
      throw new PlotWriteError(
        `Failed to write plot: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
  }

  public async formatAndWrite(scene: PlotScene, outputPath: string): Promise<string> {
    const svg = this.format(scene)
    try {
      await fs.writeFile(outputPath, svg, 'utf8')
    } catch (error) {
      throw new PlotWriteError(
        `Failed to write plot to ${outputPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
    return svg
  }
}
