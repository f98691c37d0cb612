/**
 * Tests de l'historique de télémétrie : fenêtre, éviction, échelle des axes.
 */

import { describe, it, expect } from 'vitest'

import { TelemetryHistory } from '../src/application/telemetry/TelemetryHistory'
import { DEFAULT_CONFIG } from '../src/core/SimulationConfig'
import type { TelemetrySample } from '../src/core/types/SimulationState'

const sample = (elapsedTime: number, error = 0, output = 0, p = 0, i = 0, d = 0): TelemetrySample => ({
  elapsedTime,
  error,
  totalOutput: output,
  pComponent: p,
  iComponent: i,
  dComponent: d,
})

describe('TelemetryHistory', () => {
  it('conserve au plus maxPoints échantillons', () => {
    const history = new TelemetryHistory({ ...DEFAULT_CONFIG.telemetry, maxPoints: 3 })

    for (let t = 1; t <= 5; t++) history.push(sample(t, t * 10))

    expect(history.size()).toBe(3)
    expect(history.getSamples().map(s => s.error)).toEqual([30, 40, 50])
    expect(history.getSeries().time).toEqual([2, 3, 4])
  })

  it('exprime les temps relativement au premier échantillon', () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)

    history.push(sample(5))
    history.push(sample(6.5))

    expect(history.getSeries().time).toEqual([0, 1.5])
    expect(history.getCurrentTime()).toBe(1.5)
  })

  it('fait glisser la fenêtre visible au-delà de la durée affichée', () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)

    history.push(sample(0))
    history.push(sample(3))
    expect(history.getVisibleWindow()).toEqual({ start: 0, end: 10 })

    history.push(sample(12))
    expect(history.getVisibleWindow()).toEqual({ start: 2, end: 12 })
  })

  it('zoome et dézoome les deux axes', () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)

    history.zoomIn()
    expect(history.getErrorRange()).toEqual([-400, 400])
    expect(history.getOutputRange()).toEqual([-400, 400])

    history.zoomOut()
    history.zoomOut()
    expect(history.getErrorRange()).toEqual([-900, 900])
  })

  it('ajuste les axes sur les valeurs visibles', () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)
    history.push(sample(0, 500, 10, 10, 0, 0))
    history.push(sample(20, 50, 20, 80, -5, 3))
    history.push(sample(21, -100, 20, 15, -5, 3))

    history.autoScale()

    // Seuls les échantillons à t >= 11 sont visibles
    const [errorMin, errorMax] = history.getErrorRange()
    expect(errorMax).toBeCloseTo(110, 9)
    expect(errorMin).toBeCloseTo(-110, 9)
    expect(history.getOutputRange()[1]).toBeCloseTo(88, 9)
  })

  it('revient aux plages par défaut sans données', () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)
    history.zoomIn()

    history.autoScale()

    expect(history.getErrorRange()).toEqual([-600, 600])
    expect(history.getOutputRange()).toEqual([-600, 600])
  })

  it('vide les données et le temps', () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)
    history.push(sample(4))
    history.push(sample(8))

    history.clear()
    history.push(sample(9))

    expect(history.size()).toBe(1)
    expect(history.getCurrentTime()).toBe(0)
  })

  it("normalise l'erreur sur l'axe courant", () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)

    expect(history.normalizeError(0)).toBe(0.5)
    expect(history.normalizeError(600)).toBe(1)
    expect(history.normalizeError(-900)).toBe(0)
  })
})
