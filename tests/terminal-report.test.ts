/**
 * Tests du rendu texte.
 */

import { describe, it, expect } from 'vitest'

import { renderErrorStrip, renderPlatformTrack, renderSummary } from '../src/infrastructure/rendering/TerminalReport'
import { TelemetryHistory } from '../src/application/telemetry/TelemetryHistory'
import { DEFAULT_CONFIG } from '../src/core/SimulationConfig'
import type { SimulationState } from '../src/core/types/SimulationState'

describe('TerminalReport', () => {
  it('dessine la plateforme et la consigne sur la piste', () => {
    expect(renderPlatformTrack(0, 1200, 1200, 5)).toBe('[#---|]')
    expect(renderPlatformTrack(600, 600, 1200, 11)).toBe('[-----#-----]')
    expect(renderPlatformTrack(-300, 600, 1200, 11)).toBe('[#----|-----]')
  })

  it("trace un bandeau d'erreur selon l'échelle courante", () => {
    const history = new TelemetryHistory(DEFAULT_CONFIG.telemetry)
    const errors = [0, 600, -600, 900]
    errors.forEach((error, index) => history.push({
      elapsedTime: index,
      error,
      totalOutput: 0,
      pComponent: 0,
      iComponent: 0,
      dComponent: 0,
    }))

    expect(renderErrorStrip(history, 3)).toBe('█ █')
    expect(renderErrorStrip(history, 10)).toBe('▄█ █')
  })

  it('résume le dernier état', () => {
    const state: SimulationState = {
      platform: { position: 598.5, velocity: 0, mass: 1, windForce: 0, regime: 'deadband-stopped' },
      controller: { output: 1.5, error: 1.5, integral: 0, derivative: 0, pTerm: 1.5, iTerm: 0, dTerm: 0 },
      sample: { elapsedTime: 20, error: 1.5, totalOutput: 1.5, pComponent: 1.5, iComponent: 0, dComponent: 0 },
      elapsedTime: 20,
      deltaTime: 1 / 60,
    }

    const lines = renderSummary(state, -300).split('\n')

    expect(lines[0]).toBe('Temps simulé     :   20.00 s')
    expect(lines[2]).toBe('Erreur finale    :    1.50 px')
    expect(lines[6]).toBe('Régime           : deadband-stopped')
  })
})
