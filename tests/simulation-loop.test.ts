/**
 * Tests de la boucle temps réel à pas fixe.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'

import { Simulation } from '../src/core/Simulation'
import { SimulationLoop } from '../src/core/SimulationLoop'
import { createConfig } from '../src/core/SimulationConfig'
import { SimulationEventType } from '../src/core/types/Events'
import { Logger } from '../src/application/logging/Logger'

const createLoop = () => {
  const config = createConfig({ logging: { consoleOutput: false } })
  const simulation = new Simulation({ config, logger: new Logger({ consoleOutput: false }), initialPosition: 300 })
  return { simulation, loop: new SimulationLoop(simulation) }
}

describe('SimulationLoop', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('consomme le temps réel par pas fixes de 1/fps', () => {
    const { simulation, loop } = createLoop()

    expect(loop.advance(0.04)).toBe(2)
    // Le reliquat (~0.0067s) complète le pas suivant
    expect(loop.advance(0.012)).toBe(1)
    expect(simulation.getElapsedTime()).toBeCloseTo(3 * 2.2 / 60, 12)
  })

  it('plafonne les sous-pas et abandonne le retard', () => {
    const { loop } = createLoop()

    expect(loop.advance(0.5)).toBe(5)
    expect(loop.advance(0)).toBe(0)
  })

  it("n'avance pas en pause", () => {
    const { simulation, loop } = createLoop()
    const events: string[] = []
    simulation.getEventBus().subscribe(SimulationEventType.SIMULATION_PAUSE, () => events.push('pause'))
    simulation.getEventBus().subscribe(SimulationEventType.SIMULATION_RESUME, () => events.push('resume'))

    loop.pause()
    expect(loop.advance(0.05)).toBe(0)
    expect(simulation.getElapsedTime()).toBe(0)

    loop.resume()
    expect(loop.advance(1 / 60)).toBe(1)
    expect(events).toEqual(['pause', 'resume'])
  })

  it("vide l'accumulateur lors d'un reset", () => {
    const { simulation, loop } = createLoop()
    loop.advance(0.01)

    simulation.reset()

    expect(loop.advance(0.01)).toBe(0)
  })

  it('démarre et arrête le timer', () => {
    vi.useFakeTimers()
    const { simulation, loop } = createLoop()
    const events: string[] = []
    simulation.getEventBus().subscribe(SimulationEventType.SIMULATION_START, () => events.push('start'))
    simulation.getEventBus().subscribe(SimulationEventType.SIMULATION_STOP, () => events.push('stop'))

    loop.start()
    loop.start()
    expect(loop.isRunning()).toBe(true)
    expect(vi.getTimerCount()).toBe(1)

    loop.stop()
    expect(loop.isRunning()).toBe(false)
    expect(vi.getTimerCount()).toBe(0)
    expect(events).toEqual(['start', 'stop'])
  })
})
