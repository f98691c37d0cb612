/**
 * Tests de la dynamique de la plateforme : zone morte, amortissement, vent, téléportation.
 */

import { describe, it, expect } from 'vitest'

import { Platform } from '../src/domain/platform/Platform'
import { InvalidParameterError } from '../src/core/errors'

const dt = 1 / 60

describe('Platform', () => {
  it('ne bouge pas sous une force inférieure à la zone morte depuis le repos', () => {
    const platform = new Platform(100, 0, 1)

    platform.applyForce(4)
    platform.update(dt)

    expect(platform.getVelocity()).toBe(0)
    expect(platform.getPosition()).toBe(100)
    expect(platform.getAcceleration()).toBe(0)
    expect(platform.getRegime()).toBe('deadband-stopped')
  })

  it('quitte la zone morte dès que la force atteint exactement le seuil', () => {
    const pushed = new Platform(100, 0, 1)
    pushed.applyForce(5)
    pushed.update(1)

    expect(pushed.getRegime()).toBe('free')
    expect(pushed.getVelocity()).toBe(5)
    expect(pushed.getPosition()).toBe(105)

    const pulled = new Platform(100, 0, 1)
    pulled.applyForce(-5)
    pulled.update(1)

    expect(pulled.getRegime()).toBe('free')
    expect(pulled.getVelocity()).toBe(-5)
    expect(pulled.getPosition()).toBe(95)
  })

  it('reste arrêtée sous une force négative inférieure au seuil', () => {
    const platform = new Platform(100, 0, 1)

    platform.applyForce(-4)
    platform.update(dt)

    expect(platform.getRegime()).toBe('deadband-stopped')
    expect(platform.getPosition()).toBe(100)
    expect(platform.getVelocity()).toBe(0)
  })

  it('accélère de façon monotone sous une force constante de 20', () => {
    const platform = new Platform(0, 0, 1)
    let previousVelocity = platform.getVelocity()
    let previousPosition = platform.getPosition()

    for (let i = 0; i < 120; i++) {
      platform.applyForce(20)
      platform.update(dt)

      expect(platform.getRegime()).toBe('free')
      expect(platform.getVelocity()).toBeGreaterThan(previousVelocity)
      expect(platform.getPosition()).toBeGreaterThan(previousPosition)
      // Vitesse terminale F / (c·m) = 200
      expect(platform.getVelocity()).toBeLessThan(200)

      previousVelocity = platform.getVelocity()
      previousPosition = platform.getPosition()
    }
  })

  it('calcule un pas libre exact', () => {
    const platform = new Platform(0, 0, 2)

    platform.applyForce(10)
    expect(platform.getAcceleration()).toBe(5)

    platform.update(1)

    expect(platform.getVelocity()).toBe(5)
    expect(platform.getPosition()).toBe(5)
    expect(platform.getAcceleration()).toBe(0)
  })

  it('freine fortement en zone morte tant que la vitesse dépasse le seuil', () => {
    const platform = new Platform(100, 0, 1)
    platform.applyForce(100)
    platform.update(1)
    expect(platform.getVelocity()).toBe(100)
    expect(platform.getPosition()).toBe(200)

    platform.update(0.1)

    expect(platform.getRegime()).toBe('deadband-braking')
    expect(platform.getVelocity()).toBeCloseTo(95, 9)
    expect(platform.getPosition()).toBeCloseTo(209.5, 9)
  })

  it('freine aussi une vitesse négative en zone morte', () => {
    const platform = new Platform(100, 0, 1)
    platform.applyForce(-100)
    platform.update(1)
    expect(platform.getVelocity()).toBe(-100)
    expect(platform.getPosition()).toBe(0)

    platform.update(0.1)

    expect(platform.getRegime()).toBe('deadband-braking')
    expect(platform.getVelocity()).toBeCloseTo(-95, 9)
    expect(platform.getPosition()).toBeCloseTo(-9.5, 9)
  })

  it("freine à la vitesse d'arrêt exacte puis s'immobilise en dessous", () => {
    const platform = new Platform(0, 0, 1)
    platform.applyForce(5)
    platform.update(0.1)
    expect(platform.getVelocity()).toBe(0.5)

    platform.update(0.1)
    expect(platform.getRegime()).toBe('deadband-braking')
    expect(platform.getVelocity()).toBeCloseTo(0.475, 12)

    const position = platform.getPosition()
    platform.update(0.1)
    expect(platform.getRegime()).toBe('deadband-stopped')
    expect(platform.getVelocity()).toBe(0)
    expect(platform.getPosition()).toBe(position)
  })

  it('applique le vent comme une force extérieure constante', () => {
    const platform = new Platform(50, 0, 2)
    platform.setWindForce(10)

    platform.update(1)

    expect(platform.getVelocity()).toBe(5)
    expect(platform.getPosition()).toBe(55)
  })

  it('reste immobile sous un vent plus faible que la zone morte', () => {
    const platform = new Platform(50, 0, 1)
    platform.setWindForce(4)

    for (let i = 0; i < 10; i++) platform.update(dt)

    expect(platform.getPosition()).toBe(50)
    expect(platform.getVelocity()).toBe(0)
  })

  it('téléporte la plateforme et annule vitesse et accélération', () => {
    const platform = new Platform(0, 0, 1)
    for (let i = 0; i < 30; i++) {
      platform.applyForce(50)
      platform.update(dt)
    }
    platform.applyForce(30)

    platform.setPosition(-42)

    expect(platform.getPosition()).toBe(-42)
    expect(platform.getVelocity()).toBe(0)
    expect(platform.getAcceleration()).toBe(0)
  })

  it('rejette une masse nulle, négative ou non finie', () => {
    const platform = new Platform(0, 0, 1)

    expect(() => platform.setMass(0)).toThrow(InvalidParameterError)
    expect(() => platform.setMass(-1)).toThrow(InvalidParameterError)
    expect(() => platform.setMass(Number.NaN)).toThrow(InvalidParameterError)
    expect(() => new Platform(0, 0, 0)).toThrow(InvalidParameterError)
    expect(platform.getMass()).toBe(1)
  })

  it('expose son état', () => {
    const platform = new Platform(12, 400, 3)
    platform.setWindForce(-2)

    expect(platform.getState()).toEqual({
      position: 12,
      velocity: 0,
      mass: 3,
      windForce: -2,
      regime: 'deadband-stopped',
    })
    expect(platform.y).toBe(400)
    expect(platform.width).toBe(100)
    expect(platform.height).toBe(20)
  })
})
