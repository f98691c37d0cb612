/**
 * Plateforme 1D : intégration de la force de commande, du vent, de
 * l'amortissement et de la zone morte (frottement statique).
 *
 * @module domain/platform/Platform
 */

import { requireFinite, requirePositive } from '../../core/errors';
import type { PlatformConfig } from '../../core/SimulationConfig';
import type { PlatformRegime, PlatformState } from '../../core/types/SimulationState';

export type PlatformPhysics = Pick<
    PlatformConfig,
    'dampingCoefficient' | 'deadbandThreshold' | 'stopVelocity' | 'brakingCoefficient'
>;

const DEFAULT_PHYSICS: PlatformPhysics = {
    dampingCoefficient: 0.1,
    deadbandThreshold: 5.0,
    stopVelocity: 0.5,
    brakingCoefficient: 0.5,
};

/**
 * Plateforme mobile sur l'axe horizontal.
 *
 * `acceleration` est un accumulateur par pas : posée par `applyForce`,
 * consommée (remise à 0) à la fin de chaque `update`.
 */
export class Platform {
    readonly y: number;
    readonly width: number;
    readonly height: number;

    private position: number;
    private mass: number;
    private velocity = 0;
    private acceleration = 0;
    private windForce = 0;
    private regime: PlatformRegime = 'deadband-stopped';

    private readonly physics: PlatformPhysics;

    constructor(
        x: number,
        y: number,
        mass = 1.0,
        physics?: Partial<PlatformPhysics>,
        size: { width: number; height: number } = { width: 100, height: 20 }
    ) {
        this.position = x;
        this.y = y;
        this.mass = requirePositive('mass', mass);
        this.physics = { ...DEFAULT_PHYSICS, ...physics };
        this.width = size.width;
        this.height = size.height;
    }

    /**
     * Applique une force horizontale pour le prochain pas.
     */
    applyForce(force: number): void {
        this.acceleration = force / this.mass;
    }

    /**
     * Avance l'état physique d'un pas de temps fixe.
     */
    update(dt: number): void {
        const { dampingCoefficient, deadbandThreshold, stopVelocity, brakingCoefficient } = this.physics;

        // Force de commande avant modifications
        const controlForce = this.acceleration * this.mass;
        const windAcceleration = this.windForce / this.mass;
        let dampingAcceleration = -dampingCoefficient * this.velocity;

        const totalForce = controlForce + this.windForce;

        if (Math.abs(totalForce) < deadbandThreshold) {
            if (Math.abs(this.velocity) < stopVelocity) {
                this.velocity = 0;
                this.acceleration = 0;
                this.regime = 'deadband-stopped';
                return;
            }
            dampingAcceleration = -brakingCoefficient * this.velocity;
            this.regime = 'deadband-braking';
        } else {
            this.regime = 'free';
        }

        const totalAcceleration = this.acceleration + windAcceleration + dampingAcceleration;
        this.velocity += totalAcceleration * dt;
        this.position += this.velocity * dt;

        this.acceleration = 0;
    }

    /**
     * Téléporte la plateforme (placement direct par l'utilisateur).
     */
    setPosition(x: number): void {
        this.position = x;
        this.velocity = 0;
        this.acceleration = 0;
    }

    getPosition(): number {
        return this.position;
    }

    getVelocity(): number {
        return this.velocity;
    }

    getAcceleration(): number {
        return this.acceleration;
    }

    getMass(): number {
        return this.mass;
    }

    /**
     * @throws InvalidParameterError si la masse n'est pas finie et > 0
     */
    setMass(mass: number): void {
        this.mass = requirePositive('mass', mass);
    }

    getWindForce(): number {
        return this.windForce;
    }

    setWindForce(force: number): void {
        this.windForce = requireFinite('wind', force);
    }

    getRegime(): PlatformRegime {
        return this.regime;
    }

    getState(): PlatformState {
        return {
            position: this.position,
            velocity: this.velocity,
            mass: this.mass,
            windForce: this.windForce,
            regime: this.regime,
        };
    }
}
