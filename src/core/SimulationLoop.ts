/**
 * Boucle temps réel à pas fixe, cadencée par une horloge murale.
 *
 * @module core/SimulationLoop
 */

import * as THREE from 'three';
import type { PhysicsConfig } from './SimulationConfig';
import { SimulationEventType } from './types/Events';
import type { Simulation } from './Simulation';

/**
 * Boucle de simulation avec accumulation du temps réel.
 *
 * Le temps réel est consommé par pas fixes de 1/fps ; la vitesse de
 * simulation n'agit que sur le dt transmis au contrôleur et à la plateforme.
 */
export class SimulationLoop {
    private readonly simulation: Simulation;
    private readonly physics: PhysicsConfig;

    private clock = new THREE.Clock(false);
    private timer?: ReturnType<typeof setInterval>;
    private accumulator = 0; // Temps réel accumulé non simulé
    private isPaused = false;

    constructor(simulation: Simulation) {
        this.simulation = simulation;
        this.physics = simulation.getConfig().physics;

        // L'accumulateur repart de zéro avec la simulation
        simulation.getEventBus().subscribe(SimulationEventType.SIMULATION_RESET, () => {
            this.accumulator = 0;
        });
    }

    /**
     * Démarre la boucle (sans effet si déjà démarrée).
     */
    start(): void {
        if (this.timer !== undefined) return;

        this.clock = new THREE.Clock();
        this.accumulator = 0;
        this.timer = setInterval(() => this.frame(), 1000 / this.physics.fps);

        this.simulation.getEventBus().emit(
            SimulationEventType.SIMULATION_START,
            { elapsedTime: this.simulation.getElapsedTime() },
            'loop'
        );
    }

    /**
     * Arrête la boucle et libère le timer.
     */
    stop(): void {
        if (this.timer === undefined) return;

        clearInterval(this.timer);
        this.timer = undefined;
        this.clock.stop();

        this.simulation.getEventBus().emit(
            SimulationEventType.SIMULATION_STOP,
            { elapsedTime: this.simulation.getElapsedTime() },
            'loop'
        );
    }

    pause(): void {
        if (this.isPaused) return;
        this.isPaused = true;
        this.simulation.getEventBus().emit(
            SimulationEventType.SIMULATION_PAUSE,
            { elapsedTime: this.simulation.getElapsedTime() },
            'loop'
        );
    }

    resume(): void {
        if (!this.isPaused) return;
        this.isPaused = false;
        this.simulation.getEventBus().emit(
            SimulationEventType.SIMULATION_RESUME,
            { elapsedTime: this.simulation.getElapsedTime() },
            'loop'
        );
    }

    isRunning(): boolean {
        return this.timer !== undefined;
    }

    getPaused(): boolean {
        return this.isPaused;
    }

    /**
     * Consomme un delta de temps réel par pas fixes.
     *
     * @param realDelta - Temps réel écoulé depuis la frame précédente (s)
     * @returns Nombre de pas simulés
     */
    advance(realDelta: number): number {
        if (this.isPaused) return 0;

        // Clamper pour éviter "spiral of death"
        const deltaTime = Math.min(Math.max(realDelta, 0), this.physics.maxFrameDelta);
        const fixedDt = 1 / this.physics.fps;

        this.accumulator += deltaTime;

        let substeps = 0;
        while (this.accumulator >= fixedDt && substeps < this.physics.maxSubsteps) {
            this.simulation.tick();
            this.accumulator -= fixedDt;
            substeps++;
        }

        // Trop de sous-pas nécessaires : on abandonne le retard accumulé
        if (substeps >= this.physics.maxSubsteps) {
            this.accumulator = 0;
        }

        return substeps;
    }

    private frame(): void {
        // En pause, getDelta() est tout de même appelé pour éviter un saut à la reprise
        const delta = this.clock.getDelta();
        this.advance(delta);
    }
}
