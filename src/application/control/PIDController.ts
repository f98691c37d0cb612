/**
 * Contrôleur PID avec anti-windup et désactivation sélective des termes.
 *
 * @module application/control/PIDController
 */

import * as THREE from 'three';
import { ALL_TERMS_ENABLED } from '../../core/types/SimulationState';
import type { EnabledMask, PIDResult, PIDState } from '../../core/types/SimulationState';

/**
 * Configuration PID.
 */
export interface PIDConfig {
    Kp: number; // Proportionnel
    Ki: number; // Intégral
    Kd: number; // Dérivé
    integralLimit?: number; // Anti-windup
    outputLimit?: number; // Limite sortie
}

function createZeroState(): PIDState {
    return { error: 0, integral: 0, derivative: 0, lastError: 0, output: 0 };
}

/**
 * Contrôleur PID générique.
 *
 * Aucune validation : les entrées numériques sont prises telles quelles,
 * la validation appartient au pilote de simulation.
 */
export class PIDController {
    kp: number;
    ki: number;
    kd: number;

    readonly integralLimit: number;
    readonly outputLimit: number;

    private state: PIDState = createZeroState();

    constructor(config: PIDConfig) {
        this.kp = config.Kp;
        this.ki = config.Ki;
        this.kd = config.Kd;
        this.integralLimit = config.integralLimit ?? 1000;
        this.outputLimit = config.outputLimit ?? 100;
    }

    /**
     * Calcule la commande PID.
     *
     * L'ordre des étapes compte pour l'anti-windup et la dérivée.
     *
     * @param setpoint - Consigne
     * @param currentValue - Mesure actuelle
     * @param dt - Pas de temps (s) ; dt = 0 donne une dérivée nulle
     * @param enabled - Termes actifs
     * @returns Décomposition complète de la commande
     */
    update(setpoint: number, currentValue: number, dt: number, enabled: EnabledMask = ALL_TERMS_ENABLED): PIDResult {
        const state = this.state;
        state.error = setpoint - currentValue;

        // Terme proportionnel
        const pTerm = enabled.p ? this.kp * state.error : 0;

        // Terme intégral avec anti-windup (gelé quand désactivé)
        let iTerm = 0;
        if (enabled.i) {
            state.integral = THREE.MathUtils.clamp(
                state.integral + state.error * dt,
                -this.integralLimit,
                this.integralLimit
            );
            iTerm = this.ki * state.integral;
        }

        // Terme dérivé
        let dTerm = 0;
        if (enabled.d && dt > 0) {
            state.derivative = (state.error - state.lastError) / dt;
            dTerm = this.kd * state.derivative;
        } else {
            state.derivative = 0;
        }

        state.output = THREE.MathUtils.clamp(pTerm + iTerm + dTerm, -this.outputLimit, this.outputLimit);

        // Toujours mémorisée, même si la dérivée est désactivée
        state.lastError = state.error;

        return {
            output: state.output,
            error: state.error,
            integral: state.integral,
            derivative: state.derivative,
            pTerm,
            iTerm,
            dTerm,
        };
    }

    /**
     * Réinitialise l'état (les gains sont conservés).
     */
    reset(): void {
        this.state = createZeroState();
    }

    setGains(kp: number, ki: number, kd: number): void {
        this.kp = kp;
        this.ki = ki;
        this.kd = kd;
    }

    /**
     * Composantes recalculées à partir de l'état et des gains actuels, sans masque.
     */
    getComponents(): [p: number, i: number, d: number] {
        return [
            this.kp * this.state.error,
            this.ki * this.state.integral,
            this.kd * this.state.derivative,
        ];
    }

    getState(): Readonly<PIDState> {
        return { ...this.state };
    }
}
