/**
 * Types pour représenter l'état de la simulation (plateforme, contrôleur, télémétrie).
 *
 * @module core/types/SimulationState
 */

/**
 * Masque d'activation des termes du PID.
 */
export interface EnabledMask {
    p: boolean;
    i: boolean;
    d: boolean;
}

/**
 * Masque par défaut : tous les termes actifs.
 */
export const ALL_TERMS_ENABLED: Readonly<EnabledMask> = Object.freeze({ p: true, i: true, d: true });

/**
 * État interne du contrôleur PID.
 */
export interface PIDState {
    /** Erreur courante (setpoint - mesure) */
    error: number;

    /** Intégrale de l'erreur (erreur·s), bornée par l'anti-windup */
    integral: number;

    /** Dérivée de l'erreur (1/s) */
    derivative: number;

    /** Erreur du pas précédent */
    lastError: number;

    /** Dernière commande calculée (N) */
    output: number;
}

/**
 * Résultat complet d'une mise à jour PID (décomposition par terme).
 */
export interface PIDResult {
    /** Commande totale bornée (N) */
    output: number;
    error: number;
    integral: number;
    derivative: number;
    /** Termes après application du masque, avant saturation */
    pTerm: number;
    iTerm: number;
    dTerm: number;
}

/**
 * Régime dynamique de la plateforme lors du dernier pas.
 */
export type PlatformRegime = 'free' | 'deadband-braking' | 'deadband-stopped';

/**
 * État physique de la plateforme à un instant t.
 */
export interface PlatformState {
    /** Position horizontale (px) */
    position: number;

    /** Vitesse (px/s) */
    velocity: number;

    /** Masse (kg) */
    mass: number;

    /** Force du vent (N) */
    windForce: number;

    regime: PlatformRegime;
}

/**
 * Échantillon de télémétrie émis une fois par pas de simulation.
 */
export interface TelemetrySample {
    /** Temps de simulation écoulé (s) */
    elapsedTime: number;
    error: number;
    totalOutput: number;
    pComponent: number;
    iComponent: number;
    dComponent: number;
}

/**
 * Paramètres modifiables de la simulation, appliqués entre deux pas.
 */
export interface SimulationParameters {
    kp: number;
    ki: number;
    kd: number;

    /** Masse de la plateforme (kg, > 0) */
    mass: number;

    /** Force du vent (N, signée) */
    wind: number;

    /** Multiplicateur de vitesse de simulation (> 0) */
    speed: number;

    enabled: EnabledMask;
}

/**
 * État complet retourné par un pas de simulation.
 */
export interface SimulationState {
    platform: PlatformState;
    controller: PIDResult;
    sample: TelemetrySample;

    /** Temps écoulé depuis le dernier reset (s) */
    elapsedTime: number;

    /** Pas de temps effectif (s, vitesse incluse) */
    deltaTime: number;
}
