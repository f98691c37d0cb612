/**
 * Configuration centralisée de la simulation.
 *
 * Unités : les positions sont en pixels du monde (la plateforme se déplace sur
 * l'axe horizontal), les forces en unités de force arbitraires (N), le temps en s.
 *
 * @module core/SimulationConfig
 */

/**
 * Configuration complète de la simulation.
 */
export interface SimulationConfig {
    /** Dimensions du monde */
    world: WorldConfig;

    /** Configuration physique */
    physics: PhysicsConfig;

    /** Configuration de la plateforme */
    platform: PlatformConfig;

    /** Configuration du contrôleur */
    controller: ControllerConfig;

    /** Plages et valeurs initiales du panneau de contrôle */
    controls: ControlsConfig;

    /** Historique de télémétrie */
    telemetry: TelemetryConfig;

    /** Configuration des logs */
    logging: LoggingConfig;
}

export interface WorldConfig {
    width: number; // px
    height: number; // px
}

export interface PhysicsConfig {
    fps: number; // Hz - cadence de la boucle fixe
    maxSubsteps: number; // Limite de sous-pas par frame (spiral of death)
    maxFrameDelta: number; // s - delta réel maximal accepté par frame
}

export interface PlatformConfig {
    width: number; // px (affichage)
    height: number; // px (affichage)
    dampingCoefficient: number; // 1/s
    deadbandThreshold: number; // N - zone morte (frottement statique)
    stopVelocity: number; // px/s - sous ce seuil, arrêt complet en zone morte
    brakingCoefficient: number; // 1/s - amortissement fort en zone morte
}

/**
 * Limites du contrôleur. Les gains et la masse de départ viennent des
 * valeurs initiales des contrôles (`controls`).
 */
export interface ControllerConfig {
    integralLimit: number; // Anti-windup
    outputLimit: number; // N
}

export interface SliderRange {
    min: number;
    max: number;
    initial: number;
}

export interface ControlsConfig {
    kp: SliderRange;
    ki: SliderRange;
    kd: SliderRange;
    mass: SliderRange;
    wind: SliderRange;
    speed: SliderRange;
}

export interface TelemetryConfig {
    maxPoints: number;
    timeWindow: number; // s
    errorRange: number; // ± px
    outputRange: number; // ± N
    zoomFactor: number;
}

export interface LoggingConfig {
    enabled: boolean;
    bufferSize: number;
    consoleOutput: boolean;
    logInterval: number; // s de simulation
}

/**
 * Configuration par défaut.
 */
export const DEFAULT_CONFIG: SimulationConfig = {
    world: {
        width: 1200,
        height: 800,
    },
    physics: {
        fps: 60,
        maxSubsteps: 5,
        maxFrameDelta: 0.1, // 100ms = 10 FPS minimum
    },
    platform: {
        width: 100,
        height: 20,
        dampingCoefficient: 0.1,
        deadbandThreshold: 5.0,
        stopVelocity: 0.5,
        brakingCoefficient: 0.5,
    },
    controller: {
        integralLimit: 1000,
        outputLimit: 100,
    },
    controls: {
        kp: { min: 0, max: 10, initial: 3.345 },
        ki: { min: 0, max: 3, initial: 0.014 },
        kd: { min: 0, max: 5, initial: 3.486 },
        mass: { min: 0.1, max: 10, initial: 1.0 },
        wind: { min: -150, max: 150, initial: 0 },
        speed: { min: 0.5, max: 5, initial: 2.2 },
    },
    telemetry: {
        maxPoints: 300,
        timeWindow: 10,
        errorRange: 600,
        outputRange: 600,
        zoomFactor: 1.5,
    },
    logging: {
        enabled: true,
        bufferSize: 32,
        consoleOutput: true,
        logInterval: 1.0,
    },
};

/**
 * Fusionne une configuration partielle (par section) avec les valeurs par défaut.
 */
export function createConfig(overrides?: { [K in keyof SimulationConfig]?: Partial<SimulationConfig[K]> }): SimulationConfig {
    return {
        world: { ...DEFAULT_CONFIG.world, ...overrides?.world },
        physics: { ...DEFAULT_CONFIG.physics, ...overrides?.physics },
        platform: { ...DEFAULT_CONFIG.platform, ...overrides?.platform },
        controller: { ...DEFAULT_CONFIG.controller, ...overrides?.controller },
        controls: { ...DEFAULT_CONFIG.controls, ...overrides?.controls },
        telemetry: { ...DEFAULT_CONFIG.telemetry, ...overrides?.telemetry },
        logging: { ...DEFAULT_CONFIG.logging, ...overrides?.logging },
    };
}
