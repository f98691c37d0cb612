/**
 * Pilote de simulation : couple le contrôleur PID et la plateforme à chaque pas.
 *
 * @module core/Simulation
 */

import { createConfig } from './SimulationConfig';
import type { SimulationConfig } from './SimulationConfig';
import { EventBus, SimulationEventType } from './types/Events';
import { InvalidParameterError, requireFinite, requirePositive } from './errors';
import type { ParamChange } from './types/ParamChange';
import type { SimulationParameters, SimulationState, TelemetrySample } from './types/SimulationState';

import { Platform } from '../domain/platform/Platform';
import { PIDController } from '../application/control/PIDController';
import { Logger } from '../application/logging/Logger';
import { TelemetryHistory } from '../application/telemetry/TelemetryHistory';
import type { PlotView } from '../application/telemetry/TelemetryHistory';

export interface SimulationOptions {
    config?: SimulationConfig;

    /** Paramètres initiaux (sinon valeurs initiales des contrôles) */
    parameters?: Partial<SimulationParameters>;

    /** Consigne (px) ; par défaut le centre du monde */
    setpoint?: number;

    /** Position de départ (px) ; par défaut la consigne */
    initialPosition?: number;

    telemetry?: PlotView;
    logger?: Logger;
    eventBus?: EventBus;
}

/**
 * Simulation en boucle fermée d'une plateforme 1D.
 *
 * Les modifications de paramètres sont appliquées de façon synchrone entre
 * deux pas, jamais pendant une intégration.
 */
export class Simulation {
    private readonly config: SimulationConfig;
    private readonly eventBus: EventBus;
    private readonly logger: Logger;
    private readonly telemetry: PlotView;

    private readonly pid: PIDController;
    private readonly platform: Platform;

    private params: SimulationParameters;
    private readonly setpoint: number;

    private elapsedTime = 0;
    private lastLogTime = 0;
    private saturated = false;
    private lastState?: SimulationState;

    constructor(options: SimulationOptions = {}) {
        this.config = options.config ?? createConfig();
        const { controls, controller, platform, world, logging } = this.config;

        this.eventBus = options.eventBus ?? new EventBus();
        this.logger = options.logger ?? new Logger({
            bufferSize: logging.bufferSize,
            consoleOutput: logging.consoleOutput,
            enabled: logging.enabled,
        });
        this.telemetry = options.telemetry ?? new TelemetryHistory(this.config.telemetry);

        this.params = {
            kp: controls.kp.initial,
            ki: controls.ki.initial,
            kd: controls.kd.initial,
            mass: controls.mass.initial,
            wind: controls.wind.initial,
            speed: controls.speed.initial,
            ...options.parameters,
            enabled: { p: true, i: true, d: true, ...options.parameters?.enabled },
        };
        this.validateParameters(this.params);

        this.setpoint = requireFinite('setpoint', options.setpoint ?? world.width / 2);

        this.pid = new PIDController({
            Kp: this.params.kp,
            Ki: this.params.ki,
            Kd: this.params.kd,
            integralLimit: controller.integralLimit,
            outputLimit: controller.outputLimit,
        });

        this.platform = new Platform(
            requireFinite('position', options.initialPosition ?? this.setpoint),
            world.height / 2,
            this.params.mass,
            platform,
            { width: platform.width, height: platform.height }
        );
        this.platform.setWindForce(this.params.wind);

        this.logger.info('Simulation initialisée', { setpoint: this.setpoint, parameters: this.params });
    }

    /**
     * Pas fixe de la boucle (1/fps), mis à l'échelle par la vitesse de simulation.
     */
    getTickDelta(): number {
        return (1 / this.config.physics.fps) * this.params.speed;
    }

    /**
     * Avance d'un pas de boucle.
     */
    tick(): SimulationState {
        return this.step(this.getTickDelta());
    }

    /**
     * Avance d'un pas de temps simulé.
     *
     * @param dt - Pas de temps (s), strictement positif
     * @throws InvalidParameterError si dt n'est pas fini et > 0
     */
    step(dt: number): SimulationState {
        requirePositive('dt', dt);

        const result = this.pid.update(this.setpoint, this.platform.getPosition(), dt, this.params.enabled);
        this.platform.applyForce(result.output);
        this.platform.update(dt);

        this.elapsedTime += dt;

        const sample: TelemetrySample = Object.freeze({
            elapsedTime: this.elapsedTime,
            error: result.error,
            totalOutput: result.output,
            pComponent: result.pTerm,
            iComponent: result.iTerm,
            dComponent: result.dTerm,
        });
        this.telemetry.push(sample);

        const state: SimulationState = {
            platform: this.platform.getState(),
            controller: result,
            sample,
            elapsedTime: this.elapsedTime,
            deltaTime: dt,
        };
        this.lastState = state;

        this.trackSaturation(state);

        this.lastLogTime += dt;
        if (this.lastLogTime >= this.config.logging.logInterval) {
            this.logState(state);
            this.lastLogTime = 0;
        }

        this.eventBus.emit(SimulationEventType.PHYSICS_UPDATE, state, 'simulation');
        return state;
    }

    /**
     * Avance jusqu'à atteindre une durée simulée (s).
     *
     * @returns Dernier état
     */
    runFor(duration: number): SimulationState | undefined {
        requireFinite('duration', duration);
        const target = this.elapsedTime + duration;
        // Le cumul flottant des dt peut rester juste sous la cible
        const tolerance = this.getTickDelta() * 1e-6;
        while (target - this.elapsedTime > tolerance) {
            this.tick();
        }
        return this.lastState;
    }

    /**
     * Applique une modification issue du panneau de contrôle.
     *
     * @throws InvalidParameterError - la modification est journalisée puis relancée
     */
    applyChange(change: ParamChange): void {
        try {
            this.dispatchChange(change);
        } catch (error) {
            if (error instanceof InvalidParameterError) {
                this.logger.warning(`Modification rejetée : ${error.message}`, change);
                this.eventBus.emit(SimulationEventType.PARAMETER_REJECTED, { change, reason: error.message }, 'simulation');
            }
            throw error;
        }
        this.eventBus.emit(SimulationEventType.PARAMETER_CHANGE, change, 'simulation');
    }

    private dispatchChange(change: ParamChange): void {
        switch (change.kind) {
            case 'kp':
            case 'ki':
            case 'kd':
                this.params[change.kind] = requireFinite(change.kind, change.value);
                this.pid.setGains(this.params.kp, this.params.ki, this.params.kd);
                this.logger.control(`Gains Kp=${this.params.kp} Ki=${this.params.ki} Kd=${this.params.kd}`);
                break;
            case 'mass':
                this.platform.setMass(change.value);
                this.params.mass = change.value;
                this.logger.control(`Masse ${change.value} kg`);
                break;
            case 'wind':
                this.platform.setWindForce(change.value);
                this.params.wind = change.value;
                this.logger.control(`Vent ${change.value} N`);
                break;
            case 'speed':
                this.params.speed = requirePositive('speed', change.value);
                this.logger.control(`Vitesse ×${change.value}`);
                break;
            case 'kpEnabled':
                this.params.enabled = { ...this.params.enabled, p: change.value };
                break;
            case 'kiEnabled':
                this.params.enabled = { ...this.params.enabled, i: change.value };
                break;
            case 'kdEnabled':
                this.params.enabled = { ...this.params.enabled, d: change.value };
                break;
            case 'resetGraphs':
                this.telemetry.clear();
                this.eventBus.emit(SimulationEventType.TELEMETRY_CLEAR, { elapsedTime: this.elapsedTime }, 'simulation');
                break;
            case 'resetSimulation':
                this.reset();
                break;
            case 'zoomIn':
                this.telemetry.zoomIn();
                break;
            case 'zoomOut':
                this.telemetry.zoomOut();
                break;
            case 'autoScale':
                this.telemetry.autoScale();
                break;
        }
    }

    /**
     * Placement direct de la plateforme (clic).
     */
    placePlatform(x: number): void {
        this.platform.setPosition(requireFinite('position', x));
        this.logger.control(`Plateforme placée en x=${x}`);
        this.eventBus.emit(SimulationEventType.PLATFORM_PLACED, { position: x }, 'simulation');
    }

    /**
     * Réinitialise la simulation : recentrage, état PID, télémétrie et temps.
     */
    reset(): void {
        this.platform.setPosition(this.setpoint);
        this.pid.reset();
        this.telemetry.clear();
        this.elapsedTime = 0;
        this.lastLogTime = 0;
        this.saturated = false;
        this.lastState = undefined;

        this.logger.info('🔄 Simulation réinitialisée');
        this.eventBus.emit(SimulationEventType.SIMULATION_RESET, { position: this.setpoint }, 'simulation');
    }

    getParameters(): Readonly<SimulationParameters> {
        return { ...this.params, enabled: { ...this.params.enabled } };
    }

    getElapsedTime(): number {
        return this.elapsedTime;
    }

    getSetpoint(): number {
        return this.setpoint;
    }

    getLastState(): SimulationState | undefined {
        return this.lastState;
    }

    getController(): PIDController {
        return this.pid;
    }

    getPlatform(): Platform {
        return this.platform;
    }

    getTelemetry(): PlotView {
        return this.telemetry;
    }

    getEventBus(): EventBus {
        return this.eventBus;
    }

    getLogger(): Logger {
        return this.logger;
    }

    getConfig(): SimulationConfig {
        return this.config;
    }

    private validateParameters(params: SimulationParameters): void {
        requireFinite('kp', params.kp);
        requireFinite('ki', params.ki);
        requireFinite('kd', params.kd);
        requirePositive('mass', params.mass);
        requireFinite('wind', params.wind);
        requirePositive('speed', params.speed);
    }

    /**
     * Journalise l'entrée et la sortie de saturation de la commande.
     */
    private trackSaturation(state: SimulationState): void {
        const atLimit = Math.abs(state.controller.output) >= this.pid.outputLimit;
        if (atLimit && !this.saturated) {
            this.logger.performance(`Commande saturée à ${state.controller.output.toFixed(1)} N`, { elapsedTime: state.elapsedTime });
        } else if (!atLimit && this.saturated) {
            this.logger.performance('Fin de saturation', { elapsedTime: state.elapsedTime });
        }
        this.saturated = atLimit;
    }

    private logState(state: SimulationState): void {
        const { position, velocity, regime } = state.platform;
        const { error, output } = state.controller;

        this.logger.info(
            `T+${state.elapsedTime.toFixed(1)}s | ` +
            `Pos: ${position.toFixed(1)} | ` +
            `V: ${velocity.toFixed(1)} px/s | ` +
            `Err: ${error.toFixed(1)} | ` +
            `Out: ${output.toFixed(1)} N`
        );

        this.logger.logSimulationSnapshot({
            time: state.elapsedTime,
            position,
            velocity,
            regime,
            error,
            output,
            components: {
                p: state.sample.pComponent,
                i: state.sample.iComponent,
                d: state.sample.dComponent,
            },
        });
    }
}
