/**
 * Historique borné des échantillons de télémétrie et état d'échelle des graphes.
 *
 * @module application/telemetry/TelemetryHistory
 */

import * as THREE from 'three';
import type { TelemetryConfig } from '../../core/SimulationConfig';
import type { TelemetrySample } from '../../core/types/SimulationState';

/**
 * Consommateur des échantillons émis par le pilote (un push par pas).
 */
export interface TelemetrySink {
    push(sample: TelemetrySample): void;
    clear(): void;
}

/**
 * Vue graphique : puits de télémétrie avec échelle réglable.
 */
export interface PlotView extends TelemetrySink {
    zoomIn(): void;
    zoomOut(): void;
    autoScale(): void;
}

/**
 * Séries prêtes à tracer (temps relatifs au premier échantillon).
 */
export interface TelemetrySeries {
    time: number[];
    error: number[];
    output: number[];
    p: number[];
    i: number[];
    d: number[];
}

const MIN_HALF_RANGE = 1;
const AUTO_SCALE_MARGIN = 1.1;

export class TelemetryHistory implements PlotView {
    private samples: TelemetrySample[] = [];
    private times: number[] = [];
    private startTime = 0;
    private currentTime = 0;

    private errorRange: number;
    private outputRange: number;

    private readonly config: TelemetryConfig;

    constructor(config: TelemetryConfig) {
        this.config = config;
        this.errorRange = config.errorRange;
        this.outputRange = config.outputRange;
    }

    push(sample: TelemetrySample): void {
        if (this.samples.length === 0) {
            this.startTime = sample.elapsedTime;
        }

        this.currentTime = sample.elapsedTime - this.startTime;
        this.samples.push(sample);
        this.times.push(this.currentTime);

        if (this.samples.length > this.config.maxPoints) {
            this.samples.shift();
            this.times.shift();
        }
    }

    clear(): void {
        this.samples = [];
        this.times = [];
        this.startTime = 0;
        this.currentTime = 0;
    }

    getSamples(): readonly TelemetrySample[] {
        return this.samples;
    }

    size(): number {
        return this.samples.length;
    }

    getCurrentTime(): number {
        return this.currentTime;
    }

    /**
     * Fenêtre temporelle visible (s, temps relatifs).
     */
    getVisibleWindow(): { start: number; end: number } {
        if (this.currentTime > this.config.timeWindow) {
            return { start: this.currentTime - this.config.timeWindow, end: this.currentTime };
        }
        return { start: 0, end: this.config.timeWindow };
    }

    getSeries(): TelemetrySeries {
        return {
            time: [...this.times],
            error: this.samples.map(s => s.error),
            output: this.samples.map(s => s.totalOutput),
            p: this.samples.map(s => s.pComponent),
            i: this.samples.map(s => s.iComponent),
            d: this.samples.map(s => s.dComponent),
        };
    }

    getErrorRange(): [min: number, max: number] {
        return [-this.errorRange, this.errorRange];
    }

    getOutputRange(): [min: number, max: number] {
        return [-this.outputRange, this.outputRange];
    }

    zoomIn(): void {
        this.errorRange = Math.max(MIN_HALF_RANGE, this.errorRange / this.config.zoomFactor);
        this.outputRange = Math.max(MIN_HALF_RANGE, this.outputRange / this.config.zoomFactor);
    }

    zoomOut(): void {
        this.errorRange *= this.config.zoomFactor;
        this.outputRange *= this.config.zoomFactor;
    }

    /**
     * Ajuste les deux axes sur la plus grande valeur absolue de la fenêtre visible.
     * Sans données visibles, revient aux plages par défaut.
     */
    autoScale(): void {
        const { start } = this.getVisibleWindow();
        let maxError = 0;
        let maxOutput = 0;
        let visible = 0;

        this.samples.forEach((sample, index) => {
            if (this.times[index] < start) return;
            visible++;
            maxError = Math.max(maxError, Math.abs(sample.error));
            maxOutput = Math.max(
                maxOutput,
                Math.abs(sample.totalOutput),
                Math.abs(sample.pComponent),
                Math.abs(sample.iComponent),
                Math.abs(sample.dComponent)
            );
        });

        if (visible === 0) {
            this.errorRange = this.config.errorRange;
            this.outputRange = this.config.outputRange;
            return;
        }

        this.errorRange = Math.max(MIN_HALF_RANGE, maxError * AUTO_SCALE_MARGIN);
        this.outputRange = Math.max(MIN_HALF_RANGE, maxOutput * AUTO_SCALE_MARGIN);
    }

    /**
     * Position normalisée (0-1) d'une valeur sur l'axe d'erreur, bornée.
     */
    normalizeError(value: number): number {
        return THREE.MathUtils.clamp((value + this.errorRange) / (2 * this.errorRange), 0, 1);
    }
}
