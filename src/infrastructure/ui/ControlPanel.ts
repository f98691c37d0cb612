/**
 * Modèle du panneau de contrôle : curseurs, cases à cocher et boutons.
 *
 * Le rendu est laissé à l'hôte ; ce module ne produit que des
 * `ParamChange` validés.
 *
 * @module infrastructure/ui/ControlPanel
 */

import * as THREE from 'three';
import { requireFinite } from '../../core/errors';
import type { ControlsConfig, SliderRange } from '../../core/SimulationConfig';
import type { NumericParameter, ParamChange, ToggleParameter, TriggerAction } from '../../core/types/ParamChange';
import type { SimulationParameters } from '../../core/types/SimulationState';

export type ChangeListener = (change: ParamChange) => void;

/**
 * Curseur borné.
 */
export class Slider {
    readonly label: string;
    readonly min: number;
    readonly max: number;
    private value: number;

    constructor(label: string, range: SliderRange) {
        this.label = label;
        this.min = range.min;
        this.max = range.max;
        this.value = THREE.MathUtils.clamp(range.initial, range.min, range.max);
    }

    getValue(): number {
        return this.value;
    }

    /**
     * @returns true si la valeur a changé
     */
    setValue(value: number): boolean {
        const next = THREE.MathUtils.clamp(requireFinite(this.label, value), this.min, this.max);
        if (next === this.value) return false;
        this.value = next;
        return true;
    }

    /**
     * Positionne le curseur par ratio de course (0 = min, 1 = max).
     */
    setRatio(ratio: number): boolean {
        const r = THREE.MathUtils.clamp(requireFinite(this.label, ratio), 0, 1);
        return this.setValue(this.min + r * (this.max - this.min));
    }

    getRatio(): number {
        return (this.value - this.min) / (this.max - this.min);
    }

    format(): string {
        return `${this.label}: ${this.value.toFixed(3)}`;
    }
}

const SLIDER_LABELS: Record<NumericParameter, string> = {
    kp: 'Kp (Proportional)',
    ki: 'Ki (Integral)',
    kd: 'Kd (Derivative)',
    mass: 'Mass',
    wind: 'Wind',
    speed: 'Simulation Speed',
};

/**
 * Panneau de contrôle de la simulation.
 */
export class ControlPanel {
    private sliders: Record<NumericParameter, Slider>;
    private checkboxes: Record<ToggleParameter, boolean> = {
        kpEnabled: true,
        kiEnabled: true,
        kdEnabled: true,
    };
    private listeners = new Set<ChangeListener>();

    constructor(controls: ControlsConfig) {
        this.sliders = {
            kp: new Slider(SLIDER_LABELS.kp, controls.kp),
            ki: new Slider(SLIDER_LABELS.ki, controls.ki),
            kd: new Slider(SLIDER_LABELS.kd, controls.kd),
            mass: new Slider(SLIDER_LABELS.mass, controls.mass),
            wind: new Slider(SLIDER_LABELS.wind, controls.wind),
            speed: new Slider(SLIDER_LABELS.speed, controls.speed),
        };
    }

    onChange(listener: ChangeListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    getSlider(name: NumericParameter): Slider {
        return this.sliders[name];
    }

    setSlider(name: NumericParameter, value: number): void {
        const slider = this.sliders[name];
        if (slider.setValue(value)) {
            this.emit({ kind: name, value: slider.getValue() });
        }
    }

    /**
     * Glissement du curseur (ratio de course 0-1).
     */
    dragSlider(name: NumericParameter, ratio: number): void {
        const slider = this.sliders[name];
        if (slider.setRatio(ratio)) {
            this.emit({ kind: name, value: slider.getValue() });
        }
    }

    toggle(name: ToggleParameter): void {
        this.checkboxes[name] = !this.checkboxes[name];
        this.emit({ kind: name, value: this.checkboxes[name] });
    }

    isChecked(name: ToggleParameter): boolean {
        return this.checkboxes[name];
    }

    press(action: TriggerAction): void {
        this.emit({ kind: action });
    }

    /**
     * Valeurs courantes sous forme de paramètres de simulation.
     */
    getValues(): SimulationParameters {
        return {
            kp: this.sliders.kp.getValue(),
            ki: this.sliders.ki.getValue(),
            kd: this.sliders.kd.getValue(),
            mass: this.sliders.mass.getValue(),
            wind: this.sliders.wind.getValue(),
            speed: this.sliders.speed.getValue(),
            enabled: {
                p: this.checkboxes.kpEnabled,
                i: this.checkboxes.kiEnabled,
                d: this.checkboxes.kdEnabled,
            },
        };
    }

    private emit(change: ParamChange): void {
        this.listeners.forEach(listener => listener(change));
    }
}
