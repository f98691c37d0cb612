/**
 * Rendu texte minimal pour terminal : piste de la plateforme et bandeau d'erreur.
 *
 * @module infrastructure/rendering/TerminalReport
 */

import * as THREE from 'three';
import type { TelemetryHistory } from '../../application/telemetry/TelemetryHistory';
import { formatNumber } from '../../application/logging/Logger';
import type { SimulationState } from '../../core/types/SimulationState';

const ERROR_LEVELS = ' ▁▂▃▄▅▆▇█';

/**
 * Piste horizontale : `|` marque la consigne, `#` la plateforme.
 * Les positions hors du monde sont ramenées au bord.
 */
export function renderPlatformTrack(position: number, setpoint: number, worldWidth: number, columns: number): string {
    const toColumn = (x: number) => THREE.MathUtils.clamp(Math.round((x / worldWidth) * (columns - 1)), 0, columns - 1);

    const cells = new Array<string>(columns).fill('-');
    cells[toColumn(setpoint)] = '|';
    cells[toColumn(position)] = '#';
    return `[${cells.join('')}]`;
}

/**
 * Bandeau d'erreur : un caractère par échantillon récent, hauteur selon
 * l'échelle courante de l'axe d'erreur.
 */
export function renderErrorStrip(history: TelemetryHistory, columns: number): string {
    const samples = history.getSamples().slice(-columns);
    return samples
        .map(sample => {
            const level = Math.round(history.normalizeError(sample.error) * (ERROR_LEVELS.length - 1));
            return ERROR_LEVELS[level];
        })
        .join('');
}

/**
 * Résumé final d'une exécution.
 */
export function renderSummary(state: SimulationState, initialError: number): string {
    const lines = [
        `Temps simulé     : ${formatNumber(state.elapsedTime, 2)} s`,
        `Erreur initiale  : ${formatNumber(initialError, 2)} px`,
        `Erreur finale    : ${formatNumber(state.controller.error, 2)} px`,
        `Position finale  : ${formatNumber(state.platform.position, 2)} px`,
        `Vitesse finale   : ${formatNumber(state.platform.velocity, 2)} px/s`,
        `Commande finale  : ${formatNumber(state.controller.output, 2)} N`,
        `Régime           : ${state.platform.regime}`,
    ];
    return lines.join('\n');
}
