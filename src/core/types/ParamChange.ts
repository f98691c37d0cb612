/**
 * Événements de modification émis par le panneau de contrôle.
 *
 * @module core/types/ParamChange
 */

/**
 * Paramètres numériques réglables.
 */
export type NumericParameter = 'kp' | 'ki' | 'kd' | 'mass' | 'wind' | 'speed';

/**
 * Interrupteurs des termes PID.
 */
export type ToggleParameter = 'kpEnabled' | 'kiEnabled' | 'kdEnabled';

/**
 * Déclencheurs sans valeur.
 */
export type TriggerAction = 'resetGraphs' | 'resetSimulation' | 'zoomIn' | 'zoomOut' | 'autoScale';

/**
 * Modification de paramètre (union fermée).
 */
export type ParamChange =
    | { kind: NumericParameter; value: number }
    | { kind: ToggleParameter; value: boolean }
    | { kind: TriggerAction };

export const NUMERIC_PARAMETERS: readonly NumericParameter[] = ['kp', 'ki', 'kd', 'mass', 'wind', 'speed'];
