/**
 * Erreurs de validation des paramètres de simulation.
 *
 * @module core/errors
 */

export type InvalidParameterCode = 'NOT_FINITE' | 'NOT_POSITIVE';

/**
 * Levée à la frontière pilote/UI quand une valeur ne peut pas atteindre le noyau numérique.
 */
export class InvalidParameterError extends Error {
    readonly code: InvalidParameterCode;
    readonly parameter: string;
    readonly value: number;

    constructor(parameter: string, value: number, code: InvalidParameterCode) {
        const reason = code === 'NOT_FINITE' ? 'doit être un nombre fini' : 'doit être strictement positif';
        super(`Paramètre invalide "${parameter}" = ${value} : ${reason}`);
        this.name = 'InvalidParameterError';
        this.parameter = parameter;
        this.value = value;
        this.code = code;
    }
}

/**
 * Vérifie qu'une valeur est finie.
 */
export function requireFinite(parameter: string, value: number): number {
    if (!Number.isFinite(value)) {
        throw new InvalidParameterError(parameter, value, 'NOT_FINITE');
    }
    return value;
}

/**
 * Vérifie qu'une valeur est finie et strictement positive.
 */
export function requirePositive(parameter: string, value: number): number {
    requireFinite(parameter, value);
    if (value <= 0) {
        throw new InvalidParameterError(parameter, value, 'NOT_POSITIVE');
    }
    return value;
}
