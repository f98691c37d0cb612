/**
 * Système d'événements centralisé pour communication découplée entre modules.
 *
 * @module core/types/Events
 */

import type { ParamChange } from './ParamChange';
import type { SimulationState } from './SimulationState';

/**
 * Types d'événements disponibles dans la simulation.
 */
export enum SimulationEventType {
    // Événements physiques
    PHYSICS_UPDATE = 'physics:update',

    // Événements plateforme
    PLATFORM_PLACED = 'platform:placed',

    // Événements contrôle
    PARAMETER_CHANGE = 'control:parameter:change',
    PARAMETER_REJECTED = 'control:parameter:rejected',

    // Événements simulation
    SIMULATION_START = 'simulation:start',
    SIMULATION_STOP = 'simulation:stop',
    SIMULATION_PAUSE = 'simulation:pause',
    SIMULATION_RESUME = 'simulation:resume',
    SIMULATION_RESET = 'simulation:reset',

    // Événements télémétrie
    TELEMETRY_CLEAR = 'telemetry:clear',
}

/**
 * Données associées à chaque type d'événement.
 */
export interface SimulationEventMap {
    [SimulationEventType.PHYSICS_UPDATE]: SimulationState;
    [SimulationEventType.PLATFORM_PLACED]: { position: number };
    [SimulationEventType.PARAMETER_CHANGE]: ParamChange;
    [SimulationEventType.PARAMETER_REJECTED]: { change: ParamChange; reason: string };
    [SimulationEventType.SIMULATION_START]: { elapsedTime: number };
    [SimulationEventType.SIMULATION_STOP]: { elapsedTime: number };
    [SimulationEventType.SIMULATION_PAUSE]: { elapsedTime: number };
    [SimulationEventType.SIMULATION_RESUME]: { elapsedTime: number };
    [SimulationEventType.SIMULATION_RESET]: { position: number };
    [SimulationEventType.TELEMETRY_CLEAR]: { elapsedTime: number };
}

/**
 * Structure de base pour tous les événements.
 */
export interface SimulationEvent<K extends SimulationEventType> {
    /** Type d'événement */
    type: K;

    /** Timestamp de l'événement (ms depuis epoch) */
    timestamp: number;

    /** Données associées à l'événement */
    data: SimulationEventMap[K];

    /** Source de l'événement (optionnel) */
    source?: string;
}

/**
 * Callback pour les listeners d'événements.
 */
export type EventListener<K extends SimulationEventType> = (event: SimulationEvent<K>) => void;

type ListenerRegistry = { [K in SimulationEventType]: Set<EventListener<K>> };

function createRegistry(): ListenerRegistry {
    return {
        [SimulationEventType.PHYSICS_UPDATE]: new Set(),
        [SimulationEventType.PLATFORM_PLACED]: new Set(),
        [SimulationEventType.PARAMETER_CHANGE]: new Set(),
        [SimulationEventType.PARAMETER_REJECTED]: new Set(),
        [SimulationEventType.SIMULATION_START]: new Set(),
        [SimulationEventType.SIMULATION_STOP]: new Set(),
        [SimulationEventType.SIMULATION_PAUSE]: new Set(),
        [SimulationEventType.SIMULATION_RESUME]: new Set(),
        [SimulationEventType.SIMULATION_RESET]: new Set(),
        [SimulationEventType.TELEMETRY_CLEAR]: new Set(),
    };
}

/**
 * Bus d'événements central pour communication découplée.
 *
 * @example
 * ```typescript
 * const eventBus = new EventBus();
 *
 * // S'abonner
 * eventBus.subscribe(SimulationEventType.SIMULATION_RESET, (event) => {
 *   console.log('Plateforme recentrée en', event.data.position);
 * });
 *
 * // Publier
 * eventBus.publish({
 *   type: SimulationEventType.SIMULATION_RESET,
 *   timestamp: Date.now(),
 *   data: { position: 600 }
 * });
 * ```
 */
export class EventBus {
    private listeners = createRegistry();
    private oneTimeListeners = createRegistry();

    /**
     * S'abonne à un type d'événement.
     *
     * @returns Fonction de désabonnement
     */
    subscribe<K extends SimulationEventType>(type: K, callback: EventListener<K>): () => void {
        this.listeners[type].add(callback);
        return () => this.unsubscribe(type, callback);
    }

    /**
     * S'abonne à un événement pour une seule exécution.
     */
    subscribeOnce<K extends SimulationEventType>(type: K, callback: EventListener<K>): void {
        this.oneTimeListeners[type].add(callback);
    }

    unsubscribe<K extends SimulationEventType>(type: K, callback: EventListener<K>): void {
        this.listeners[type].delete(callback);
    }

    /**
     * Publie un événement à tous les abonnés.
     *
     * Une exception dans un listener est journalisée sans interrompre les autres.
     */
    publish<K extends SimulationEventType>(event: SimulationEvent<K>): void {
        // Appeler listeners permanents
        this.listeners[event.type].forEach(callback => {
            try {
                callback(event);
            } catch (error) {
                console.error(`Erreur dans listener pour ${event.type}:`, error);
            }
        });

        // Appeler et retirer listeners one-time
        const oneTimeListeners = this.oneTimeListeners[event.type];
        if (oneTimeListeners.size > 0) {
            const pending = [...oneTimeListeners];
            oneTimeListeners.clear();
            pending.forEach(callback => {
                try {
                    callback(event);
                } catch (error) {
                    console.error(`Erreur dans one-time listener pour ${event.type}:`, error);
                }
            });
        }
    }

    /**
     * Raccourci : publie avec timestamp courant.
     */
    emit<K extends SimulationEventType>(type: K, data: SimulationEventMap[K], source?: string): void {
        this.publish({ type, timestamp: Date.now(), data, source });
    }

    /**
     * Supprime tous les listeners d'un type spécifique.
     */
    clear(type: SimulationEventType): void {
        this.listeners[type].clear();
        this.oneTimeListeners[type].clear();
    }

    clearAll(): void {
        this.listeners = createRegistry();
        this.oneTimeListeners = createRegistry();
    }

    /**
     * Retourne le nombre de listeners (permanents + one-time) pour un type.
     */
    getListenerCount(type: SimulationEventType): number {
        return this.listeners[type].size + this.oneTimeListeners[type].size;
    }
}
