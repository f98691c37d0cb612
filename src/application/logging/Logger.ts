/**
 * Système de logging structuré.
 *
 * @module application/logging
 */

import type { PlatformRegime } from '../../core/types/SimulationState';

/**
 * Niveaux de log.
 */
export enum LogLevel {
    DEBUG = 'debug',
    INFO = 'info',
    WARNING = 'warning',
    ERROR = 'error',
}

/**
 * Entrée de log structurée.
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: number;
    data?: unknown;
}

/**
 * Snapshot de l'état de simulation pour logging.
 */
export interface SimulationSnapshot {
    time: number;
    position: number;
    velocity: number;
    regime: PlatformRegime;
    error: number;
    output: number;
    components: { p: number; i: number; d: number };
}

export interface LoggerOptions {
    bufferSize?: number;
    consoleOutput?: boolean;
    enabled?: boolean;
}

/**
 * Buffer circulaire pour logs.
 */
export class LogBuffer {
    private buffer: LogEntry[] = [];
    private maxSize: number;

    constructor(maxSize = 32) {
        this.maxSize = maxSize;
    }

    add(entry: LogEntry): void {
        this.buffer.push(entry);
        if (this.buffer.length > this.maxSize) {
            this.buffer.shift();
        }
    }

    getAll(): readonly LogEntry[] {
        return this.buffer;
    }

    clear(): void {
        this.buffer = [];
    }
}

/**
 * Formatte un nombre avec gestion des valeurs aberrantes.
 */
export function formatNumber(value: number, decimals: number = 2, width: number = 7): string {
    if (!Number.isFinite(value)) {
        return 'NaN'.padStart(width, ' ');
    }

    const absValue = Math.abs(value);

    // Valeurs aberrantes (>1e10) en notation scientifique compacte
    if (absValue > 1e10) {
        const exp = Math.floor(Math.log10(absValue));
        const mantissa = value / Math.pow(10, exp);
        return `${mantissa.toFixed(1)}e${exp}`.padStart(width, ' ');
    }

    return value.toFixed(decimals).padStart(width, ' ');
}

/**
 * Logger principal.
 */
export class Logger {
    private buffer: LogBuffer;
    private callbacks: Set<(entry: LogEntry) => void> = new Set();
    private snapshotBuffer: SimulationSnapshot[] = [];
    private maxSnapshotSize = 10;
    private consoleOutput: boolean;
    private enabled: boolean;

    constructor(options: LoggerOptions = {}) {
        this.buffer = new LogBuffer(options.bufferSize ?? 32);
        this.consoleOutput = options.consoleOutput ?? true;
        this.enabled = options.enabled ?? true;
    }

    debug(message: string, data?: unknown): void {
        this.log(LogLevel.DEBUG, message, data);
    }

    info(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, message, data);
    }

    warning(message: string, data?: unknown): void {
        this.log(LogLevel.WARNING, message, data);
    }

    error(message: string, data?: unknown): void {
        this.log(LogLevel.ERROR, message, data);
    }

    /**
     * Log les performances (convergence, saturation).
     */
    performance(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, `[PERF] ${message}`, data);
    }

    /**
     * Log les actions de contrôle (gains, masse, vent, placements).
     */
    control(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, `[CTRL] ${message}`, data);
    }

    /**
     * Log un snapshot de l'état de simulation.
     * Maintient un buffer circulaire des 10 derniers snapshots.
     */
    logSimulationSnapshot(snapshot: SimulationSnapshot): void {
        if (!this.enabled) return;
        this.snapshotBuffer.push(snapshot);
        if (this.snapshotBuffer.length > this.maxSnapshotSize) {
            this.snapshotBuffer.shift();
        }
    }

    getSimulationSnapshots(): readonly SimulationSnapshot[] {
        return this.snapshotBuffer;
    }

    /**
     * Formate les snapshots pour affichage.
     */
    formatSnapshots(): string {
        if (this.snapshotBuffer.length === 0) {
            return 'Aucune donnée de simulation disponible';
        }

        const lines: string[] = [];
        lines.push('═══════════════════════════════════════════════════════════════');
        lines.push(`JOURNAL DE SIMULATION - ${this.snapshotBuffer.length} DERNIÈRES ENTRÉES`);
        lines.push('═══════════════════════════════════════════════════════════════');
        lines.push('');

        this.snapshotBuffer.forEach((snapshot, index) => {
            const num = (index + 1).toString().padStart(2, '0');
            const time = formatNumber(snapshot.time, 1, 6);

            lines.push(`┌─ Entrée ${num} ──────────────────────────────── T=${time}s ─┐`);
            lines.push(`│ PLATEFORME  X: ${formatNumber(snapshot.position)} px  ` +
                       `V: ${formatNumber(snapshot.velocity)} px/s  ${snapshot.regime}`);
            lines.push(`│ ERREUR      ${formatNumber(snapshot.error)} px`);
            lines.push(`│ COMMANDE    ${formatNumber(snapshot.output, 1)} N  ` +
                       `P: ${formatNumber(snapshot.components.p, 1)}  ` +
                       `I: ${formatNumber(snapshot.components.i, 1)}  ` +
                       `D: ${formatNumber(snapshot.components.d, 1)}`);
            lines.push('└──────────────────────────────────────────────────────────────┘');

            if (index < this.snapshotBuffer.length - 1) {
                lines.push('');
            }
        });

        lines.push('');
        lines.push('═══════════════════════════════════════════════════════════════');

        return lines.join('\n');
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        if (!this.enabled) return;

        const entry: LogEntry = {
            level,
            message,
            timestamp: Date.now(),
            data,
        };

        this.buffer.add(entry);
        this.callbacks.forEach(cb => cb(entry));

        if (this.consoleOutput) {
            const line = `[${level.toUpperCase()}] ${message}`;
            if (level === LogLevel.ERROR) {
                console.error(line, data ?? '');
            } else if (level === LogLevel.WARNING) {
                console.warn(line, data ?? '');
            } else {
                console.log(line, data ?? '');
            }
        }
    }

    subscribe(callback: (entry: LogEntry) => void): () => void {
        this.callbacks.add(callback);
        return () => this.callbacks.delete(callback);
    }

    getBuffer(): LogBuffer {
        return this.buffer;
    }

    clear(): void {
        this.buffer.clear();
        this.snapshotBuffer = [];
    }
}

/**
 * Formatteur de logs pour affichage.
 */
export class LogFormatter {
    static formatEntry(entry: LogEntry): string {
        const time = new Date(entry.timestamp).toISOString().slice(11, 23);
        return `[${time}] ${entry.message}`;
    }

    static formatBuffer(buffer: LogBuffer): string {
        return buffer.getAll()
            .map(entry => this.formatEntry(entry))
            .join('\n');
    }
}
