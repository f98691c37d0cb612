/**
 * Point d'entrée en ligne de commande : exécute un scénario sans interface graphique.
 *
 * Exemple : `npm start -- --kp 5 --ki 0.5 --kd 2 --start 300 --setpoint 0 --duration 20`
 */

import { parseArgs } from 'node:util';
import { createConfig } from './core/SimulationConfig';
import { Simulation } from './core/Simulation';
import { SimulationLoop } from './core/SimulationLoop';
import { Logger, LogFormatter } from './application/logging/Logger';
import { TelemetryHistory } from './application/telemetry/TelemetryHistory';
import { ControlPanel } from './infrastructure/ui/ControlPanel';
import { renderErrorStrip, renderPlatformTrack, renderSummary } from './infrastructure/rendering/TerminalReport';
import { NUMERIC_PARAMETERS } from './core/types/ParamChange';

const { values } = parseArgs({
    options: {
        kp: { type: 'string' },
        ki: { type: 'string' },
        kd: { type: 'string' },
        mass: { type: 'string' },
        wind: { type: 'string' },
        speed: { type: 'string' },
        start: { type: 'string' },
        setpoint: { type: 'string' },
        duration: { type: 'string', default: '20' },
        disable: { type: 'string', default: '' },
        realtime: { type: 'boolean', default: false },
        quiet: { type: 'boolean', default: false },
    },
});

const config = createConfig({ logging: { consoleOutput: !values.quiet } });
const logger = new Logger({ bufferSize: config.logging.bufferSize, consoleOutput: config.logging.consoleOutput });
const telemetry = new TelemetryHistory(config.telemetry);
const panel = new ControlPanel(config.controls);

for (const name of NUMERIC_PARAMETERS) {
    const raw = values[name];
    if (raw !== undefined) {
        panel.setSlider(name, Number(raw));
    }
}

const disabled = (values.disable ?? '').split(',').map(term => term.trim().toLowerCase());
if (disabled.includes('p')) panel.toggle('kpEnabled');
if (disabled.includes('i')) panel.toggle('kiEnabled');
if (disabled.includes('d')) panel.toggle('kdEnabled');

const simulation = new Simulation({
    config,
    logger,
    telemetry,
    parameters: panel.getValues(),
    setpoint: values.setpoint !== undefined ? Number(values.setpoint) : undefined,
    initialPosition: values.start !== undefined ? Number(values.start) : undefined,
});
panel.onChange(change => simulation.applyChange(change));

const initialError = simulation.getSetpoint() - simulation.getPlatform().getPosition();
const duration = Number(values.duration ?? '20');

function report(): void {
    const state = simulation.getLastState();
    if (!state) {
        logger.warning('Aucun pas simulé');
        return;
    }
    const columns = 60;
    console.log(renderPlatformTrack(state.platform.position, simulation.getSetpoint(), config.world.width, columns));
    telemetry.autoScale();
    console.log(renderErrorStrip(telemetry, columns));
    console.log(renderSummary(state, initialError));
    console.log(logger.formatSnapshots());
    if (values.quiet) {
        console.log(LogFormatter.formatBuffer(logger.getBuffer()));
    }
}

if (values.realtime) {
    const loop = new SimulationLoop(simulation);
    loop.start();
    setTimeout(() => {
        loop.stop();
        report();
    }, duration * 1000);
} else {
    simulation.runFor(duration);
    report();
}
