import type { ChartOptions } from './core/config.js';
import type { LabelPosition } from './core/types.js';

export interface CliOptions {
    format: 'text' | 'json';
    configPath?: string;
    overrides: ChartOptions;
    input?: string;
    help: boolean;
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

type NumericOption =
    | 'startAngle' | 'donutWidth' | 'labelOffset' | 'padding' | 'total'
    | 'showRatio' | 'radius' | 'viewboxWidth' | 'viewboxHeight';

const NUMERIC_FLAGS: Record<string, NumericOption | undefined> = {
    '--start-angle': 'startAngle',
    '--donut-width': 'donutWidth',
    '--label-offset': 'labelOffset',
    '--padding': 'padding',
    '--total': 'total',
    '--show-ratio': 'showRatio',
    '--radius': 'radius',
    '--width': 'viewboxWidth',
    '--height': 'viewboxHeight',
};

function isLabelPosition(v: string): v is LabelPosition {
    return v === 'inside' || v === 'outside' || v === 'center';
}

function numberArg(flag: string, raw: string | undefined): number {
    const n = Number(raw);
    if (raw === undefined || raw.trim() === '' || !Number.isFinite(n)) {
        throw new CliUsageError(`${flag} expects a number, got '${raw ?? ''}'`);
    }
    return n;
}

// flag + value pairs are consumed together; unknown flags are usage errors
export function parseCliArgs(args: string[]): CliOptions {
    const opts: CliOptions = { format: 'json', overrides: {}, help: false };
    const overrides: ChartOptions = {};
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '-h' || a === '--help') { opts.help = true; continue; }
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v !== 'json' && v !== 'text') throw new CliUsageError(`--format expects text or json, got '${v}'`);
            opts.format = v;
            i++;
            continue;
        }
        if (a === '--config' || a === '-c') {
            const v = args[i + 1];
            if (!v) throw new CliUsageError('--config expects a file path');
            opts.configPath = v;
            i++;
            continue;
        }
        if (a === '--donut') { overrides.donut = true; continue; }
        if (a === '--no-labels') { overrides.showLabels = false; continue; }
        if (a === '--label-position') {
            const v = args[i + 1] ?? '';
            if (!isLabelPosition(v)) throw new CliUsageError(`--label-position expects inside, outside or center, got '${v}'`);
            overrides.labelPosition = v;
            i++;
            continue;
        }
        const key = NUMERIC_FLAGS[a];
        if (key) {
            overrides[key] = numberArg(a, args[i + 1]);
            i++;
            continue;
        }
        if (a === '-' || !a.startsWith('-')) {
            if (opts.input) throw new CliUsageError(`Unexpected argument '${a}'`);
            opts.input = a;
            continue;
        }
        throw new CliUsageError(`Unknown option '${a}'`);
    }
    return { ...opts, overrides };
}
