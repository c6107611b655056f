#!/usr/bin/env node

import * as fs from 'node:fs';
import { CliUsageError, parseCliArgs } from './cli-options.js';
import { type ChartOptions, mergeChartConfig, parseChartOverrides } from './core/config.js';
import { isLayoutError } from './core/errors.js';
import { diagnosticsReport, layoutSummary, textReport, toJsonResult } from './core/format.js';
import { layoutPieSource } from './core/pipeline.js';

function printUsage() {
    console.log('Usage: pie-layout <file> [options]');
    console.log('       cat chart.pie | pie-layout - [options]');
    console.log('  - Computes slice paths and label anchors for a pie source file');
    console.log('Options:');
    console.log('  --format, -f         Output format: json|text (default: json)');
    console.log('  --config, -c         JSON file with chart options');
    console.log('  --donut              Draw ring segments instead of wedges');
    console.log('  --donut-width n      Ring thickness (default: 40)');
    console.log('  --start-angle n      First boundary, degrees clockwise from 12 o\'clock');
    console.log('  --total n            Value of the whole circle');
    console.log('  --show-ratio n       Share of the circle the data fills (0.0001..1)');
    console.log('  --label-position p   inside|outside|center (default: inside)');
    console.log('  --label-offset n     Extra label distance from the centre');
    console.log('  --no-labels          Omit value labels (explicit labels still show)');
    console.log('  --padding n, --radius n, --width n, --height n');
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function readConfigFile(file: string): ChartOptions {
    let data: unknown;
    try {
        data = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (e) {
        throw new CliUsageError(`Cannot read config ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return parseChartOverrides(data);
}

function main() {
    const opts = parseCliArgs(process.argv.slice(2));
    if (opts.help || !opts.input) {
        printUsage();
        process.exit(opts.help ? 0 : 1);
    }

    const fromFile = opts.configPath ? readConfigFile(opts.configPath) : {};
    const { content, filename } = readInput(opts.input);
    const { title, layout, errors } = layoutPieSource(content, mergeChartConfig(fromFile, opts.overrides));
    const failed = errors.some(e => e.severity === 'error');

    if (opts.format === 'json') {
        console.log(JSON.stringify(toJsonResult(filename, errors, layout, title), null, 2));
        process.exit(failed ? 1 : 0);
    }

    if (errors.length > 0) {
        const report = textReport(filename, content, errors);
        if (failed) console.error(report); else console.log(report);
    }
    if (layout) {
        console.log(layoutSummary(layout, title));
        if (layout.diagnostics.length > 0) console.error(diagnosticsReport(layout.diagnostics));
    }
    process.exit(failed ? 1 : 0);
}

try {
    main();
} catch (err) {
    if (err instanceof CliUsageError || isLayoutError(err)) {
        console.error(`Error: ${err.message}`);
        process.exit(2);
    }
    console.error(err instanceof Error ? err.stack : String(err));
    process.exit(1);
}
