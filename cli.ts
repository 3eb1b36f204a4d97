import path from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import { createConfig } from './config';
import type { ConfigOverrides } from './config';
import type { SimulationConfig } from './types';
import { runComparison } from './comparison';
import { ConfigurationError } from './errors';
import { formatEventLog, formatSummaryTable, logFileName, logToCSV } from './report';
import { renderReport } from './renderReport';
import { loadScenarioFile } from './scenarioSchema';

export interface CliOptions {
    out: string;
    scenario?: string;
    quiet: boolean;
    report: boolean;
}

/**
 * Builds the run configuration, reading overrides from the scenario file when one is given.
 */
export const loadConfig = async (scenario?: string): Promise<SimulationConfig> => {
    const overrides: ConfigOverrides = scenario ? await loadScenarioFile(scenario) : {};
    return createConfig(overrides);
};

/**
 * Runs the comparison and writes the artifacts. Returns the process exit code.
 */
export const runCli = async (options: CliOptions): Promise<number> => {
    let config: SimulationConfig;
    try {
        config = await loadConfig(options.scenario);
    } catch (err) {
        if (err instanceof ConfigurationError) {
            console.error(`Configuration error: ${err.message}`);
            return 1;
        }
        throw err;
    }

    const outcomes = runComparison(config);

    if (!options.quiet) {
        outcomes.forEach(o => {
            if (o.ok) {
                console.log(`--- ${o.agent} ---`);
                formatEventLog(o.agent, o.events).forEach(line => console.log(line));
            }
        });
        console.log();
    }
    console.log(formatSummaryTable(outcomes));

    await mkdir(options.out, { recursive: true });
    for (const o of outcomes) {
        if (!o.ok) {
            console.warn(`${o.agent} failed after ${o.log.length} steps: ${o.error.message}`);
        }
        if (o.log.length > 0) {
            await writeFile(path.join(options.out, logFileName(o.agent)), logToCSV(o.log), 'utf8');
        }
    }
    if (options.report) {
        const reportPath = path.join(options.out, 'report.html');
        await writeFile(reportPath, renderReport(config, outcomes), 'utf8');
        console.log(`Report written to ${reportPath}`);
    }

    return outcomes.every(o => o.ok) ? 0 : 2;
};
