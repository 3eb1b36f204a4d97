#!/usr/bin/env tsx
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runCli } from './cli';

const main = async () => {
    const argv = await yargs(hideBin(process.argv))
        .scriptName('nomadic-sim')
        .usage('$0 [options]\n\nCompare Reactive, Myopic and PASS session migration on the scripted scenario')
        .option('out', {
            type: 'string',
            default: 'results',
            describe: 'Directory for report.html and per-agent CSV logs'
        })
        .option('scenario', {
            type: 'string',
            describe: 'JSON file with configuration overrides'
        })
        .option('quiet', {
            type: 'boolean',
            default: false,
            describe: 'Only print the summary table'
        })
        .option('report', {
            type: 'boolean',
            default: true,
            describe: 'Write report.html (use --no-report to skip)'
        })
        .strict()
        .help()
        .parseAsync();

    process.exitCode = await runCli({
        out: argv.out,
        scenario: argv.scenario,
        quiet: argv.quiet,
        report: argv.report
    });
};

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
