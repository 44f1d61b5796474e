#!/usr/bin/env node
/**
 * GL Deductions Report CLI
 *
 * The CLI handles all file I/O and console output; the core receives text
 * and bytes and returns data plus warnings.
 */

import { parseArgs } from 'node:util';
import { processMonth } from './commands/process.js';
import { previousMonth } from './utils/dates.js';
import { errorMessage } from './utils/console.js';
import { VERSION } from './version.js';

const USAGE = [
    `GL Deductions Report CLI v${VERSION}`,
    '',
    'Usage: gldr process [YYYY-MM] [options]',
    '',
    'Options:',
    '  -w, --workspace <dir>   Workspace root (default: detected from the current directory)',
    '  --dry-run               Run every step without writing or uploading the report',
    '  --force                 Overwrite the output of an already processed month',
    '  --skip-invalid-lines    Report and drop malformed export lines instead of stopping',
    '  -h, --help              Show this help',
    '',
    'The month defaults to the previous calendar month.',
].join('\n');

async function main(): Promise<number> {
    const { positionals, values } = parseArgs({
        args: process.argv.slice(2),
        allowPositionals: true,
        options: {
            workspace: { type: 'string', short: 'w' },
            'dry-run': { type: 'boolean', default: false },
            force: { type: 'boolean', default: false },
            'skip-invalid-lines': { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const [command, month] = positionals;

    if (values.help || command === undefined) {
        console.log(USAGE);
        return 0;
    }

    if (command !== 'process') {
        console.error(`Unknown command: ${command}\n`);
        console.error(USAGE);
        return 1;
    }

    return processMonth(month ?? previousMonth(), {
        dryRun: values['dry-run'] ?? false,
        force: values.force ?? false,
        skipInvalidLines: values['skip-invalid-lines'] ?? false,
        workspace: values.workspace,
    });
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error('Unexpected error:', errorMessage(err));
        process.exitCode = 1;
    }
);
