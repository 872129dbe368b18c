#!/usr/bin/env node
/**
 * Turbine Assist CLI - Main Entry Point
 * Answers operator questions from turbine documentation and live telemetry
 */

import 'dotenv/config';
import { checkNodeVersion } from './utils/node-version.js';

// Check Node.js version before anything else
checkNodeVersion();

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { initCommand } from './commands/init.js';
import { modelsCommand } from './commands/models.js';
import { sessionCommand } from './commands/session.js';
import { colors } from './ui/theme.js';

function readVersion(): string {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
        return raw.version;
    }
    return '0.0.0';
}

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.log('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(0);
});

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(0);
});

const program = new Command();

program
    .name('turbine-assist')
    .description('Operator assistant for industrial gas turbines')
    .version(readVersion());

program.addCommand(askCommand);
program.addCommand(sessionCommand);
program.addCommand(modelsCommand);
program.addCommand(initCommand);

// Parse arguments
await program.parseAsync();
