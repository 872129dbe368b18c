import { Command } from 'commander';
import { ensureConfig } from '../config.js';
import { describeError } from '../errors.js';
import { showError } from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { applyUiMode } from './shared.js';

export const initCommand = new Command('init')
    .description('Set up the search endpoint, telemetry and guardrail settings')
    .option('-f, --force', 'Re-enter settings even if set')
    .action(async (options: { force?: boolean }) => {
        try {
            applyUiMode(undefined);

            console.log();
            console.log(colors.primary('Setup'));
            console.log(colors.muted('This will save your settings to .env in this folder.'));
            console.log();

            await ensureConfig({ search: true }, { force: Boolean(options.force) });
            console.log(colors.success('Saved configuration to .env'));
        } catch (error) {
            showError(describeError(error));
            process.exit(1);
        }
    });
