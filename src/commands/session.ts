import { Command } from 'commander';
import { loadConfig } from '../config.js';
import { describeError } from '../errors.js';
import { FileSessionStore } from '../sessions/store.js';
import { showError, showTranscript } from '../ui/components.js';
import { colors, icons } from '../ui/theme.js';
import { applyUiMode } from './shared.js';

function openStore(): FileSessionStore {
    const config = loadConfig();
    return new FileSessionStore({ directory: config.sessions.directory, ttlDays: config.sessions.ttlDays });
}

const showCommand = new Command('show')
    .description('Print the stored conversation for a session')
    .argument('<id>', 'Session id')
    .option('--json', 'Output JSON')
    .action(async (id: string, options: { json?: boolean }) => {
        try {
            applyUiMode(undefined);
            const record = await openStore().load(id);
            if (!record) {
                showError(`No session found for "${id}" (it may have expired)`);
                process.exit(1);
            }

            if (options.json) {
                console.log(JSON.stringify(record, null, 2));
                return;
            }
            showTranscript(record.sessionId, record.messages);
            console.log(colors.muted(`Expires: ${record.expiresAt}`));
        } catch (error) {
            showError(describeError(error));
            process.exit(1);
        }
    });

const deleteCommand = new Command('delete')
    .description('Delete a stored session')
    .argument('<id>', 'Session id')
    .action(async (id: string) => {
        try {
            applyUiMode(undefined);
            const deleted = await openStore().delete(id);
            if (!deleted) {
                console.log(colors.muted(`No session found for "${id}"`));
                return;
            }
            console.log(`${colors.success(icons.complete)} Deleted session ${id}`);
        } catch (error) {
            showError(describeError(error));
            process.exit(1);
        }
    });

export const sessionCommand = new Command('session')
    .description('Inspect or delete stored conversations')
    .addCommand(showCommand)
    .addCommand(deleteCommand);
