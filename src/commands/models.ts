import { Command } from 'commander';
import { loadConfig, loadModelRegistry } from '../config.js';
import { describeError } from '../errors.js';
import { ModelRegistry } from '../pipeline/model-registry.js';
import { showError, showModels } from '../ui/components.js';
import { applyUiMode } from './shared.js';

export const modelsCommand = new Command('models')
    .description('List the reasoning models and which ones would answer')
    .option('--json', 'Output JSON')
    .option('-m, --model <key>', 'Resolve as if this key were selected')
    .action(async (options: { json?: boolean; model?: string }) => {
        try {
            applyUiMode(undefined);
            const config = loadConfig();
            const registry = new ModelRegistry(await loadModelRegistry(config.modelConfigPath));
            const selection = registry.resolve(options.model?.trim() || config.reasoning.modelKeyOverride);

            if (options.json) {
                console.log(JSON.stringify({
                    models: registry.entries,
                    primary: selection.primary.key,
                    fallback: selection.fallback?.key ?? null,
                    diagnostics: selection.diagnostics,
                }, null, 2));
                return;
            }

            showModels(registry.entries, selection);
        } catch (error) {
            showError(describeError(error));
            process.exit(1);
        }
    });
