import { Command } from 'commander';
import { ensureConfig, type AppConfig } from '../config.js';
import { TurbineAssistant } from '../agent/assistant.js';
import { describeError } from '../errors.js';
import { exportAnswer } from '../export/formats.js';
import { createPipeline } from '../pipeline/index.js';
import { FileSessionStore } from '../sessions/store.js';
import {
    createSpinner,
    showAnswer,
    showCitations,
    showComplete,
    showDetails,
    showDiagnostics,
    showError,
    showHeader,
    stageLabel,
} from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { applyUiMode, applyVerbosity, maybeShowSetupIntro } from './shared.js';

interface AskOptions {
    session?: string;
    json?: boolean;
    output?: string;
    model?: string;
    ui?: string;
    verbose?: boolean;
}

function withModelOverride(config: AppConfig, model: string | undefined): AppConfig {
    const key = model?.trim();
    if (!key) return config;
    return { ...config, reasoning: { ...config.reasoning, modelKeyOverride: key } };
}

export const askCommand = new Command('ask')
    .description('Ask a question about turbine operation, troubleshooting or maintenance')
    .argument('<query>', 'Question for the assistant')
    .option('-s, --session <id>', 'Continue an existing conversation')
    .option('--json', 'Print the full response as JSON')
    .option('-o, --output <file>', 'Save the answer (.md, .html, .txt or .json)')
    .option('-m, --model <key>', 'Model registry key to use (overrides LLM_MODEL_KEY)')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .option('-v, --verbose', 'Show pipeline notes and debug logs')
    .action(async (query: string, options: AskOptions) => {
        try {
            applyUiMode(options.ui);
            applyVerbosity(options.verbose);

            maybeShowSetupIntro({ search: true });
            const config = withModelOverride(await ensureConfig({ search: true }), options.model);

            const pipeline = await createPipeline(config);
            const store = new FileSessionStore({
                directory: config.sessions.directory,
                ttlDays: config.sessions.ttlDays,
            });
            const assistant = new TurbineAssistant(pipeline, store);

            if (options.json) {
                const response = await assistant.ask({ sessionId: options.session, query });
                console.log(JSON.stringify(response, null, 2));
                if (options.output) await exportAnswer(query, response, options.output);
                return;
            }

            showHeader({ query, sessionId: options.session });

            const spinner = createSpinner('Starting...');
            spinner.start();
            const response = await assistant.ask(
                { sessionId: options.session, query },
                { onStageStart: (stage) => { spinner.text = stageLabel(stage); } }
            );
            spinner.stop();

            showAnswer(response, { renderMarkdown: config.renderMarkdown });
            showCitations(response);
            showDetails(response, config.confidence.minimum);
            showDiagnostics(response.errors, Boolean(options.verbose));

            if (options.output) {
                await exportAnswer(query, response, options.output);
            }

            if (!options.session) {
                console.log(colors.muted(`\nContinue this conversation with --session ${response.sessionId}`));
            }
            showComplete(options.output);
        } catch (error) {
            showError(describeError(error));
            process.exit(1);
        }
    });
