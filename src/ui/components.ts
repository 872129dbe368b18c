/**
 * UI Components - Rich terminal UI elements
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import { Marked } from 'marked';
import TerminalRenderer from 'marked-terminal';
import gradient from 'gradient-string';
import type { ModelEntry, UiMode } from '../config.js';
import { formatCitation } from '../export/formats.js';
import type { ModelSelection } from '../pipeline/model-registry.js';
import type { PipelineResponse } from '../pipeline/runner.js';
import type { ChatMessage } from '../pipeline/state.js';
import { colors, confidenceColor, divider, getBoxOuterWidth, HEADER_GRADIENT, icons, sectionHeader } from './theme.js';

const STAGE_LABELS: Record<string, string> = {
    'query-transformer': 'Reading the question...',
    'telemetry-fetcher': 'Fetching live telemetry...',
    'knowledge-retriever': 'Searching the documentation...',
    'reasoning-engine': 'Drafting an answer...',
    'response-validator': 'Checking confidence and safety...',
};

export function stageLabel(stage: string): string {
    return STAGE_LABELS[stage] ?? `${stage}...`;
}

function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

/**
 * Display the app header
 */
export function showHeader(options: { query?: string; sessionId?: string } = {}): void {
    const { query, sessionId } = options;
    const title = 'Turbine Assist';
    const mode = getUiMode();

    console.log();

    if (mode === 'fancy') {
        const lines: string[] = [gradient(HEADER_GRADIENT)(title)];
        if (query) lines.push(colors.muted(`Question: ${query}`));
        if (sessionId) lines.push(colors.muted(`Session: ${sessionId}`));

        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#0E7490',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(colors.bold(title));
    if (query) console.log(colors.muted(`Question: ${query}`));
    if (sessionId) console.log(colors.muted(`Session: ${sessionId}`));
    console.log(colors.muted(divider()));
}

/**
 * Create a spinner with custom styling. Writes to stderr so stdout stays
 * clean for --json output.
 */
export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        isEnabled: mode !== 'plain' && Boolean(process.stderr.isTTY),
    });
}

export function renderMarkdown(markdown: string): string {
    const width = typeof process.stdout.columns === 'number' && process.stdout.columns > 0
        ? Math.min(process.stdout.columns, 100)
        : 80;

    // Own instance: the export path renders HTML through the shared `marked`
    const terminal = new Marked();
    terminal.setOptions({
        renderer: new TerminalRenderer({
            width,
            emoji: false,
            showSectionPrefix: false,
            reflowText: true,
        }),
    });

    const rendered = terminal.parse(markdown);
    return typeof rendered === 'string' ? rendered.trimEnd() : markdown;
}

/**
 * Show the answer body, rendered as markdown unless disabled or plain
 */
export function showAnswer(response: PipelineResponse, options: { renderMarkdown: boolean }): void {
    const mode = getUiMode();
    const body = options.renderMarkdown && mode !== 'plain'
        ? renderMarkdown(response.response)
        : response.response;

    console.log();
    if (mode === 'fancy') {
        console.log(
            boxen(body, {
                padding: 1,
                borderStyle: 'round',
                borderColor: response.guardrailResult.status === 'intervened' ? 'red' : '#0E7490',
                title: 'Answer',
                titleAlignment: 'left',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(colors.primary('Answer'));
    console.log(body);
}

export function showCitations(response: PipelineResponse): void {
    if (response.citations.length === 0) return;

    console.log(sectionHeader('Sources'));
    response.citations.forEach((citation, i) => {
        const relevance = colors.dim(`(${Math.round(citation.relevanceScore * 100)}%)`);
        console.log(`  ${colors.muted(icons.document)} ${formatCitation(citation, i)} ${relevance}`);
    });
}

export function showDetails(response: PipelineResponse, minimumConfidence: number): void {
    const confidence = response.confidenceScore.toFixed(2);
    const parts = [
        `Confidence ${confidenceColor(response.confidenceScore, minimumConfidence)(confidence)}`,
        `Turbine ${response.turbineModel ?? 'not detected'}`,
        `Telemetry ${response.dataFetchStatus}${response.dataPoints.length > 0 ? ` (${response.dataPoints.length} readings)` : ''}`,
        `Guardrail ${response.guardrailResult.status}`,
    ];

    const meta = response.responseMetadata;
    if (meta) {
        parts.push(`Model ${meta.modelName}${meta.fallbackUsed ? ' (fallback)' : ''}`);
    }

    console.log();
    console.log(colors.muted(parts.join('  |  ')));
}

/**
 * Diagnostics collected by the stages. Shown in full with --verbose,
 * otherwise as a count.
 */
export function showDiagnostics(errors: string[], verbose: boolean): void {
    if (errors.length === 0) return;

    if (!verbose) {
        const noun = errors.length === 1 ? 'note' : 'notes';
        console.log(colors.warning(`${icons.warning} ${errors.length} pipeline ${noun} (use --verbose to see them)`));
        return;
    }

    console.log(sectionHeader('Pipeline notes'));
    for (const error of errors) {
        console.log(`  ${colors.warning(icons.bullet)} ${colors.muted(error)}`);
    }
}

export function showTranscript(sessionId: string, messages: ChatMessage[]): void {
    console.log();
    console.log(colors.primary(`Session ${sessionId}`) + colors.muted(` (${messages.length} messages)`));
    console.log(colors.muted(divider()));

    for (const message of messages) {
        const speaker = message.role === 'user' ? colors.secondary('You') : colors.primary('Assistant');
        console.log(`${speaker} ${colors.dim(message.timestamp)}`);
        console.log(message.content);
        console.log();
    }
}

function describeBackend(entry: ModelEntry): string {
    return entry.backend.type === 'managed-llm'
        ? `managed ${entry.backend.modelId}`
        : `external ${entry.backend.model}`;
}

export function showModels(entries: ModelEntry[], selection: ModelSelection): void {
    console.log(`\n${colors.primary('Reasoning models')} (${entries.length} registered)\n`);

    for (const entry of entries) {
        const role = entry.key === selection.primary.key
            ? colors.success(' primary')
            : entry.key === selection.fallback?.key ? colors.warning(' fallback') : '';
        console.log(`  ${colors.secondary(entry.key)}${role}`);
        console.log(colors.muted(`    ${entry.displayName} | ${describeBackend(entry)} | max ${entry.inference.maxTokens} tokens, temperature ${entry.inference.temperature}`));
        if (entry.backend.type === 'external-http' && entry.backend.requiredEnv.length > 0) {
            console.log(colors.muted(`    Requires: ${entry.backend.requiredEnv.join(', ')}`));
        }
    }

    if (!entries.some((entry) => entry.key === selection.primary.key)) {
        console.log(`  ${colors.secondary(selection.primary.key)}${colors.success(' primary')} ${colors.muted('(built-in)')}`);
    }
    for (const diagnostic of selection.diagnostics) {
        console.log(colors.warning(`  ${icons.warning} ${diagnostic}`));
    }
    console.log();
}

/**
 * Show completion message
 */
export function showComplete(outputPath?: string): void {
    const mode = getUiMode();
    console.log();
    if (mode === 'fancy') {
        const msg = gradient(['#10B981', '#06B6D4'])('Done');
        console.log(`${colors.success(icons.complete)} ${msg}`);
        if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
        return;
    }

    console.log(`${colors.success(icons.complete)} ${colors.success('Done')}`);
    if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
}

/**
 * Show error message
 */
export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}
