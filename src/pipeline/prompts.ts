/**
 * Prompts for the reasoning stage
 */

import type { HistoryTurn } from './collaborators.js';
import { normalizeRole, type AgentState, type ChatMessage, type Citation } from './state.js';

export const MAX_TELEMETRY_READINGS = 20;
export const MAX_HISTORY_TURNS = 5;

export const SYSTEM_PROMPT = `You are an expert assistant for industrial gas turbine operations and troubleshooting.

Use the provided documentation context to answer questions accurately:
- Cite the sources you rely on by their bracketed number, e.g. [1]
- Prefer the documentation over general knowledge when they disagree
- Take live telemetry readings into account when they are provided
- If the context does not contain the relevant information, say so clearly
- Never suggest bypassing safety interlocks or operating outside documented limits`;

type PromptState = Pick<AgentState, 'query' | 'transformedQuery' | 'turbineModel' | 'hierarchicalContext' | 'dataPoints' | 'citations'>;

/** `[n] source, p. N, relevance 0.731, url`, numbered like the context blocks */
export function formatSourceLine(citation: Citation, index: number): string {
    const parts = [`[${index + 1}] ${citation.source}`];
    if (citation.page !== null) parts.push(`p. ${citation.page}`);
    parts.push(`relevance ${citation.relevanceScore}`);
    if (citation.url) parts.push(citation.url);
    return parts.join(', ');
}

export function buildUserPrompt(state: PromptState): string {
    const sections = [
        `User question: ${state.query}`,
        `Search query: ${state.transformedQuery || state.query}`,
        `Turbine model: ${state.turbineModel ?? 'not specified'}`,
        `Context from documentation:\n${state.hierarchicalContext}`,
    ];

    if (state.citations.length > 0) {
        sections.push(`Sources:\n${state.citations.map(formatSourceLine).join('\n')}`);
    }

    if (state.dataPoints.length > 0) {
        const readings = JSON.stringify(state.dataPoints.slice(0, MAX_TELEMETRY_READINGS), null, 2);
        sections.push(`Recent telemetry readings:\n${readings}`);
    }

    sections.push(
        'Please answer the question using the context above. If the context is relevant, cite the sources. ' +
        "If not, acknowledge that you don't have that information in the provided documentation."
    );

    return sections.join('\n\n');
}

/**
 * Last few prior turns. Anything that is not a user turn is sent as the
 * assistant, and the window opens on a user turn.
 */
export function buildHistory(messages: readonly ChatMessage[]): HistoryTurn[] {
    const turns: HistoryTurn[] = messages.slice(-MAX_HISTORY_TURNS).map((message) => ({
        role: normalizeRole(message.role),
        content: message.content,
    }));
    const firstUser = turns.findIndex((turn) => turn.role === 'user');
    return firstUser === -1 ? [] : turns.slice(firstUser);
}
