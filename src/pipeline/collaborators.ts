/**
 * Contracts for everything the pipeline talks to. Stages depend on these
 * interfaces only; the concrete clients live in src/clients.
 */

import type { ChatRole, RetrievalHit, TelemetryReading } from './state.js';

export interface EmbeddingBackend {
    embed(text: string): Promise<number[]>;
}

export interface SearchFilters {
    turbineModel?: string;
    documentType?: string;
}

export interface IndexedChunk {
    id: string;
    content: string;
    source: string;
    chunkIndex: number | null;
}

export interface SearchIndex {
    hybridSearch(query: string, vector: number[], filters: SearchFilters, topK: number): Promise<RetrievalHit[]>;
    getByIds(ids: string[]): Promise<IndexedChunk[]>;
}

export interface TelemetryGateway {
    fetch(turbineModel: string, variables: string[], lookbackMinutes: number): Promise<TelemetryReading[]>;
}

export interface HistoryTurn {
    role: ChatRole;
    content: string;
}

export interface ManagedInvocation {
    modelId: string;
    systemPrompt: string;
    userPrompt: string;
    history: HistoryTurn[];
    maxTokens: number;
    temperature: number;
    topP?: number;
}

export interface ManagedLlmBackend {
    invoke(request: ManagedInvocation): Promise<string>;
}

export interface ExternalInvocation {
    endpoint: string;
    model: string;
    apiKey: string;
    systemPrompt: string;
    userPrompt: string;
    history: HistoryTurn[];
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
}

export interface ExternalReasoningBackend {
    /** Resolves to null when the service answered without usable text */
    invoke(request: ExternalInvocation): Promise<string | null>;
}

export interface GuardrailContext {
    confidenceScore: number;
    turbineModel: string | null;
}

export type GuardrailVerdict =
    | { status: 'passed' }
    | { status: 'intervened'; compliance: string; details?: string };

export interface GuardrailService {
    evaluate(text: string, context: GuardrailContext): Promise<GuardrailVerdict>;
}

export interface DocumentLinker {
    linkFor(source: string, page: number | null): Promise<string | null>;
}
