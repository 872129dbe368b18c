/**
 * Agent state threaded through the answer pipeline.
 *
 * Stages never mutate the state they receive. Each returns a StageResult
 * holding the fields it sets plus any diagnostics, and the runner merges
 * that into the next state with `mergeState`.
 */

export type ChatRole = 'user' | 'assistant';

/** Case-insensitive; anything other than a user turn counts as the assistant */
export function normalizeRole(role: string): ChatRole {
    return role.trim().toLowerCase() === 'user' ? 'user' : 'assistant';
}

export interface ChatMessage {
    role: ChatRole;
    content: string;
    timestamp: string;
}

export type LanguageHint = 'en' | 'unknown-non-ascii';

export interface QueryMetadata {
    detectedModel: string | null;
    language: LanguageHint;
    timestamp: string;
    /** Up to the last three user turns, oldest first */
    historyContext: string[];
}

export interface TelemetryReading {
    timestamp: string;
    variable: string;
    value: number;
    unit?: string;
}

export type DataFetchStatus = 'disabled' | 'skipped' | 'ok' | 'error';

export interface NeighborChunk {
    id: string;
    chunkIndex: number;
    /** Where the chunk sits relative to the hit it was fetched for */
    position: 'before' | 'after';
    content: string;
}

export interface HitMetadata {
    page: number | null;
    sectionPath: string[];
    chunkIndex: number | null;
    turbineModel: string | null;
    documentType: string | null;
}

export interface RetrievalHit {
    id: string;
    content: string;
    source: string;
    /** Raw engine score, not normalized */
    score: number;
    metadata: HitMetadata;
    neighbors: NeighborChunk[];
}

export interface Citation {
    readonly source: string;
    readonly page: number | null;
    readonly section: string | null;
    readonly excerpt: string;
    /** `score / max score` among the returned hits, in [0, 1] */
    readonly relevanceScore: number;
    readonly url: string | null;
    readonly turbineModel: string | null;
    readonly documentType: string | null;
}

export interface ResponseMetadata {
    modelKey: string;
    modelName: string;
    externalAttempted: boolean;
    fallbackUsed: boolean;
    generatedAt: string;
}

export type GuardrailResult =
    | { status: 'skipped' }
    | { status: 'passed' }
    | { status: 'intervened'; compliance: string; details?: string }
    | { status: 'error'; details: string };

export interface AgentState {
    sessionId: string;
    query: string;
    transformedQuery: string;
    queryMetadata?: QueryMetadata;
    messages: ChatMessage[];
    turbineModel: string | null;
    dataPoints: TelemetryReading[];
    dataFetchStatus?: DataFetchStatus;
    retrievedDocuments: RetrievalHit[];
    hierarchicalContext: string;
    citations: Citation[];
    llmResponse: string;
    responseMetadata?: ResponseMetadata;
    confidenceScore: number;
    guardrailResult?: GuardrailResult;
    errors: string[];
}

/** Fields a stage may set. `errors` is owned by the runner. */
export type StateUpdate = Partial<Omit<AgentState, 'errors' | 'sessionId' | 'query'>>;

export interface StageResult {
    update: StateUpdate;
    diagnostics: string[];
}

export interface PipelineStage {
    readonly name: string;
    run(state: Readonly<AgentState>): Promise<StageResult>;
}

export function stageResult(update: StateUpdate, diagnostics: string[] = []): StageResult {
    return { update, diagnostics };
}

export function createInitialState(sessionId: string, query: string, messages: ChatMessage[]): AgentState {
    return {
        sessionId,
        query,
        transformedQuery: query,
        messages: [...messages],
        turbineModel: null,
        dataPoints: [],
        retrievedDocuments: [],
        hierarchicalContext: '',
        citations: [],
        llmResponse: '',
        confidenceScore: 0,
        errors: [],
    };
}

/**
 * Merge a stage result into the state. Keys whose value is `undefined` are
 * ignored so a stage can never clear a field another stage already set.
 */
export function mergeState(state: AgentState, result: StageResult): AgentState {
    return {
        ...state,
        ...definedFields(result.update),
        errors: [...state.errors, ...result.diagnostics],
    };
}

function definedFields<T extends object>(update: T): Partial<T> {
    const out: Partial<T> = {};
    for (const key in update) {
        if (update[key] !== undefined) out[key] = update[key];
    }
    return out;
}
