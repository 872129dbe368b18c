import { randomUUID } from 'node:crypto';
import { QueryValidationError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import {
    createInitialState,
    mergeState,
    type AgentState,
    type ChatMessage,
    type Citation,
    type DataFetchStatus,
    type GuardrailResult,
    type PipelineStage,
    type ResponseMetadata,
    type TelemetryReading,
} from './state.js';

export interface PipelineRequest {
    sessionId?: string;
    query: string;
    messages?: ChatMessage[];
}

export interface PipelineResponse {
    sessionId: string;
    response: string;
    citations: Citation[];
    confidenceScore: number;
    turbineModel: string | null;
    dataPoints: TelemetryReading[];
    dataFetchStatus: DataFetchStatus;
    guardrailResult: GuardrailResult;
    responseMetadata: ResponseMetadata | null;
    errors: string[];
    /** Prior history plus this exchange */
    messages: ChatMessage[];
}

export interface PipelineHooks {
    onStageStart?: (stage: string) => void;
}

export function generateSessionId(): string {
    return `session-${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export interface ValidatedRequest {
    sessionId: string;
    query: string;
    messages: ChatMessage[];
}

export function validateRequest(request: PipelineRequest): ValidatedRequest {
    const query = typeof request.query === 'string' ? request.query.trim() : '';
    if (!query) {
        throw new QueryValidationError('Query must not be empty');
    }

    const sessionId = request.sessionId?.trim() || generateSessionId();
    return { sessionId, query, messages: request.messages ?? [] };
}

export function buildResponse(state: AgentState, answeredAt: Date): PipelineResponse {
    const timestamp = answeredAt.toISOString();
    return {
        sessionId: state.sessionId,
        response: state.llmResponse,
        citations: state.citations,
        confidenceScore: state.confidenceScore,
        turbineModel: state.turbineModel,
        dataPoints: state.dataPoints,
        dataFetchStatus: state.dataFetchStatus ?? 'disabled',
        guardrailResult: state.guardrailResult ?? { status: 'skipped' },
        responseMetadata: state.responseMetadata ?? null,
        errors: state.errors,
        messages: [
            ...state.messages,
            { role: 'user', content: state.query, timestamp },
            { role: 'assistant', content: state.llmResponse, timestamp },
        ],
    };
}

/**
 * Runs the stages in order over one request. A stage that throws is
 * recorded and skipped; the pipeline itself never rejects once the
 * request is valid.
 */
export class AgentPipeline {
    constructor(
        private stages: PipelineStage[],
        private now: () => Date = () => new Date()
    ) { }

    get stageNames(): string[] {
        return this.stages.map((stage) => stage.name);
    }

    async execute(initial: AgentState, hooks: PipelineHooks = {}): Promise<AgentState> {
        let state = initial;
        for (const stage of this.stages) {
            hooks.onStageStart?.(stage.name);
            logger.debug(`Stage ${stage.name} started`);
            try {
                state = mergeState(state, await stage.run(state));
            } catch (error) {
                const message = describeError(error);
                logger.error(`${stage.name} stage failed: ${message}`);
                state = { ...state, errors: [...state.errors, `${stage.name} stage failed: ${message}`] };
            }
        }
        return state;
    }

    async run(request: PipelineRequest, hooks: PipelineHooks = {}): Promise<PipelineResponse> {
        const { sessionId, query, messages } = validateRequest(request);
        const state = await this.execute(createInitialState(sessionId, query, messages), hooks);

        if (state.errors.length > 0) {
            logger.info(`Session ${sessionId} answered with ${state.errors.length} diagnostic(s)`);
        }
        return buildResponse(state, this.now());
    }
}
