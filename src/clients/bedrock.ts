/**
 * Bedrock runtime client
 * Embeddings, managed LLM invocation and guardrail checks
 */

import {
    ApplyGuardrailCommand,
    BedrockRuntimeClient,
    InvokeModelCommand,
    type ApplyGuardrailCommandOutput,
} from '@aws-sdk/client-bedrock-runtime';
import { GuardrailError, ReasoningError, RetrievalError, describeError } from '../errors.js';
import { createTimeoutSignal, isRecord } from '../utils/http.js';
import type {
    EmbeddingBackend,
    GuardrailContext,
    GuardrailService,
    GuardrailVerdict,
    HistoryTurn,
    ManagedInvocation,
    ManagedLlmBackend,
} from '../pipeline/collaborators.js';

const ANTHROPIC_VERSION = 'bedrock-2023-05-31';

export type ModelFamily = 'anthropic' | 'nova' | 'titan';

/** Anything that is neither Nova nor Titan is sent in the Anthropic format */
export function modelFamily(modelId: string): ModelFamily {
    const id = modelId.toLowerCase();
    if (id.includes('claude')) return 'anthropic';
    if (id.includes('nova')) return 'nova';
    if (id.includes('amazon.titan')) return 'titan';
    return 'anthropic';
}

function anthropicMessages(history: HistoryTurn[], userPrompt: string) {
    return [...history, { role: 'user' as const, content: userPrompt }].map((turn) => ({
        role: turn.role,
        content: [{ type: 'text', text: turn.content }],
    }));
}

function novaMessages(history: HistoryTurn[], userPrompt: string) {
    return [...history, { role: 'user' as const, content: userPrompt }].map((turn) => ({
        role: turn.role,
        content: [{ text: turn.content }],
    }));
}

export function buildInvokeBody(request: ManagedInvocation): Record<string, unknown> {
    const { modelId, systemPrompt, userPrompt, history, maxTokens, temperature, topP } = request;

    switch (modelFamily(modelId)) {
        case 'nova':
            return {
                system: [{ text: systemPrompt }],
                messages: novaMessages(history, userPrompt),
                inferenceConfig: {
                    maxTokens,
                    temperature,
                    ...(topP !== undefined ? { topP } : {}),
                },
            };
        case 'titan':
            return {
                inputText: `${systemPrompt}\n\n${userPrompt}`,
                textGenerationConfig: {
                    maxTokenCount: maxTokens,
                    temperature,
                    ...(topP !== undefined ? { topP } : {}),
                },
            };
        case 'anthropic':
            return {
                anthropic_version: ANTHROPIC_VERSION,
                max_tokens: maxTokens,
                temperature,
                ...(topP !== undefined ? { top_p: topP } : {}),
                system: systemPrompt,
                messages: anthropicMessages(history, userPrompt),
            };
    }
}

function joinTextParts(items: unknown): string {
    if (!Array.isArray(items)) return '';
    const parts: string[] = [];
    for (const item of items) {
        if (!isRecord(item)) continue;
        if (item.type !== undefined && item.type !== 'text') continue;
        const text = typeof item.text === 'string' ? item.text : item.value;
        if (typeof text === 'string' && text) parts.push(text);
    }
    return parts.join('');
}

function messageText(output: unknown): string {
    if (!isRecord(output) || !isRecord(output.message)) return '';
    return joinTextParts(output.message.content);
}

/**
 * Pull the completion text out of a model response body. Returns an empty
 * string when the body carries no text.
 */
export function extractCompletionText(modelId: string, body: unknown): string {
    if (!isRecord(body)) return '';

    if (modelFamily(modelId) === 'anthropic') {
        return joinTextParts(body.content);
    }

    // Nova and Titan
    if (Array.isArray(body.results) && body.results.length > 0) {
        const [first] = body.results;
        if (isRecord(first)) {
            if (typeof first.outputText === 'string' && first.outputText) return first.outputText;
            const fromMessage = messageText(first.output);
            if (fromMessage) return fromMessage;
            const fromItems = joinTextParts(first.output);
            if (fromItems) return fromItems;
        }
    }
    return messageText(body.output);
}

export function parseEmbedding(body: unknown): number[] {
    if (!isRecord(body) || !Array.isArray(body.embedding)) {
        throw new RetrievalError('Embedding response has no embedding vector');
    }
    const vector = body.embedding.filter((value): value is number => typeof value === 'number');
    if (vector.length === 0 || vector.length !== body.embedding.length) {
        throw new RetrievalError('Embedding vector is empty or malformed');
    }
    return vector;
}

/**
 * Map an ApplyGuardrail response onto a verdict. The compliance code is the
 * first policy that blocked the content, or the raw action when the
 * assessments do not name one.
 */
export function toGuardrailVerdict(output: Pick<ApplyGuardrailCommandOutput, 'action' | 'outputs' | 'assessments'>): GuardrailVerdict {
    if (output.action !== 'GUARDRAIL_INTERVENED') {
        return { status: 'passed' };
    }

    const details = (output.outputs ?? [])
        .map((item) => item.text ?? '')
        .filter((text) => text.length > 0)
        .join('\n');

    return {
        status: 'intervened',
        compliance: blockingPolicy(output.assessments) ?? 'GUARDRAIL_INTERVENED',
        ...(details ? { details } : {}),
    };
}

function blockingPolicy(assessments: ApplyGuardrailCommandOutput['assessments']): string | undefined {
    for (const assessment of assessments ?? []) {
        if (assessment.topicPolicy?.topics?.some((topic) => topic.action === 'BLOCKED')) return 'TOPIC_POLICY';
        if (assessment.contentPolicy?.filters?.some((filter) => filter.action === 'BLOCKED')) return 'CONTENT_POLICY';
        if (assessment.wordPolicy?.customWords?.some((word) => word.action === 'BLOCKED')) return 'WORD_POLICY';
        if (assessment.sensitiveInformationPolicy?.piiEntities?.some((entity) => entity.action === 'BLOCKED')) {
            return 'SENSITIVE_INFORMATION_POLICY';
        }
    }
    return undefined;
}

/** Run one SDK call under a timeout, reporting it the way the fetch clients do */
async function withTimeout<T>(timeoutMs: number, call: (abortSignal: AbortSignal) => Promise<T>): Promise<T> {
    const { signal, cleanup } = createTimeoutSignal(timeoutMs);
    try {
        return await call(signal);
    } catch (error) {
        if (signal.aborted) throw new Error(`Request timed out after ${timeoutMs}ms`);
        throw error;
    } finally {
        cleanup();
    }
}

export interface BedrockClientOptions {
    region: string;
    embeddingModel: string;
    timeoutMs: number;
    runtime?: BedrockRuntimeClient;
}

export class BedrockClient implements EmbeddingBackend, ManagedLlmBackend {
    private runtime: BedrockRuntimeClient;
    private embeddingModel: string;
    private timeoutMs: number;

    constructor(options: BedrockClientOptions) {
        this.runtime = options.runtime ?? new BedrockRuntimeClient({ region: options.region });
        this.embeddingModel = options.embeddingModel;
        this.timeoutMs = options.timeoutMs;
    }

    get client(): BedrockRuntimeClient {
        return this.runtime;
    }

    private async invokeJson(modelId: string, body: unknown): Promise<unknown> {
        const command = new InvokeModelCommand({
            modelId,
            body: JSON.stringify(body),
            contentType: 'application/json',
            accept: 'application/json',
        });
        const response = await withTimeout(this.timeoutMs, (abortSignal) => this.runtime.send(command, { abortSignal }));
        return JSON.parse(response.body.transformToString());
    }

    async embed(text: string): Promise<number[]> {
        try {
            return parseEmbedding(await this.invokeJson(this.embeddingModel, { inputText: text }));
        } catch (error) {
            if (error instanceof RetrievalError) throw error;
            throw new RetrievalError(`Embedding failed: ${describeError(error)}`, text);
        }
    }

    async invoke(request: ManagedInvocation): Promise<string> {
        let body: unknown;
        try {
            body = await this.invokeJson(request.modelId, buildInvokeBody(request));
        } catch (error) {
            throw new ReasoningError(request.modelId, describeError(error));
        }
        return extractCompletionText(request.modelId, body);
    }
}

export interface BedrockGuardrailOptions {
    guardrailId: string;
    guardrailVersion: string;
    timeoutMs: number;
}

export class BedrockGuardrail implements GuardrailService {
    constructor(
        private runtime: BedrockRuntimeClient,
        private options: BedrockGuardrailOptions
    ) { }

    async evaluate(text: string, context: GuardrailContext): Promise<GuardrailVerdict> {
        const query = `Turbine model: ${context.turbineModel ?? 'unknown'}; answer confidence: ${context.confidenceScore}`;

        try {
            const command = new ApplyGuardrailCommand({
                guardrailIdentifier: this.options.guardrailId,
                guardrailVersion: this.options.guardrailVersion,
                source: 'OUTPUT',
                content: [
                    { text: { text, qualifiers: ['guard_content'] } },
                    { text: { text: query, qualifiers: ['query'] } },
                ],
            });
            const output = await withTimeout(this.options.timeoutMs, (abortSignal) => this.runtime.send(command, { abortSignal }));
            return toGuardrailVerdict(output);
        } catch (error) {
            throw new GuardrailError(describeError(error));
        }
    }
}
