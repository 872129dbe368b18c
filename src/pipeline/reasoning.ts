import type { ModelEntry } from '../config.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { ExternalReasoningBackend, HistoryTurn, ManagedLlmBackend } from './collaborators.js';
import type { ModelRegistry } from './model-registry.js';
import { SYSTEM_PROMPT, buildHistory, buildUserPrompt } from './prompts.js';
import { stageResult, type AgentState, type PipelineStage, type ResponseMetadata, type StageResult } from './state.js';

export const REASONING_FAILURE_SENTINEL =
    "I'm sorry, I was unable to generate a response at this time. Please try again or contact support.";

export interface ReasoningOptions {
    /** LLM_MODEL_KEY */
    modelKeyOverride?: string;
    externalTimeoutMs: number;
    /** Where required credentials of external backends are looked up */
    env: Readonly<Record<string, string | undefined>>;
}

interface Prompts {
    systemPrompt: string;
    userPrompt: string;
    history: HistoryTurn[];
}

/**
 * Produces the draft answer. Tries the primary model once, then the
 * fallback once; when both fail the answer is a fixed apology.
 */
export class ReasoningEngine implements PipelineStage {
    readonly name = 'reasoning-engine';

    constructor(
        private registry: ModelRegistry,
        private managed: ManagedLlmBackend | null,
        private external: ExternalReasoningBackend | null,
        private options: ReasoningOptions,
        private now: () => Date = () => new Date()
    ) { }

    async run(state: Readonly<AgentState>): Promise<StageResult> {
        const { primary, fallback, diagnostics } = this.registry.resolve(this.options.modelKeyOverride);
        const prompts: Prompts = {
            systemPrompt: SYSTEM_PROMPT,
            userPrompt: buildUserPrompt(state),
            history: buildHistory(state.messages),
        };

        const externalAttempted = primary.backend.type === 'external-http';
        logger.debug(`Reasoning with ${primary.key}${fallback ? ` (fallback ${fallback.key})` : ''}`);

        const primaryText = await this.attempt(primary, prompts, diagnostics);
        if (primaryText) {
            return stageResult({
                llmResponse: primaryText,
                responseMetadata: this.metadata(primary, externalAttempted, false),
            }, diagnostics);
        }

        if (fallback) {
            if (fallback.backend.type !== 'managed-llm') {
                diagnostics.push(`Fallback model ${fallback.key} is not a managed LLM`);
            } else {
                logger.warn(`Primary model ${primary.key} failed, falling back to ${fallback.key}`);
                const fallbackText = await this.attempt(fallback, prompts, diagnostics);
                if (fallbackText) {
                    return stageResult({
                        llmResponse: fallbackText,
                        responseMetadata: this.metadata(fallback, externalAttempted, true),
                    }, diagnostics);
                }
            }
        }

        logger.warn('No reasoning backend produced a response');
        diagnostics.push('No reasoning backend produced a response');
        return stageResult({
            llmResponse: REASONING_FAILURE_SENTINEL,
            responseMetadata: this.metadata(primary, externalAttempted, false),
        }, diagnostics);
    }

    private metadata(entry: ModelEntry, externalAttempted: boolean, fallbackUsed: boolean): ResponseMetadata {
        return {
            modelKey: entry.key,
            modelName: entry.displayName,
            externalAttempted,
            fallbackUsed,
            generatedAt: this.now().toISOString(),
        };
    }

    /** One call to the entry's backend. Failures become diagnostics and null. */
    private async attempt(entry: ModelEntry, prompts: Prompts, diagnostics: string[]): Promise<string | null> {
        try {
            const text = entry.backend.type === 'managed-llm'
                ? await this.invokeManaged(entry, entry.backend.modelId, prompts, diagnostics)
                : await this.invokeExternal(entry, entry.backend, prompts, diagnostics);
            if (text === undefined) return null;

            const trimmed = text?.trim() ?? '';
            if (!trimmed) {
                diagnostics.push(`Model ${entry.key} returned an empty response`);
                return null;
            }
            return trimmed;
        } catch (error) {
            const message = describeError(error);
            logger.warn(`Model ${entry.key} failed: ${message}`);
            diagnostics.push(`Model ${entry.key} failed: ${message}`);
            return null;
        }
    }

    /** Resolves to undefined when the call could not be made at all */
    private async invokeManaged(entry: ModelEntry, modelId: string, prompts: Prompts, diagnostics: string[]): Promise<string | undefined> {
        if (!this.managed) {
            diagnostics.push(`Model ${entry.key} unavailable: managed LLM backend is not configured`);
            return undefined;
        }
        return this.managed.invoke({
            modelId,
            ...prompts,
            maxTokens: entry.inference.maxTokens,
            temperature: entry.inference.temperature,
            topP: entry.inference.topP,
        });
    }

    private async invokeExternal(
        entry: ModelEntry,
        backend: Extract<ModelEntry['backend'], { type: 'external-http' }>,
        prompts: Prompts,
        diagnostics: string[]
    ): Promise<string | null | undefined> {
        if (!this.external) {
            diagnostics.push(`Model ${entry.key} unavailable: external reasoning backend is not configured`);
            return undefined;
        }

        const missing = backend.requiredEnv.filter((name) => !this.options.env[name]?.trim());
        if (missing.length > 0) {
            diagnostics.push(`Model ${entry.key} unavailable: missing ${missing.join(', ')}`);
            return undefined;
        }

        // The first required variable holds the bearer credential.
        const [credential] = backend.requiredEnv;
        return this.external.invoke({
            endpoint: backend.endpoint,
            model: backend.model,
            apiKey: credential ? this.options.env[credential]?.trim() ?? '' : '',
            ...prompts,
            maxTokens: entry.inference.maxTokens,
            temperature: entry.inference.temperature,
            timeoutMs: this.options.externalTimeoutMs,
        });
    }
}
