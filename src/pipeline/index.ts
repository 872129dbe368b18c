/**
 * Pipeline assembly
 * Wires an AppConfig to the concrete clients and the five stages
 */

import { BedrockClient, BedrockGuardrail } from '../clients/bedrock.js';
import { S3DocumentLinker } from '../clients/documents.js';
import { GrokClient } from '../clients/grok.js';
import { OpenSearchClient } from '../clients/opensearch.js';
import { TelemetryClient } from '../clients/telemetry.js';
import {
    loadModelRegistry,
    loadTurbineModelTable,
    type AppConfig,
    type ModelRegistryConfig,
    type TurbineModelTable,
} from '../config.js';
import type {
    DocumentLinker,
    EmbeddingBackend,
    ExternalReasoningBackend,
    GuardrailService,
    ManagedLlmBackend,
    SearchIndex,
    TelemetryGateway,
} from './collaborators.js';
import { ModelRegistry } from './model-registry.js';
import { QueryTransformer } from './query-transformer.js';
import { ReasoningEngine } from './reasoning.js';
import { KnowledgeRetriever } from './retriever.js';
import { AgentPipeline } from './runner.js';
import { TelemetryFetcher } from './telemetry-fetcher.js';
import { TurbineModelDetector } from './turbine-models.js';
import { ResponseValidator } from './validator.js';

export interface PipelineParts {
    searchIndex: SearchIndex | null;
    embedder: EmbeddingBackend | null;
    telemetry: TelemetryGateway | null;
    managedLlm: ManagedLlmBackend | null;
    externalReasoning: ExternalReasoningBackend | null;
    guardrail: GuardrailService | null;
    documentLinker: DocumentLinker | null;
    modelRegistry: ModelRegistryConfig;
    turbineModels: TurbineModelTable;
    env: Readonly<Record<string, string | undefined>>;
    now?: () => Date;
}

export function assemblePipeline(config: AppConfig, parts: PipelineParts): AgentPipeline {
    const now = parts.now ?? (() => new Date());
    return new AgentPipeline([
        new QueryTransformer(new TurbineModelDetector(parts.turbineModels), now),
        new TelemetryFetcher(config.telemetry, parts.telemetry),
        new KnowledgeRetriever(
            parts.searchIndex,
            parts.embedder,
            { topK: config.search.topK, neighborWindow: config.search.neighborWindow },
            parts.documentLinker
        ),
        new ReasoningEngine(
            new ModelRegistry(parts.modelRegistry),
            parts.managedLlm,
            parts.externalReasoning,
            {
                modelKeyOverride: config.reasoning.modelKeyOverride,
                externalTimeoutMs: config.reasoning.externalTimeoutMs,
                env: parts.env,
            },
            now
        ),
        new ResponseValidator(config.confidence, parts.guardrail),
    ], now);
}

/**
 * Build the production pipeline. Parts given in `overrides` replace the
 * ones derived from the config; pass `null` to switch a collaborator off.
 */
export async function createPipeline(config: AppConfig, overrides: Partial<PipelineParts> = {}): Promise<AgentPipeline> {
    const bedrock = new BedrockClient({
        region: config.region,
        embeddingModel: config.embeddingModel,
        timeoutMs: config.bedrockTimeoutMs,
    });

    const searchIndex = config.search.endpoint
        ? new OpenSearchClient({
            endpoint: config.search.endpoint,
            index: config.search.index,
            username: config.search.username,
            password: config.search.password,
            timeoutMs: config.search.timeoutMs,
        })
        : null;

    const telemetry = config.telemetry.enabled && config.telemetry.endpoint
        ? new TelemetryClient({
            endpoint: config.telemetry.endpoint,
            apiKey: config.telemetry.apiKey,
            timeoutMs: config.telemetry.timeoutMs,
        })
        : null;

    const guardrail = config.guardrail.id
        ? new BedrockGuardrail(bedrock.client, {
            guardrailId: config.guardrail.id,
            guardrailVersion: config.guardrail.version,
            timeoutMs: config.bedrockTimeoutMs,
        })
        : null;

    const documentLinker = config.documents.bucket
        ? new S3DocumentLinker({
            bucket: config.documents.bucket,
            region: config.region,
            expiresInSeconds: config.documents.urlTtlSeconds,
        })
        : null;

    const parts: PipelineParts = {
        searchIndex,
        embedder: bedrock,
        telemetry,
        managedLlm: bedrock,
        externalReasoning: new GrokClient(),
        guardrail,
        documentLinker,
        modelRegistry: overrides.modelRegistry ?? await loadModelRegistry(config.modelConfigPath),
        turbineModels: overrides.turbineModels ?? await loadTurbineModelTable(config.turbineModelsPath),
        env: { ...process.env },
        ...overrides,
    };

    return assemblePipeline(config, parts);
}

export { AgentPipeline, buildResponse, generateSessionId, validateRequest } from './runner.js';
export type { PipelineHooks, PipelineRequest, PipelineResponse } from './runner.js';
export type * from './state.js';
export type * from './collaborators.js';
export { ModelRegistry, BASELINE_MODEL } from './model-registry.js';
export { NO_DOCUMENTATION_SENTINEL } from './retriever.js';
export { REASONING_FAILURE_SENTINEL } from './reasoning.js';
export { LOW_CONFIDENCE_NOTICE, SAFE_REFUSAL } from './validator.js';
