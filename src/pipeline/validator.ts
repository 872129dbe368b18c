import type { ConfidenceConfig } from '../config.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { GuardrailService } from './collaborators.js';
import {
    stageResult,
    type AgentState,
    type Citation,
    type GuardrailResult,
    type PipelineStage,
    type StageResult,
} from './state.js';

export const SAFE_REFUSAL =
    "I'm unable to provide that information because it may conflict with safety or compliance policies. " +
    'Please consult the official turbine documentation or a qualified engineer.';

export const LOW_CONFIDENCE_NOTICE =
    '\n\n⚠️ Confidence in this answer is low. Please verify against official documentation or consult a qualified engineer.';

function round3(value: number): number {
    return Math.round(value * 1000) / 1000;
}

export function scoreConfidence(
    citations: readonly Citation[],
    hasTelemetry: boolean,
    config: Omit<ConfidenceConfig, 'minimum'>
): number {
    let score: number;
    if (citations.length === 0) {
        score = config.noCitationBase;
    } else {
        const mean = citations.reduce((sum, citation) => sum + citation.relevanceScore, 0) / citations.length;
        score = config.base + config.relevanceWeight * mean;
    }

    if (hasTelemetry) score += config.telemetryBonus;
    return round3(Math.min(score, config.cap));
}

/**
 * Scores the draft, runs it past the guardrail and flags low confidence.
 */
export class ResponseValidator implements PipelineStage {
    readonly name = 'response-validator';

    constructor(
        private config: ConfidenceConfig,
        private guardrail: GuardrailService | null
    ) { }

    async run(state: Readonly<AgentState>): Promise<StageResult> {
        const diagnostics: string[] = [];
        const confidenceScore = scoreConfidence(state.citations, state.dataPoints.length > 0, this.config);

        let response = state.llmResponse;
        let guardrailResult: GuardrailResult = { status: 'skipped' };

        if (this.guardrail) {
            try {
                const verdict = await this.guardrail.evaluate(response, {
                    confidenceScore,
                    turbineModel: state.turbineModel,
                });
                guardrailResult = verdict;
                if (verdict.status === 'intervened') {
                    logger.warn(`Guardrail intervened: ${verdict.compliance}`);
                    diagnostics.push(`Guardrail intervened: ${verdict.compliance}`);
                    response = SAFE_REFUSAL;
                }
            } catch (error) {
                const message = describeError(error);
                logger.warn(`Guardrail check failed: ${message}`);
                diagnostics.push(`Guardrail check failed: ${message}`);
                guardrailResult = { status: 'error', details: message };
            }
        }

        if (confidenceScore < this.config.minimum) {
            diagnostics.push(`Confidence ${confidenceScore} below threshold ${this.config.minimum}`);
            response += LOW_CONFIDENCE_NOTICE;
        }

        return stageResult({ llmResponse: response, confidenceScore, guardrailResult }, diagnostics);
    }
}
