import type { TurbineModelDetector } from './turbine-models.js';
import {
    stageResult,
    type AgentState,
    type ChatMessage,
    type LanguageHint,
    type PipelineStage,
    type QueryMetadata,
    type StageResult,
} from './state.js';

const HISTORY_TURNS = 3;
const NON_ASCII_THRESHOLD = 0.2;

/**
 * Coarse language flag. Not a language identifier: anything that is mostly
 * ASCII is treated as English.
 */
export function detectLanguage(text: string): LanguageHint {
    const codePoints = Array.from(text);
    if (codePoints.length === 0) return 'en';
    const nonAscii = codePoints.filter((ch) => (ch.codePointAt(0) ?? 0) > 0x7f).length;
    return nonAscii / codePoints.length > NON_ASCII_THRESHOLD ? 'unknown-non-ascii' : 'en';
}

export function recentUserTurns(messages: readonly ChatMessage[], limit: number = HISTORY_TURNS): string[] {
    return messages
        .filter((message) => message.role === 'user')
        .slice(-limit)
        .map((message) => message.content);
}

export function qualifyQuery(query: string, turbineModel: string | null): string {
    return turbineModel ? `${query} (turbine model: ${turbineModel})` : query;
}

export class QueryTransformer implements PipelineStage {
    readonly name = 'query-transformer';

    constructor(
        private detector: TurbineModelDetector,
        private now: () => Date = () => new Date()
    ) { }

    async run(state: Readonly<AgentState>): Promise<StageResult> {
        const turbineModel = this.detector.detect(state.query);

        const queryMetadata: QueryMetadata = {
            detectedModel: turbineModel,
            language: detectLanguage(state.query),
            timestamp: this.now().toISOString(),
            historyContext: recentUserTurns(state.messages),
        };

        return stageResult({
            transformedQuery: qualifyQuery(state.query, turbineModel),
            turbineModel,
            queryMetadata,
        });
    }
}
