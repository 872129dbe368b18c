/**
 * Turbine assistant
 * Session-aware front door to the answer pipeline
 */

import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import {
    validateRequest,
    type AgentPipeline,
    type PipelineHooks,
    type PipelineRequest,
    type PipelineResponse,
} from '../pipeline/index.js';
import type { ChatMessage } from '../pipeline/state.js';
import type { SessionRecord, SessionStore } from '../sessions/store.js';

export class TurbineAssistant {
    constructor(
        private pipeline: AgentPipeline,
        private store: SessionStore
    ) { }

    /**
     * Answer one question. History comes from the request when given,
     * otherwise from the stored session. Storage failures are logged and
     * never fail the answer.
     */
    async ask(request: PipelineRequest, hooks: PipelineHooks = {}): Promise<PipelineResponse> {
        const { sessionId, query } = validateRequest(request);
        const messages = request.messages ?? await this.loadHistory(sessionId);

        const response = await this.pipeline.run({ sessionId, query, messages }, hooks);

        try {
            await this.store.save(sessionId, response.messages);
        } catch (error) {
            logger.warn(`Could not save session ${sessionId}: ${describeError(error)}`);
        }
        return response;
    }

    async history(sessionId: string): Promise<SessionRecord | null> {
        return this.store.load(sessionId);
    }

    async remove(sessionId: string): Promise<boolean> {
        return this.store.delete(sessionId);
    }

    private async loadHistory(sessionId: string): Promise<ChatMessage[]> {
        try {
            const record = await this.store.load(sessionId);
            return record?.messages ?? [];
        } catch (error) {
            logger.warn(`Could not load session ${sessionId}, starting fresh: ${describeError(error)}`);
            return [];
        }
    }
}
