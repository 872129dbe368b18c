import { describe, it, expect, vi } from 'vitest';
import { QueryValidationError } from '../errors.js';
import { AgentPipeline, generateSessionId, validateRequest } from './runner.js';
import { createInitialState, mergeState, stageResult, type PipelineStage } from './state.js';

function stage(name: string, run: PipelineStage['run']): PipelineStage {
    return { name, run };
}

describe('mergeState', () => {
    it('ignores undefined values and appends diagnostics', () => {
        const state = { ...createInitialState('s', 'q', []), turbineModel: 'SMT60', errors: ['first'] };

        const next = mergeState(state, stageResult({ turbineModel: undefined, llmResponse: 'answer' }, ['second']));

        expect(next.turbineModel).toBe('SMT60');
        expect(next.llmResponse).toBe('answer');
        expect(next.errors).toEqual(['first', 'second']);
        expect(state.llmResponse).toBe('');
    });
});

describe('validateRequest', () => {
    it('rejects an empty or blank query', () => {
        expect(() => validateRequest({ query: '' })).toThrow(QueryValidationError);
        expect(() => validateRequest({ query: '   \n' })).toThrow('Query must not be empty');
    });

    it('keeps a given session id and generates one otherwise', () => {
        expect(validateRequest({ query: ' q ', sessionId: 'session-1' })).toEqual({ sessionId: 'session-1', query: 'q', messages: [] });
        expect(validateRequest({ query: 'q' }).sessionId).toMatch(/^session-[0-9a-f]{12}$/);
    });

    it('generates distinct session ids', () => {
        expect(generateSessionId()).not.toBe(generateSessionId());
    });
});

describe('AgentPipeline', () => {
    const now = () => new Date('2026-05-01T12:00:00.000Z');

    it('runs stages in order and records a throwing stage', async () => {
        const order: string[] = [];
        const pipeline = new AgentPipeline([
            stage('first', async () => {
                order.push('first');
                return stageResult({ turbineModel: 'SMT60' });
            }),
            stage('broken', async () => {
                order.push('broken');
                throw new Error('unexpected');
            }),
            stage('last', async (state) => {
                order.push('last');
                return stageResult({ llmResponse: `model ${state.turbineModel}` });
            }),
        ], now);

        const response = await pipeline.run({ sessionId: 'session-x', query: 'q' });

        expect(order).toEqual(['first', 'broken', 'last']);
        expect(response.response).toBe('model SMT60');
        expect(response.errors).toEqual(['broken stage failed: unexpected']);
    });

    it('shapes the response and echoes the exchange', async () => {
        const history = [{ role: 'user' as const, content: 'earlier', timestamp: '2026-04-30T00:00:00.000Z' }];
        const pipeline = new AgentPipeline([
            stage('answer', async () => stageResult({ llmResponse: 'Done.', confidenceScore: 0.8 })),
        ], now);

        const response = await pipeline.run({ sessionId: 'session-y', query: 'next', messages: history });

        expect(response).toEqual({
            sessionId: 'session-y',
            response: 'Done.',
            citations: [],
            confidenceScore: 0.8,
            turbineModel: null,
            dataPoints: [],
            dataFetchStatus: 'disabled',
            guardrailResult: { status: 'skipped' },
            responseMetadata: null,
            errors: [],
            messages: [
                history[0],
                { role: 'user', content: 'next', timestamp: '2026-05-01T12:00:00.000Z' },
                { role: 'assistant', content: 'Done.', timestamp: '2026-05-01T12:00:00.000Z' },
            ],
        });
    });

    it('reports stage starts to the hooks', async () => {
        const onStageStart = vi.fn();
        const pipeline = new AgentPipeline([stage('only', async () => stageResult({}))], now);

        await pipeline.run({ query: 'q' }, { onStageStart });

        expect(onStageStart).toHaveBeenCalledWith('only');
    });

    it('validates before running any stage', async () => {
        const run = vi.fn();
        const pipeline = new AgentPipeline([stage('never', run)], now);

        await expect(pipeline.run({ query: ' ' })).rejects.toThrow(QueryValidationError);
        expect(run).not.toHaveBeenCalled();
    });
});
