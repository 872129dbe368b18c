import { describe, it, expect } from 'vitest';
import {
    buildInvokeBody,
    extractCompletionText,
    modelFamily,
    parseEmbedding,
    toGuardrailVerdict,
} from './bedrock.js';
import type { ManagedInvocation } from '../pipeline/collaborators.js';

function invocation(modelId: string, overrides: Partial<ManagedInvocation> = {}): ManagedInvocation {
    return {
        modelId,
        systemPrompt: 'system',
        userPrompt: 'question',
        history: [{ role: 'user', content: 'earlier' }, { role: 'assistant', content: 'reply' }],
        maxTokens: 512,
        temperature: 0.2,
        ...overrides,
    };
}

describe('modelFamily', () => {
    it('recognises each family and defaults to the Anthropic format', () => {
        expect(modelFamily('anthropic.claude-3-5-sonnet-20241022-v2:0')).toBe('anthropic');
        expect(modelFamily('amazon.nova-pro-v1:0')).toBe('nova');
        expect(modelFamily('amazon.titan-text-express-v1')).toBe('titan');
        expect(modelFamily('meta.llama3-70b')).toBe('anthropic');
    });
});

describe('buildInvokeBody', () => {
    it('builds an Anthropic messages body', () => {
        expect(buildInvokeBody(invocation('anthropic.claude-3-haiku'))).toEqual({
            anthropic_version: 'bedrock-2023-05-31',
            max_tokens: 512,
            temperature: 0.2,
            system: 'system',
            messages: [
                { role: 'user', content: [{ type: 'text', text: 'earlier' }] },
                { role: 'assistant', content: [{ type: 'text', text: 'reply' }] },
                { role: 'user', content: [{ type: 'text', text: 'question' }] },
            ],
        });
    });

    it('builds a Nova body with inference config', () => {
        expect(buildInvokeBody(invocation('amazon.nova-pro-v1:0', { history: [], topP: 0.9 }))).toEqual({
            system: [{ text: 'system' }],
            messages: [{ role: 'user', content: [{ text: 'question' }] }],
            inferenceConfig: { maxTokens: 512, temperature: 0.2, topP: 0.9 },
        });
    });

    it('folds the system prompt into the Titan input text', () => {
        expect(buildInvokeBody(invocation('amazon.titan-text-express-v1'))).toEqual({
            inputText: 'system\n\nquestion',
            textGenerationConfig: { maxTokenCount: 512, temperature: 0.2 },
        });
    });
});

describe('extractCompletionText', () => {
    it('joins Anthropic text blocks', () => {
        const body = { content: [{ type: 'text', text: 'Hello ' }, { type: 'tool_use' }, { type: 'text', text: 'world' }] };
        expect(extractCompletionText('anthropic.claude-3-haiku', body)).toBe('Hello world');
    });

    it('reads the Nova output message', () => {
        const body = { output: { message: { role: 'assistant', content: [{ text: 'Nova answer' }] } } };
        expect(extractCompletionText('amazon.nova-pro-v1:0', body)).toBe('Nova answer');
    });

    it('reads Titan results', () => {
        const body = { results: [{ outputText: 'Titan answer' }] };
        expect(extractCompletionText('amazon.titan-text-express-v1', body)).toBe('Titan answer');
    });

    it('returns an empty string when there is no text', () => {
        expect(extractCompletionText('amazon.nova-pro-v1:0', { results: [] })).toBe('');
        expect(extractCompletionText('anthropic.claude-3-haiku', 'not json')).toBe('');
    });
});

describe('parseEmbedding', () => {
    it('returns the embedding vector', () => {
        expect(parseEmbedding({ embedding: [0.1, -0.2], inputTextTokenCount: 3 })).toEqual([0.1, -0.2]);
    });

    it('rejects a missing or malformed vector', () => {
        expect(() => parseEmbedding({})).toThrow('Embedding response has no embedding vector');
        expect(() => parseEmbedding({ embedding: [1, 'x'] })).toThrow('Embedding vector is empty or malformed');
    });
});

describe('toGuardrailVerdict', () => {
    it('passes when the guardrail does not intervene', () => {
        expect(toGuardrailVerdict({ action: 'NONE', outputs: [], assessments: [] })).toEqual({ status: 'passed' });
    });

    it('names the blocking policy on intervention', () => {
        const verdict = toGuardrailVerdict({
            action: 'GUARDRAIL_INTERVENED',
            outputs: [{ text: 'Blocked.' }],
            assessments: [{
                topicPolicy: { topics: [{ name: 'bypass', type: 'DENY', action: 'BLOCKED' }] },
            }],
        });
        expect(verdict).toEqual({ status: 'intervened', compliance: 'TOPIC_POLICY', details: 'Blocked.' });
    });

    it('falls back to the action name when no policy is reported', () => {
        expect(toGuardrailVerdict({ action: 'GUARDRAIL_INTERVENED', outputs: [], assessments: [] }))
            .toEqual({ status: 'intervened', compliance: 'GUARDRAIL_INTERVENED' });
    });
});
