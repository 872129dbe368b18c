/**
 * Unit tests for the Grok chat client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GrokClient } from './grok.js';
import type { ExternalInvocation } from '../pipeline/collaborators.js';

const mockFetch = vi.fn();
global.fetch = mockFetch;

const ENDPOINT = 'https://grok.test/v1/chat/completions';

function request(overrides: Partial<ExternalInvocation> = {}): ExternalInvocation {
    return {
        endpoint: ENDPOINT,
        model: 'grok-test',
        apiKey: 'test-key',
        systemPrompt: 'You are helpful.',
        userPrompt: 'What is the oil pressure limit?',
        history: [{ role: 'user', content: 'hi' }],
        maxTokens: 256,
        temperature: 0.3,
        timeoutMs: 1000,
        ...overrides,
    };
}

describe('GrokClient', () => {
    let client: GrokClient;

    beforeEach(() => {
        vi.clearAllMocks();
        client = new GrokClient();
    });

    it('should send a chat completion request with history', async () => {
        mockFetch.mockResolvedValueOnce({
            ok: true,
            status: 200,
            json: () => Promise.resolve({
                id: 'chat-1',
                choices: [{ message: { role: 'assistant', content: '  Keep it above 25 psi.  ' }, finish_reason: 'stop' }],
                usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
            }),
        });

        const text = await client.invoke(request());

        expect(text).toBe('Keep it above 25 psi.');
        expect(mockFetch).toHaveBeenCalledWith(
            ENDPOINT,
            expect.objectContaining({
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: 'Bearer test-key',
                },
                body: JSON.stringify({
                    model: 'grok-test',
                    messages: [
                        { role: 'system', content: 'You are helpful.' },
                        { role: 'user', content: 'hi' },
                        { role: 'user', content: 'What is the oil pressure limit?' },
                    ],
                    stream: false,
                    temperature: 0.3,
                    max_tokens: 256,
                }),
            })
        );
    });

    it('should return null when the completion is empty', async () => {
        mockFetch.mockResolvedValueOnce({
            ok: true,
            status: 200,
            json: () => Promise.resolve({ id: 'chat-2', choices: [{ message: { role: 'assistant', content: '   ' } }] }),
        });

        expect(await client.invoke(request())).toBeNull();
    });

    it('should fail without an API key and not call the service', async () => {
        await expect(client.invoke(request({ apiKey: '' }))).rejects.toThrow('API key for the external reasoning service is missing');
        expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should report authentication failures', async () => {
        mockFetch.mockResolvedValueOnce({ ok: false, status: 401, text: () => Promise.resolve('unauthorized') });

        await expect(client.invoke(request())).rejects.toThrow('External reasoning service rejected the API key');
    });

    it('should make a single attempt on server errors', async () => {
        mockFetch.mockResolvedValueOnce({
            ok: false,
            status: 503,
            text: () => Promise.resolve(JSON.stringify({ error: { message: 'overloaded' } })),
        });

        await expect(client.invoke(request())).rejects.toThrow('External reasoning API error: 503 - overloaded');
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });
});
