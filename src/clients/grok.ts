/**
 * Grok API Client
 * OpenAI-compatible chat completions used as the external reasoning backend
 */

import { z } from 'zod';
import { ReasoningError } from '../errors.js';
import { fetchWithRetry } from '../utils/http.js';
import type { ExternalInvocation, ExternalReasoningBackend } from '../pipeline/collaborators.js';

export interface Message {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatOptions {
    temperature?: number;
    maxTokens?: number;
    timeoutMs: number;
}

export interface ChatResponse {
    id: string;
    choices: {
        message: {
            role: string;
            content: string | null;
        };
        finishReason: string | null;
    }[];
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

const ChatCompletionSchema = z.object({
    id: z.string().default(''),
    choices: z.array(z.object({
        message: z.object({
            role: z.string().default('assistant'),
            content: z.string().nullable().default(null),
        }),
        finish_reason: z.string().nullable().default(null),
    })).default([]),
    usage: z.object({
        prompt_tokens: z.number().default(0),
        completion_tokens: z.number().default(0),
        total_tokens: z.number().default(0),
    }).optional(),
});

export class GrokClient implements ExternalReasoningBackend {
    /**
     * Send a chat completion request (non-streaming). One attempt only: the
     * caller has a fallback model and a bounded latency budget.
     */
    async chat(
        endpoint: string,
        apiKey: string,
        model: string,
        messages: Message[],
        options: ChatOptions
    ): Promise<ChatResponse> {
        if (!apiKey || apiKey.trim() === '') {
            throw new ReasoningError(model, 'API key for the external reasoning service is missing');
        }

        const body: Record<string, unknown> = { model, messages, stream: false };
        if (typeof options.temperature === 'number') body.temperature = options.temperature;
        if (typeof options.maxTokens === 'number') body.max_tokens = options.maxTokens;

        const reply = await fetchWithRetry(endpoint, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${apiKey.trim()}`,
            },
            body: JSON.stringify(body),
        }, { retries: 1, timeoutMs: options.timeoutMs });

        if (!reply.ok) {
            if (reply.status === 401) {
                throw new ReasoningError(model, 'External reasoning service rejected the API key');
            }

            throw new ReasoningError(model, `External reasoning API error: ${reply.status} - ${reply.message}`);
        }

        const parsed = ChatCompletionSchema.safeParse(reply.data);
        if (!parsed.success) {
            throw new ReasoningError(model, 'Unexpected chat completion response');
        }

        const data = parsed.data;
        return {
            id: data.id,
            choices: data.choices.map((choice) => ({
                message: {
                    role: choice.message.role,
                    content: choice.message.content,
                },
                finishReason: choice.finish_reason,
            })),
            usage: {
                promptTokens: data.usage?.prompt_tokens ?? 0,
                completionTokens: data.usage?.completion_tokens ?? 0,
                totalTokens: data.usage?.total_tokens ?? 0,
            },
        };
    }

    async invoke(request: ExternalInvocation): Promise<string | null> {
        const messages: Message[] = [
            { role: 'system', content: request.systemPrompt },
            ...request.history,
            { role: 'user', content: request.userPrompt },
        ];

        const response = await this.chat(request.endpoint, request.apiKey, request.model, messages, {
            temperature: request.temperature,
            maxTokens: request.maxTokens,
            timeoutMs: request.timeoutMs,
        });

        const content = response.choices[0]?.message.content?.trim();
        return content ? content : null;
    }
}
