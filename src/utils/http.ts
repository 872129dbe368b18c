/**
 * Shared HTTP plumbing for the fetch-based clients
 * Bounded timeouts, retry with exponential backoff, readable API errors
 */

import { toError } from '../errors.js';

export const INITIAL_RETRY_DELAY_MS = 500;

export function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort();
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeoutId);
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

function abortError(): Error {
    const error = new Error('The operation was aborted');
    error.name = 'AbortError';
    return error;
}

/**
 * Settle with `promise`, or reject with an AbortError once `signal` fires.
 * Body reads from a stalled peer do not always observe the fetch signal.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) return Promise.reject(abortError());
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(abortError());
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
    /** Total attempts, including the first one */
    retries: number;
    /** Per-attempt timeout, covering the body read */
    timeoutMs: number;
    retryDelayMs?: number;
}

export type HttpReply =
    | { ok: true; status: number; data: unknown }
    | { ok: false; status: number; message: string };

function isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

/**
 * Fetch with retry logic and exponential backoff.
 * The timeout stays armed until the body has been read: `read` parses a
 * successful body, error bodies go through `parseErrorBody`.
 */
export async function fetchWithRetry(
    url: string,
    options: RequestInit,
    { retries, timeoutMs, retryDelayMs = INITIAL_RETRY_DELAY_MS }: RetryOptions,
    read: (response: Response) => Promise<unknown> = (response) => response.json()
): Promise<HttpReply> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < retries; attempt++) {
        const { signal, cleanup } = createTimeoutSignal(timeoutMs, options.signal ?? undefined);
        try {
            const response = await fetch(url, { ...options, signal });
            const isLastAttempt = attempt >= retries - 1;

            // Don't retry client errors (4xx except 429), only server errors (5xx) and rate limits
            if (response.ok) {
                return { ok: true, status: response.status, data: await untilAborted(read(response), signal) };
            }
            if (!isRetryableStatus(response.status) || isLastAttempt) {
                return { ok: false, status: response.status, message: await untilAborted(parseErrorBody(response), signal) };
            }

            await sleep(response.status === 429
                ? retryDelayMs * Math.pow(2, attempt + 1)
                : retryDelayMs * Math.pow(2, attempt));
        } catch (error) {
            const err = toError(error);
            lastError = isAbortError(err)
                ? new Error(`Request timed out after ${timeoutMs}ms`)
                : err;

            if (attempt < retries - 1) {
                await sleep(retryDelayMs * Math.pow(2, attempt));
            }
        } finally {
            cleanup();
        }
    }

    throw lastError || new Error('Max retries exceeded');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessageFrom(json: unknown): string | undefined {
    if (!isRecord(json)) return undefined;
    const nested = json.error;
    if (isRecord(nested)) {
        if (typeof nested.reason === 'string') return nested.reason;
        if (typeof nested.message === 'string') return nested.message;
    }
    if (typeof json.message === 'string') return json.message;
    if (typeof nested === 'string') return nested;
    return undefined;
}

/**
 * Parse API error response for better error messages
 */
export async function parseErrorBody(response: Response): Promise<string> {
    try {
        const text = await response.text();
        try {
            return errorMessageFrom(JSON.parse(text)) ?? text;
        } catch {
            return text;
        }
    } catch {
        return `HTTP ${response.status}`;
    }
}
