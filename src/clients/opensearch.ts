/**
 * OpenSearch client
 * Hybrid (vector + keyword) retrieval over the turbine documentation index
 */

import { z } from 'zod';
import { RetrievalError } from '../errors.js';
import { fetchWithRetry } from '../utils/http.js';
import type { IndexedChunk, SearchFilters, SearchIndex } from '../pipeline/collaborators.js';
import type { HitMetadata, RetrievalHit } from '../pipeline/state.js';

const MAX_RETRIES = 2;

const ChunkMetadataSchema = z.object({
    page: z.number().int().nullable().optional(),
    chunk_index: z.number().int().nullable().optional(),
    section_path: z.union([z.array(z.string()), z.string()]).nullable().optional(),
    section: z.string().nullable().optional(),
}).passthrough();

const ChunkSourceSchema = z.object({
    text: z.string().default(''),
    source: z.string().default('unknown'),
    turbine_model: z.string().nullable().optional(),
    document_type: z.string().nullable().optional(),
    metadata: ChunkMetadataSchema.default({}),
}).passthrough();

const SearchResponseSchema = z.object({
    hits: z.object({
        hits: z.array(z.object({
            _id: z.string(),
            _score: z.number().nullable().optional(),
            _source: ChunkSourceSchema,
        })),
    }),
});

const MgetResponseSchema = z.object({
    docs: z.array(z.object({
        _id: z.string(),
        found: z.boolean().optional(),
        _source: ChunkSourceSchema.optional(),
    })),
});

type ChunkSource = z.infer<typeof ChunkSourceSchema>;

export interface OpenSearchClientOptions {
    endpoint: string;
    index: string;
    username?: string;
    password?: string;
    timeoutMs: number;
}

export function normalizeEndpoint(endpoint: string): string {
    const trimmed = endpoint.trim().replace(/\/+$/, '');
    return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function buildHybridQuery(query: string, vector: number[], filters: SearchFilters, topK: number): Record<string, unknown> {
    const must: Record<string, unknown>[] = [];
    if (filters.turbineModel) must.push({ term: { turbine_model: filters.turbineModel } });
    if (filters.documentType) must.push({ term: { document_type: filters.documentType } });

    return {
        size: topK,
        query: {
            bool: {
                should: [
                    { knn: { embedding: { vector, k: topK } } },
                    {
                        multi_match: {
                            query,
                            fields: ['text^2', 'source'],
                            type: 'best_fields',
                            fuzziness: 'AUTO',
                        },
                    },
                ],
                must,
                minimum_should_match: 1,
            },
        },
        _source: ['text', 'source', 'turbine_model', 'document_type', 'metadata'],
    };
}

function sectionPathOf(metadata: ChunkSource['metadata']): string[] {
    const raw = metadata.section_path ?? metadata.section ?? null;
    if (raw === null) return [];
    const parts = Array.isArray(raw) ? raw : raw.split('>');
    return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

function toHitMetadata(source: ChunkSource): HitMetadata {
    return {
        page: source.metadata.page ?? null,
        sectionPath: sectionPathOf(source.metadata),
        chunkIndex: source.metadata.chunk_index ?? null,
        turbineModel: source.turbine_model ?? null,
        documentType: source.document_type ?? null,
    };
}

export class OpenSearchClient implements SearchIndex {
    private baseUrl: string;
    private index: string;
    private authorization?: string;
    private timeoutMs: number;

    constructor(options: OpenSearchClientOptions) {
        if (!options.endpoint || options.endpoint.trim() === '') {
            throw new RetrievalError('OPENSEARCH_ENDPOINT is required');
        }
        this.baseUrl = normalizeEndpoint(options.endpoint);
        this.index = options.index;
        this.timeoutMs = options.timeoutMs;
        if (options.username && options.password) {
            const token = Buffer.from(`${options.username}:${options.password}`).toString('base64');
            this.authorization = `Basic ${token}`;
        }
    }

    private headers(): Record<string, string> {
        return {
            'Content-Type': 'application/json',
            ...(this.authorization ? { Authorization: this.authorization } : {}),
        };
    }

    private async post(path: string, body: unknown, query?: string): Promise<unknown> {
        const url = `${this.baseUrl}/${encodeURIComponent(this.index)}/${path}`;
        const reply = await fetchWithRetry(
            url,
            { method: 'POST', headers: this.headers(), body: JSON.stringify(body) },
            { retries: MAX_RETRIES, timeoutMs: this.timeoutMs }
        );

        if (!reply.ok) {
            throw new RetrievalError(`OpenSearch error (${reply.status}): ${reply.message}`, query);
        }

        return reply.data;
    }

    async hybridSearch(query: string, vector: number[], filters: SearchFilters, topK: number): Promise<RetrievalHit[]> {
        const json = await this.post('_search', buildHybridQuery(query, vector, filters, topK), query);
        const parsed = SearchResponseSchema.safeParse(json);
        if (!parsed.success) {
            throw new RetrievalError(`Unexpected search response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, query);
        }

        return parsed.data.hits.hits.map((hit) => ({
            id: hit._id,
            content: hit._source.text,
            source: hit._source.source,
            score: hit._score ?? 0,
            metadata: toHitMetadata(hit._source),
            neighbors: [],
        }));
    }

    async getByIds(ids: string[]): Promise<IndexedChunk[]> {
        if (ids.length === 0) return [];
        const json = await this.post('_mget', { ids });
        const parsed = MgetResponseSchema.safeParse(json);
        if (!parsed.success) {
            throw new RetrievalError('Unexpected multi-get response');
        }

        const chunks: IndexedChunk[] = [];
        for (const doc of parsed.data.docs) {
            if (doc.found === false || !doc._source) continue;
            chunks.push({
                id: doc._id,
                content: doc._source.text,
                source: doc._source.source,
                chunkIndex: doc._source.metadata.chunk_index ?? null,
            });
        }
        return chunks;
    }
}
