import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { DocumentLinker, EmbeddingBackend, SearchFilters, SearchIndex } from './collaborators.js';
import {
    stageResult,
    type AgentState,
    type Citation,
    type NeighborChunk,
    type PipelineStage,
    type RetrievalHit,
    type StageResult,
} from './state.js';

export const NO_DOCUMENTATION_SENTINEL = 'No relevant documentation found in the knowledge base.';

const CITATION_EXCERPT_CHARS = 500;
const NEIGHBOR_EXCERPT_CHARS = 300;

export interface RetrieverOptions {
    topK: number;
    neighborWindow: number;
}

export function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit - 3)}...` : text;
}

function round3(value: number): number {
    return Math.round(value * 1000) / 1000;
}

/**
 * Document id the indexer gives a chunk: `<source>-<chunk index>` with
 * slashes and spaces replaced by dashes.
 */
export function chunkDocumentId(source: string, chunkIndex: number): string {
    return `${source}-${chunkIndex}`.replace(/[/ ]/g, '-');
}

interface NeighborSlot {
    chunkIndex: number;
    position: NeighborChunk['position'];
}

/** Ids of the chunks within `window` of the hit, mapped to their index and side */
export function neighborSlots(hit: RetrievalHit, window: number): Map<string, NeighborSlot> {
    const slots = new Map<string, NeighborSlot>();
    const index = hit.metadata.chunkIndex;
    if (index === null || window <= 0) return slots;

    for (let offset = window; offset >= 1; offset--) {
        const before = index - offset;
        if (before >= 0) {
            slots.set(chunkDocumentId(hit.source, before), { chunkIndex: before, position: 'before' });
        }
    }
    for (let offset = 1; offset <= window; offset++) {
        const after = index + offset;
        slots.set(chunkDocumentId(hit.source, after), { chunkIndex: after, position: 'after' });
    }
    return slots;
}

/**
 * Relevance of each score relative to the best one, in [0, 1]. A max of
 * zero or less divides by 1.
 */
export function normalizeScores(scores: number[]): number[] {
    if (scores.length === 0) return [];
    const max = Math.max(...scores);
    const divisor = max > 0 ? max : 1;
    return scores.map((score) => round3(Math.min(1, Math.max(0, score / divisor))));
}

function singleLine(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export function buildHierarchicalContext(hits: RetrievalHit[]): string {
    if (hits.length === 0) return NO_DOCUMENTATION_SENTINEL;

    return hits.map((hit, i) => {
        const header = [`[${i + 1}] Source: ${hit.source}`];
        if (hit.metadata.page !== null) header.push(`Page: ${hit.metadata.page}`);
        if (hit.metadata.sectionPath.length > 0) header.push(`Section: ${hit.metadata.sectionPath.join(' > ')}`);

        const lines = [header.join(' | '), hit.content.trim()];
        for (const neighbor of hit.neighbors) {
            const excerpt = truncate(singleLine(neighbor.content), NEIGHBOR_EXCERPT_CHARS);
            lines.push(`    ${neighbor.position} (chunk ${neighbor.chunkIndex}): ${excerpt}`);
        }
        return lines.join('\n');
    }).join('\n\n');
}

export class KnowledgeRetriever implements PipelineStage {
    readonly name = 'knowledge-retriever';

    constructor(
        private index: SearchIndex | null,
        private embedder: EmbeddingBackend | null,
        private options: RetrieverOptions,
        private linker: DocumentLinker | null = null
    ) { }

    async run(state: Readonly<AgentState>): Promise<StageResult> {
        const { index, embedder } = this;
        if (!index || !embedder) {
            logger.warn('Retrieval skipped: search index is not configured');
            return stageResult(
                { retrievedDocuments: [], citations: [], hierarchicalContext: NO_DOCUMENTATION_SENTINEL },
                ['Retrieval skipped: search index is not configured']
            );
        }

        const query = state.transformedQuery || state.query;
        const filters: SearchFilters = state.turbineModel ? { turbineModel: state.turbineModel } : {};

        let hits: RetrievalHit[];
        try {
            const vector = await embedder.embed(query);
            hits = await index.hybridSearch(query, vector, filters, this.options.topK);
        } catch (error) {
            const message = describeError(error);
            logger.warn(`Retrieval failed: ${message}`);
            return stageResult(
                { retrievedDocuments: [], citations: [], hierarchicalContext: NO_DOCUMENTATION_SENTINEL },
                [`Retrieval failed: ${message}`]
            );
        }

        logger.debug(`Retrieved ${hits.length} hit(s) for "${query}"`);

        const diagnostics: string[] = [];
        const stitched: RetrievalHit[] = [];
        for (const hit of hits) {
            stitched.push(await this.attachNeighbors(index, hit, diagnostics));
        }
        const citations = await this.buildCitations(stitched);

        return stageResult({
            retrievedDocuments: stitched,
            citations,
            hierarchicalContext: buildHierarchicalContext(stitched),
        }, diagnostics);
    }

    private async attachNeighbors(index: SearchIndex, hit: RetrievalHit, diagnostics: string[]): Promise<RetrievalHit> {
        const slots = neighborSlots(hit, this.options.neighborWindow);
        if (slots.size === 0) return hit;

        try {
            const chunks = await index.getByIds([...slots.keys()]);
            const neighbors: NeighborChunk[] = [];
            for (const chunk of chunks) {
                const slot = slots.get(chunk.id);
                if (!slot) continue;
                neighbors.push({ id: chunk.id, chunkIndex: slot.chunkIndex, position: slot.position, content: chunk.content });
            }
            neighbors.sort((a, b) => a.chunkIndex - b.chunkIndex);
            return { ...hit, neighbors };
        } catch (error) {
            const message = describeError(error);
            logger.warn(`Neighbor fetch failed for ${hit.id}: ${message}`);
            diagnostics.push(`Neighbor fetch failed for ${hit.id}: ${message}`);
            return { ...hit, neighbors: [] };
        }
    }

    private async buildCitations(hits: RetrievalHit[]): Promise<Citation[]> {
        const relevance = normalizeScores(hits.map((hit) => hit.score));
        const citations: Citation[] = [];
        for (const [i, hit] of hits.entries()) {
            const url = this.linker ? await this.linker.linkFor(hit.source, hit.metadata.page) : null;
            const citation: Citation = {
                source: hit.source,
                page: hit.metadata.page,
                section: hit.metadata.sectionPath.length > 0 ? hit.metadata.sectionPath.join(' > ') : null,
                excerpt: truncate(hit.content, CITATION_EXCERPT_CHARS),
                relevanceScore: relevance[i] ?? 0,
                url,
                turbineModel: hit.metadata.turbineModel,
                documentType: hit.metadata.documentType,
            };
            citations.push(Object.freeze(citation));
        }
        return citations;
    }
}
