import { describe, it, expect, vi } from 'vitest';
import type { DocumentLinker, EmbeddingBackend, SearchIndex } from './collaborators.js';
import {
    KnowledgeRetriever,
    NO_DOCUMENTATION_SENTINEL,
    buildHierarchicalContext,
    chunkDocumentId,
    neighborSlots,
    normalizeScores,
    truncate,
} from './retriever.js';
import { createInitialState, type AgentState, type RetrievalHit } from './state.js';

function hit(overrides: Partial<RetrievalHit> & Pick<RetrievalHit, 'id' | 'source' | 'score'>): RetrievalHit {
    return {
        content: 'content',
        neighbors: [],
        ...overrides,
        metadata: {
            page: null,
            sectionPath: [],
            chunkIndex: null,
            turbineModel: null,
            documentType: null,
            ...overrides.metadata,
        },
    };
}

const manualHit = hit({
    id: 'h1',
    source: 'manuals/smt60 guide.pdf',
    score: 8,
    content: 'Oil pressure must stay above 25 psi.',
    metadata: {
        page: 12,
        sectionPath: ['Lubrication', 'Oil Pressure'],
        chunkIndex: 3,
        turbineModel: 'SMT60',
        documentType: 'manual',
    },
});

const notesHit = hit({ id: 'h2', source: 'notes.txt', score: 4, content: 'General notes.' });

function stateFor(turbineModel: string | null = 'SMT60'): AgentState {
    return {
        ...createInitialState('s', 'oil pressure', []),
        transformedQuery: 'oil pressure (turbine model: SMT60)',
        turbineModel,
    };
}

function embedder(): EmbeddingBackend {
    return { embed: vi.fn().mockResolvedValue([0.1, 0.2]) };
}

function searchIndex(hits: RetrievalHit[], getByIds: SearchIndex['getByIds'] = vi.fn().mockResolvedValue([])): SearchIndex {
    return { hybridSearch: vi.fn().mockResolvedValue(hits), getByIds };
}

describe('chunkDocumentId', () => {
    it('joins source and chunk index and replaces slashes and spaces', () => {
        expect(chunkDocumentId('manuals/SMT60 ops.pdf', 4)).toBe('manuals-SMT60-ops.pdf-4');
    });
});

describe('neighborSlots', () => {
    it('lists the chunks on both sides of the hit', () => {
        expect([...neighborSlots(manualHit, 2).entries()]).toEqual([
            ['manuals-smt60-guide.pdf-1', { chunkIndex: 1, position: 'before' }],
            ['manuals-smt60-guide.pdf-2', { chunkIndex: 2, position: 'before' }],
            ['manuals-smt60-guide.pdf-4', { chunkIndex: 4, position: 'after' }],
            ['manuals-smt60-guide.pdf-5', { chunkIndex: 5, position: 'after' }],
        ]);
    });

    it('skips negative indices and hits without a chunk index', () => {
        const first = hit({ id: 'x', source: 'a', score: 1, metadata: { page: null, sectionPath: [], chunkIndex: 0, turbineModel: null, documentType: null } });
        expect([...neighborSlots(first, 1).keys()]).toEqual(['a-1']);
        expect(neighborSlots(notesHit, 1).size).toBe(0);
    });
});

describe('normalizeScores', () => {
    it('divides by the best score and rounds to three decimals', () => {
        expect(normalizeScores([2, 3])).toEqual([0.667, 1]);
    });

    it('clamps into [0, 1] and divides by one when the best score is not positive', () => {
        expect(normalizeScores([-1, 2])).toEqual([0, 1]);
        expect(normalizeScores([0, 0])).toEqual([0, 0]);
        expect(normalizeScores([-0.5, -2])).toEqual([0, 0]);
        expect(normalizeScores([])).toEqual([]);
    });
});

describe('truncate', () => {
    it('cuts long text to the limit including the ellipsis', () => {
        const text = 'x'.repeat(600);
        const result = truncate(text, 500);
        expect(result).toHaveLength(500);
        expect(result.endsWith('...')).toBe(true);
        expect(truncate('short', 500)).toBe('short');
    });
});

describe('buildHierarchicalContext', () => {
    it('returns the sentinel when there are no hits', () => {
        expect(buildHierarchicalContext([])).toBe(NO_DOCUMENTATION_SENTINEL);
    });
});

describe('KnowledgeRetriever', () => {
    const options = { topK: 5, neighborWindow: 1 };

    it('skips retrieval when no search index is configured', async () => {
        const result = await new KnowledgeRetriever(null, embedder(), options).run(stateFor());

        expect(result.update).toEqual({ retrievedDocuments: [], citations: [], hierarchicalContext: NO_DOCUMENTATION_SENTINEL });
        expect(result.diagnostics).toEqual(['Retrieval skipped: search index is not configured']);
    });

    it('degrades to the sentinel when embedding fails', async () => {
        const failing: EmbeddingBackend = { embed: vi.fn().mockRejectedValue(new Error('throttled')) };
        const result = await new KnowledgeRetriever(searchIndex([]), failing, options).run(stateFor());

        expect(result.update.hierarchicalContext).toBe(NO_DOCUMENTATION_SENTINEL);
        expect(result.update.citations).toEqual([]);
        expect(result.diagnostics).toEqual(['Retrieval failed: throttled']);
    });

    it('searches with the transformed query and the turbine model filter', async () => {
        const index = searchIndex([]);
        await new KnowledgeRetriever(index, embedder(), options).run(stateFor());

        expect(index.hybridSearch).toHaveBeenCalledWith(
            'oil pressure (turbine model: SMT60)',
            [0.1, 0.2],
            { turbineModel: 'SMT60' },
            5
        );
    });

    it('stitches neighbors and assembles context and citations', async () => {
        const getByIds = vi.fn().mockResolvedValue([
            { id: 'manuals-smt60-guide.pdf-4', content: 'Next chunk text.', source: 'manuals/smt60 guide.pdf', chunkIndex: 4 },
            { id: 'manuals-smt60-guide.pdf-2', content: 'Previous   chunk\ntext', source: 'manuals/smt60 guide.pdf', chunkIndex: 2 },
        ]);
        const index = searchIndex([manualHit, notesHit], getByIds);

        const result = await new KnowledgeRetriever(index, embedder(), options).run(stateFor());

        expect(getByIds).toHaveBeenCalledTimes(1);
        expect(getByIds).toHaveBeenCalledWith(['manuals-smt60-guide.pdf-2', 'manuals-smt60-guide.pdf-4']);
        expect(result.diagnostics).toEqual([]);
        expect(result.update.hierarchicalContext).toBe([
            '[1] Source: manuals/smt60 guide.pdf | Page: 12 | Section: Lubrication > Oil Pressure',
            'Oil pressure must stay above 25 psi.',
            '    before (chunk 2): Previous chunk text',
            '    after (chunk 4): Next chunk text.',
            '',
            '[2] Source: notes.txt',
            'General notes.',
        ].join('\n'));
        expect(result.update.citations).toEqual([
            {
                source: 'manuals/smt60 guide.pdf',
                page: 12,
                section: 'Lubrication > Oil Pressure',
                excerpt: 'Oil pressure must stay above 25 psi.',
                relevanceScore: 1,
                url: null,
                turbineModel: 'SMT60',
                documentType: 'manual',
            },
            {
                source: 'notes.txt',
                page: null,
                section: null,
                excerpt: 'General notes.',
                relevanceScore: 0.5,
                url: null,
                turbineModel: null,
                documentType: null,
            },
        ]);
        expect(Object.isFrozen(result.update.citations?.[0])).toBe(true);
    });

    it('keeps the hit when its neighbor fetch fails', async () => {
        const getByIds = vi.fn().mockRejectedValue(new Error('index unavailable'));
        const result = await new KnowledgeRetriever(searchIndex([manualHit], getByIds), embedder(), options).run(stateFor());

        expect(result.update.retrievedDocuments?.[0].neighbors).toEqual([]);
        expect(result.update.citations).toHaveLength(1);
        expect(result.diagnostics).toEqual(['Neighbor fetch failed for h1: index unavailable']);
    });

    it('attaches document links when a linker is configured', async () => {
        const linker: DocumentLinker = { linkFor: vi.fn().mockResolvedValue('https://docs.test/guide.pdf#page=12') };
        const result = await new KnowledgeRetriever(searchIndex([manualHit]), embedder(), { topK: 5, neighborWindow: 0 }, linker)
            .run(stateFor());

        expect(linker.linkFor).toHaveBeenCalledWith('manuals/smt60 guide.pdf', 12);
        expect(result.update.citations?.[0].url).toBe('https://docs.test/guide.pdf#page=12');
    });
});
