import { describe, it, expect } from 'vitest';
import type { PipelineResponse } from '../pipeline/runner.js';
import { answerToMarkdown, formatCitation, formatFromPath, renderExport, toPlainText } from './formats.js';

const response: PipelineResponse = {
    sessionId: 'session-1',
    response: 'Replace the **oil filter** [1].',
    citations: [
        {
            source: 'smt60-manual.pdf',
            page: 40,
            section: 'Lubrication > Oil Pressure',
            excerpt: 'Low oil pressure usually points to a clogged filter.',
            relevanceScore: 1,
            url: 'https://docs.test/smt60-manual.pdf#page=40',
            turbineModel: 'SMT60',
            documentType: 'manual',
        },
    ],
    confidenceScore: 0.95,
    turbineModel: 'SMT60',
    dataPoints: [],
    dataFetchStatus: 'ok',
    guardrailResult: { status: 'passed' },
    responseMetadata: {
        modelKey: 'nova-pro',
        modelName: 'Amazon Nova Pro',
        externalAttempted: false,
        fallbackUsed: false,
        generatedAt: '2026-05-01T12:00:00.000Z',
    },
    errors: [],
    messages: [],
};

describe('formatFromPath', () => {
    it('picks the format from the extension', () => {
        expect(formatFromPath('answer.md')).toBe('markdown');
        expect(formatFromPath('answer.HTML')).toBe('html');
        expect(formatFromPath('out/answer.txt')).toBe('txt');
        expect(formatFromPath('answer.json')).toBe('json');
        expect(formatFromPath('answer')).toBe('markdown');
    });
});

describe('formatCitation', () => {
    it('lists source, page, section and link', () => {
        expect(formatCitation(response.citations[0], 0))
            .toBe('[1] smt60-manual.pdf, p. 40, Lubrication > Oil Pressure (https://docs.test/smt60-manual.pdf#page=40)');
    });

    it('omits what is unknown', () => {
        const bare = { ...response.citations[0], page: null, section: null, url: null };
        expect(formatCitation(bare, 2)).toBe('[3] smt60-manual.pdf');
    });
});

describe('answerToMarkdown', () => {
    it('writes the answer, sources and details', () => {
        expect(answerToMarkdown('Low oil pressure?', response)).toBe([
            '# Low oil pressure?',
            '',
            'Replace the **oil filter** [1].',
            '',
            '## Sources',
            '',
            '- [1] smt60-manual.pdf, p. 40, Lubrication > Oil Pressure (https://docs.test/smt60-manual.pdf#page=40)',
            '',
            '## Details',
            '',
            '- Session: session-1',
            '- Turbine model: SMT60',
            '- Confidence: 0.95',
            '- Model: Amazon Nova Pro',
            '- Telemetry: ok',
            '- Guardrail: passed',
            '',
        ].join('\n'));
    });
});

describe('renderExport', () => {
    it('strips markdown for plain text', () => {
        expect(toPlainText('# Title\n\nUse **bold** and `code`.\n\n\n\nEnd')).toBe('Title\n\nUse bold and code.\n\nEnd\n');
    });

    it('wraps html in a document with an escaped title', () => {
        const html = renderExport('Oil <pressure>?', response, 'html');

        expect(html).toContain('<title>Oil &lt;pressure&gt;?</title>');
        expect(html).toContain('<strong>oil filter</strong>');
    });

    it('writes the whole response as json', () => {
        const parsed: unknown = JSON.parse(renderExport('q', response, 'json'));

        expect(parsed).toMatchObject({ query: 'q', sessionId: 'session-1', confidenceScore: 0.95 });
    });
});
