import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { marked } from 'marked';
import { renderMarkdown, showDiagnostics, stageLabel } from './components.js';
import { confidenceColor, colors } from './theme.js';
import { isSupportedNodeVersion } from '../utils/node-version.js';

const originalUiMode = process.env.UI_MODE;

describe('terminal output', () => {
    beforeEach(() => {
        process.env.UI_MODE = 'plain';
    });

    afterEach(() => {
        if (originalUiMode === undefined) delete process.env.UI_MODE;
        else process.env.UI_MODE = originalUiMode;
    });

    it('labels known stages and falls back to the stage name', () => {
        expect(stageLabel('knowledge-retriever')).toBe('Searching the documentation...');
        expect(stageLabel('custom')).toBe('custom...');
    });

    it('summarizes diagnostics unless verbose', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        showDiagnostics(['Retrieval failed: timeout'], false);

        expect(log).toHaveBeenCalledTimes(1);
        expect(log.mock.calls[0][0]).toContain('1 pipeline note (use --verbose to see them)');
    });

    it('lists every diagnostic when verbose', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        showDiagnostics(['first', 'second'], true);

        const lines = log.mock.calls.map((call) => String(call[0]));
        expect(lines).toContain('\nPipeline notes\n');
        expect(lines.filter((line) => line.endsWith('first') || line.endsWith('second'))).toHaveLength(2);
    });

    it('renders markdown for the terminal without touching the shared parser', () => {
        const rendered = renderMarkdown('# Oil pressure\n\nKeep it **above 25 psi**.');

        expect(rendered).toContain('Oil pressure');
        expect(rendered).toContain('above 25 psi');
        expect(rendered).not.toContain('<h1>');
        expect(marked.parse('# Oil pressure')).toBe('<h1>Oil pressure</h1>\n');
    });

    it('grades confidence against the threshold', () => {
        expect(confidenceColor(0.9, 0.6)).toBe(colors.success);
        expect(confidenceColor(0.7, 0.6)).toBe(colors.warning);
        expect(confidenceColor(0.5, 0.6)).toBe(colors.error);
    });
});

describe('isSupportedNodeVersion', () => {
    it('accepts Node.js 20 and later', () => {
        expect(isSupportedNodeVersion('20.11.1')).toBe(true);
        expect(isSupportedNodeVersion('22.3.0')).toBe(true);
        expect(isSupportedNodeVersion('18.19.0')).toBe(false);
    });
});
