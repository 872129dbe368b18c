/**
 * Export Formats - Save an answer with its sources to a file
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import { marked } from 'marked';
import type { PipelineResponse } from '../pipeline/runner.js';
import type { Citation } from '../pipeline/state.js';

export type ExportFormat = 'markdown' | 'html' | 'txt' | 'json';

const EXTENSIONS: Record<string, ExportFormat> = {
    '.md': 'markdown',
    '.markdown': 'markdown',
    '.html': 'html',
    '.htm': 'html',
    '.txt': 'txt',
    '.json': 'json',
};

/**
 * Format chosen by the output file's extension; unknown extensions get markdown.
 */
export function formatFromPath(outputPath: string): ExportFormat {
    return EXTENSIONS[path.extname(outputPath).toLowerCase()] ?? 'markdown';
}

export function getFormatName(format: ExportFormat): string {
    switch (format) {
        case 'markdown': return 'Markdown';
        case 'html': return 'HTML';
        case 'txt': return 'Plain Text';
        case 'json': return 'JSON';
    }
}

export function formatCitation(citation: Citation, index: number): string {
    const parts = [citation.source];
    if (citation.page !== null) parts.push(`p. ${citation.page}`);
    if (citation.section) parts.push(citation.section);
    const line = `[${index + 1}] ${parts.join(', ')}`;
    return citation.url ? `${line} (${citation.url})` : line;
}

/**
 * Markdown document for an answer: the answer body, its sources and the
 * run details.
 */
export function answerToMarkdown(query: string, response: PipelineResponse): string {
    const lines = [`# ${query}`, '', response.response.trim(), ''];

    if (response.citations.length > 0) {
        lines.push('## Sources', '');
        response.citations.forEach((citation, i) => lines.push(`- ${formatCitation(citation, i)}`));
        lines.push('');
    }

    lines.push('## Details', '');
    lines.push(`- Session: ${response.sessionId}`);
    lines.push(`- Turbine model: ${response.turbineModel ?? 'not detected'}`);
    lines.push(`- Confidence: ${response.confidenceScore.toFixed(2)}`);
    if (response.responseMetadata) lines.push(`- Model: ${response.responseMetadata.modelName}`);
    lines.push(`- Telemetry: ${response.dataFetchStatus}`);
    lines.push(`- Guardrail: ${response.guardrailResult.status}`);

    return `${lines.join('\n')}\n`;
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function toHtml(markdown: string, title: string): string {
    const rendered = marked.parse(markdown);
    const body = typeof rendered === 'string' ? rendered : `<pre>${escapeHtml(markdown)}</pre>`;
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, sans-serif;
            max-width: 800px;
            margin: 0 auto;
            padding: 2rem;
            line-height: 1.6;
            color: #333;
        }
        h1, h2 { color: #1a1a1a; margin-top: 2rem; }
        h1 { border-bottom: 2px solid #0e7490; padding-bottom: 0.5rem; }
        h2 { border-bottom: 1px solid #e2e8f0; padding-bottom: 0.3rem; }
        code { background: #f1f5f9; padding: 0.2rem 0.4rem; border-radius: 4px; }
        a { color: #0e7490; }
        li { margin: 0.5rem 0; }
    </style>
</head>
<body>
${body}
</body>
</html>
`;
}

/**
 * Strip markdown syntax, keeping the text
 */
export function toPlainText(markdown: string): string {
    return markdown
        .replace(/^#{1,6}\s+/gm, '')
        .replace(/\*\*(.+?)\*\*/g, '$1')
        .replace(/\*(.+?)\*/g, '$1')
        .replace(/__(.+?)__/g, '$1')
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
        .replace(/```[\s\S]*?```/g, '')
        .replace(/`([^`]+)`/g, '$1')
        .replace(/^>\s+/gm, '')
        .replace(/^---+$/gm, '')
        .replace(/\n{3,}/g, '\n\n')
        .trim() + '\n';
}

export function renderExport(query: string, response: PipelineResponse, format: ExportFormat): string {
    if (format === 'json') {
        return `${JSON.stringify({ query, ...response }, null, 2)}\n`;
    }

    const markdown = answerToMarkdown(query, response);
    switch (format) {
        case 'markdown': return markdown;
        case 'html': return toHtml(markdown, query);
        case 'txt': return toPlainText(markdown);
    }
}

export async function exportAnswer(query: string, response: PipelineResponse, outputPath: string): Promise<ExportFormat> {
    const format = formatFromPath(outputPath);
    await writeFile(outputPath, renderExport(query, response, format), 'utf-8');
    return format;
}
