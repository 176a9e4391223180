/**
 * Export Formats - write an answer and its sources to a file
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import { Marked } from 'marked';
import type { QueryResult } from '../assistant/course-assistant.js';

export type ExportFormat = 'markdown' | 'json' | 'html' | 'txt';

// Separate instance: the terminal renderer is installed on the global one.
const htmlMarked = new Marked();

/**
 * Pick a format from the output file's extension; unknown extensions get markdown.
 */
export function formatForPath(outputPath: string): ExportFormat {
    switch (path.extname(outputPath).toLowerCase()) {
        case '.json': return 'json';
        case '.html':
        case '.htm': return 'html';
        case '.txt': return 'txt';
        default: return 'markdown';
    }
}

export function formatAnswerMarkdown(result: QueryResult, query: string): string {
    const sections = [`# ${query}`, result.answer.trim()];

    if (result.sources.length > 0) {
        const list = result.sources
            .map((source, index) => source.link
                ? `${index + 1}. [${source.label}](${source.link})`
                : `${index + 1}. ${source.label}`)
            .join('\n');
        sections.push(`## Sources\n\n${list}`);
    }

    return `${sections.join('\n\n')}\n`;
}

export function formatAnswerJson(result: QueryResult, query: string): string {
    return `${JSON.stringify({ query, answer: result.answer, sources: result.sources }, null, 2)}\n`;
}

/**
 * Simple markdown stripping
 */
export function stripMarkdown(content: string): string {
    return content
        .replace(/^#{1,6}\s+/gm, '')
        .replace(/\*\*(.+?)\*\*/g, '$1')
        .replace(/\*(.+?)\*/g, '$1')
        .replace(/__(.+?)__/g, '$1')
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
        .replace(/`([^`]+)`/g, '$1')
        .replace(/^>\s+/gm, '')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export function formatAnswerText(result: QueryResult, query: string): string {
    const lines = [query, '', stripMarkdown(result.answer)];
    if (result.sources.length > 0) {
        lines.push('', 'Sources:');
        result.sources.forEach((source, index) => {
            lines.push(`${index + 1}. ${source.label}${source.link ? ` - ${source.link}` : ''}`);
        });
    }
    return `${lines.join('\n')}\n`;
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export async function formatAnswerHtml(result: QueryResult, query: string): Promise<string> {
    const body = await htmlMarked.parse(formatAnswerMarkdown(result, query));
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(query)}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
            max-width: 800px;
            margin: 0 auto;
            padding: 2rem;
            line-height: 1.6;
            color: #333;
        }
        h1 { border-bottom: 2px solid #0f766e; padding-bottom: 0.5rem; }
        code { background: #f1f5f9; padding: 0.2rem 0.4rem; border-radius: 4px; }
        a { color: #0f766e; }
    </style>
</head>
<body>
${body}
</body>
</html>
`;
}

/**
 * Write the answer to `outputPath`, formatted by its extension.
 */
export async function saveAnswer(outputPath: string, result: QueryResult, query: string): Promise<ExportFormat> {
    const format = formatForPath(outputPath);

    let content: string;
    switch (format) {
        case 'json':
            content = formatAnswerJson(result, query);
            break;
        case 'html':
            content = await formatAnswerHtml(result, query);
            break;
        case 'txt':
            content = formatAnswerText(result, query);
            break;
        case 'markdown':
            content = formatAnswerMarkdown(result, query);
            break;
    }

    await writeFile(outputPath, content, 'utf-8');
    return format;
}
