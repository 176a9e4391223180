/**
 * Course content search tool - formats store hits and attributes their sources
 */

import { z } from 'zod';
import { isEmptyResults, type CourseStore, type SearchResults } from '../catalog/types.js';
import { parseToolArguments } from './arguments.js';
import type { SourceAttribution, Tool, ToolArguments, ToolDefinition, ToolResult } from './types.js';

export const COURSE_SEARCH_TOOL_NAME = 'search_course_content';

const CourseSearchArgsSchema = z.object({
    query: z.string().min(1),
    course_name: z.string().nullish(),
    lesson_number: z.coerce.number().int().nullish(),
});

const DEFINITION: ToolDefinition = {
    name: COURSE_SEARCH_TOOL_NAME,
    description: 'Search course materials with smart course name matching and lesson filtering',
    inputSchema: {
        type: 'object',
        properties: {
            query: {
                type: 'string',
                description: 'What to search for in the course content',
            },
            course_name: {
                type: 'string',
                description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
            },
            lesson_number: {
                type: 'integer',
                description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
            },
        },
        required: ['query'],
    },
};

/**
 * The no-match text names whichever filters were supplied.
 */
export function noContentMessage(courseName?: string, lessonNumber?: number): string {
    let filterInfo = '';
    if (courseName) filterInfo += ` in course '${courseName}'`;
    if (lessonNumber !== undefined) filterInfo += ` in lesson ${lessonNumber}`;
    return `No relevant content found${filterInfo}.`;
}

export class CourseSearchTool implements Tool {
    private store: CourseStore;

    constructor(store: CourseStore) {
        this.store = store;
    }

    definition(): ToolDefinition {
        return DEFINITION;
    }

    async execute(args: ToolArguments): Promise<ToolResult> {
        const parsed = parseToolArguments(COURSE_SEARCH_TOOL_NAME, CourseSearchArgsSchema, args);
        const courseName = parsed.course_name ?? undefined;
        const lessonNumber = parsed.lesson_number ?? undefined;

        const results = await this.store.search({ query: parsed.query, courseName, lessonNumber });

        if (results.error) {
            return { text: results.error, sources: [] };
        }

        if (isEmptyResults(results)) {
            return { text: noContentMessage(courseName, lessonNumber), sources: [] };
        }

        return this.formatResults(results);
    }

    private async formatResults(results: SearchResults): Promise<ToolResult> {
        const blocks: string[] = [];
        const sources: SourceAttribution[] = [];

        for (const [index, document] of results.documents.entries()) {
            const meta = results.metadata[index];
            const courseTitle = meta?.courseTitle || 'unknown';
            const lessonNumber = meta?.lessonNumber ?? null;

            const label = lessonNumber !== null ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle;
            const link = lessonNumber !== null
                ? await this.store.getLessonLink(courseTitle, lessonNumber)
                : null;

            blocks.push(`[${label}]\n${document}`);
            sources.push({ label, link });
        }

        return { text: blocks.join('\n\n'), sources };
    }
}
