/**
 * Course outline tool - title, link and the lesson list of one course
 */

import { z } from 'zod';
import type { CourseMetadata, CourseStore } from '../catalog/types.js';
import { parseToolArguments } from './arguments.js';
import type { Tool, ToolArguments, ToolDefinition, ToolResult } from './types.js';

export const COURSE_OUTLINE_TOOL_NAME = 'get_course_outline';

const CourseOutlineArgsSchema = z.object({
    course_title: z.string().min(1),
});

const DEFINITION: ToolDefinition = {
    name: COURSE_OUTLINE_TOOL_NAME,
    description: 'Get the complete outline of a course including course title, course link, and all lessons with their numbers and titles',
    inputSchema: {
        type: 'object',
        properties: {
            course_title: {
                type: 'string',
                description: "Course title to get the outline for (partial matches work, e.g. 'MCP', 'Introduction')",
            },
        },
        required: ['course_title'],
    },
};

export function formatCourseOutline(course: CourseMetadata): string {
    const lines = [
        `Course: ${course.title || 'Unknown Course'}`,
        `Course Link: ${course.courseLink ?? 'No link available'}`,
        `Total Lessons: ${course.lessons.length}`,
        '',
        'Lesson Outline:',
    ];

    // Stored order, not re-sorted.
    for (const lesson of course.lessons) {
        lines.push(`  ${lesson.lessonNumber}. ${lesson.lessonTitle || 'Untitled Lesson'}`);
    }

    return lines.join('\n');
}

export class CourseOutlineTool implements Tool {
    private store: CourseStore;

    constructor(store: CourseStore) {
        this.store = store;
    }

    definition(): ToolDefinition {
        return DEFINITION;
    }

    async execute(args: ToolArguments): Promise<ToolResult> {
        const { course_title: courseTitle } = parseToolArguments(COURSE_OUTLINE_TOOL_NAME, CourseOutlineArgsSchema, args);

        const resolvedTitle = await this.store.resolveCourseName(courseTitle);
        if (!resolvedTitle) {
            return { text: `No course found matching '${courseTitle}'`, sources: [] };
        }

        const courses = await this.store.getAllCoursesMetadata();
        const course = courses.find((c) => c.title === resolvedTitle);
        if (!course) {
            return { text: `Course metadata not found for '${resolvedTitle}'`, sources: [] };
        }

        return { text: formatCourseOutline(course), sources: [] };
    }
}
