/**
 * Small in-memory catalog shared by the store, tool and assistant tests
 */

import type { CourseCatalog } from '../catalog/local-course-store.js';

export const TEST_CATALOG: CourseCatalog = {
    courses: [
        {
            title: 'Building Tool-Using Agents',
            courseLink: 'https://example.com/agents',
            instructor: 'Test Instructor',
            lessons: [
                { lessonNumber: 1, title: 'Function Calling', lessonLink: 'https://example.com/agents/1' },
                { lessonNumber: 2, title: 'Schemas' },
            ],
        },
        {
            title: 'Retrieval Basics',
            lessons: [
                { lessonNumber: 1, title: 'Why Retrieval', lessonLink: 'https://example.com/rag/1' },
            ],
        },
    ],
    chunks: [
        { courseTitle: 'Building Tool-Using Agents', lessonNumber: 1, content: 'Function calling lets a model request a tool.' },
        { courseTitle: 'Building Tool-Using Agents', lessonNumber: 2, content: 'Tool schemas describe typed parameters.' },
        { courseTitle: 'Retrieval Basics', lessonNumber: 1, content: 'Retrieval grounds a model in documents.' },
        { courseTitle: 'Building Tool-Using Agents', content: 'Agents course overview.' },
    ],
};
