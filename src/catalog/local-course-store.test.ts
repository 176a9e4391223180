import { describe, it, expect } from 'vitest';
import path from 'path';
import { LocalCourseStore, parseCatalog, tokenize } from './local-course-store.js';
import { CatalogError } from '../errors.js';
import { DEFAULTS } from '../config.js';
import { TEST_CATALOG } from '../__tests__/fixtures.js';

describe('tokenize', () => {
    it('should lowercase, split on punctuation and drop stop words', () => {
        expect(tokenize('What is Machine-Learning?')).toEqual(['machine', 'learning']);
    });
});

describe('LocalCourseStore', () => {
    const store = new LocalCourseStore(TEST_CATALOG);

    describe('search', () => {
        it('should rank passages by shared terms', async () => {
            const results = await store.search({ query: 'tool schemas' });

            expect(results.documents).toEqual([
                'Tool schemas describe typed parameters.',
                'Function calling lets a model request a tool.',
            ]);
            expect(results.metadata).toEqual([
                { courseTitle: 'Building Tool-Using Agents', lessonNumber: 2, chunkIndex: 1 },
                { courseTitle: 'Building Tool-Using Agents', lessonNumber: 1, chunkIndex: 0 },
            ]);
            expect(results.error).toBeUndefined();
        });

        it('should resolve a partial course name before filtering', async () => {
            const results = await store.search({ query: 'model', courseName: 'retrieval' });

            expect(results.documents).toEqual(['Retrieval grounds a model in documents.']);
        });

        it('should return every in-scope passage when a filter is set', async () => {
            const results = await store.search({ query: 'unrelated words', courseName: 'agents', lessonNumber: 2 });

            expect(results.documents).toEqual(['Tool schemas describe typed parameters.']);
        });

        it('should report an unknown course as an error', async () => {
            const results = await store.search({ query: 'anything', courseName: 'Cooking' });

            expect(results).toEqual({ documents: [], metadata: [], error: "No course found matching 'Cooking'" });
        });

        it('should return nothing when no passage shares a term', async () => {
            const results = await store.search({ query: 'quantum chemistry' });

            expect(results.documents).toEqual([]);
        });

        it('should cap results at maxResults', async () => {
            const capped = new LocalCourseStore(TEST_CATALOG, { maxResults: 1 });

            const results = await capped.search({ query: 'tool schemas' });

            expect(results.documents).toEqual(['Tool schemas describe typed parameters.']);
        });
    });

    describe('resolveCourseName', () => {
        it('should match titles exactly, by containment, then by term overlap', async () => {
            expect(await store.resolveCourseName('retrieval basics')).toBe('Retrieval Basics');
            expect(await store.resolveCourseName('Agents')).toBe('Building Tool-Using Agents');
            expect(await store.resolveCourseName('tool agents')).toBe('Building Tool-Using Agents');
        });

        it('should return null for blank or unmatched names', async () => {
            expect(await store.resolveCourseName('   ')).toBeNull();
            expect(await store.resolveCourseName('Cooking')).toBeNull();
        });
    });

    describe('metadata', () => {
        it('should expose courses with normalized lessons', async () => {
            const courses = await store.getAllCoursesMetadata();

            expect(courses[1]).toEqual({
                title: 'Retrieval Basics',
                courseLink: null,
                instructor: null,
                lessons: [{ lessonNumber: 1, lessonTitle: 'Why Retrieval', lessonLink: 'https://example.com/rag/1' }],
            });
        });

        it('should look up lesson links', async () => {
            expect(await store.getLessonLink('Building Tool-Using Agents', 1)).toBe('https://example.com/agents/1');
            expect(await store.getLessonLink('Building Tool-Using Agents', 2)).toBeNull();
            expect(await store.getLessonLink('Unknown', 1)).toBeNull();
        });

        it('should count and list courses', async () => {
            expect(await store.getCourseCount()).toBe(2);
            expect(await store.getCourseTitles()).toEqual(['Building Tool-Using Agents', 'Retrieval Basics']);
        });
    });

    describe('loading', () => {
        it('should load the bundled catalog', async () => {
            const bundled = await LocalCourseStore.fromFile(DEFAULTS.catalogPath);

            expect(await bundled.getCourseCount()).toBe(3);
        });

        it('should wrap a missing file in a CatalogError', async () => {
            const missing = path.join(path.dirname(DEFAULTS.catalogPath), 'missing.json');

            await expect(LocalCourseStore.fromFile(missing)).rejects.toThrow(CatalogError);
        });

        it('should reject duplicate titles and chunks for unknown courses', () => {
            const raw = {
                courses: [{ title: 'A' }, { title: 'A' }],
                chunks: [{ courseTitle: 'B', content: 'text' }],
            };

            expect(() => parseCatalog(raw)).toThrow(
                "Invalid course catalog: courses.1.title: Duplicate course title 'A', chunks.0.courseTitle: Unknown course 'B'"
            );
        });
    });
});
