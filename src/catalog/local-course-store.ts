/**
 * Local Course Store - a JSON catalog of courses and pre-chunked passages,
 * searched by lexical term overlap.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { CatalogError } from '../errors.js';
import type { ChunkMetadata, CourseMetadata, CourseStore, SearchParams, SearchResults } from './types.js';

const DEFAULT_MAX_RESULTS = 5;

const STOP_WORDS = new Set([
    'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from', 'how', 'i', 'in',
    'is', 'it', 'of', 'on', 'or', 'the', 'this', 'to', 'what', 'when', 'which', 'who', 'why', 'with', 'you',
]);

const LessonSchema = z.object({
    lessonNumber: z.number().int().nonnegative(),
    title: z.string().min(1),
    lessonLink: z.string().url().nullish(),
});

const CourseSchema = z.object({
    title: z.string().min(1),
    courseLink: z.string().url().nullish(),
    instructor: z.string().nullish(),
    lessons: z.array(LessonSchema).default([]),
});

const ChunkSchema = z.object({
    courseTitle: z.string().min(1),
    lessonNumber: z.number().int().nonnegative().nullish(),
    content: z.string().min(1),
});

export const CourseCatalogSchema = z.object({
    courses: z.array(CourseSchema),
    chunks: z.array(ChunkSchema).default([]),
}).superRefine((catalog, ctx) => {
    const titles = new Set<string>();
    catalog.courses.forEach((course, index) => {
        if (titles.has(course.title)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['courses', index, 'title'], message: `Duplicate course title '${course.title}'` });
        }
        titles.add(course.title);
    });
    catalog.chunks.forEach((chunk, index) => {
        if (!titles.has(chunk.courseTitle)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['chunks', index, 'courseTitle'], message: `Unknown course '${chunk.courseTitle}'` });
        }
    });
});

export type CourseCatalog = z.infer<typeof CourseCatalogSchema>;

interface IndexedChunk {
    content: string;
    metadata: ChunkMetadata;
    terms: Set<string>;
}

export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter((term) => term.length > 0 && !STOP_WORDS.has(term));
}

function overlap(queryTerms: string[], terms: Set<string>): number {
    let score = 0;
    for (const term of new Set(queryTerms)) {
        if (terms.has(term)) score++;
    }
    return score;
}

export function parseCatalog(raw: unknown, source?: string): CourseCatalog {
    const result = CourseCatalogSchema.safeParse(raw);
    if (!result.success) {
        const errorMsg = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new CatalogError(`Invalid course catalog: ${errorMsg}`, source);
    }
    return result.data;
}

export class LocalCourseStore implements CourseStore {
    private courses: CourseMetadata[];
    private chunks: IndexedChunk[];
    private maxResults: number;

    constructor(catalog: CourseCatalog, options: { maxResults?: number } = {}) {
        this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
        this.courses = catalog.courses.map((course) => ({
            title: course.title,
            courseLink: course.courseLink ?? null,
            instructor: course.instructor ?? null,
            lessons: course.lessons.map((lesson) => ({
                lessonNumber: lesson.lessonNumber,
                lessonTitle: lesson.title,
                lessonLink: lesson.lessonLink ?? null,
            })),
        }));
        this.chunks = catalog.chunks.map((chunk, chunkIndex) => ({
            content: chunk.content,
            metadata: {
                courseTitle: chunk.courseTitle,
                lessonNumber: chunk.lessonNumber ?? null,
                chunkIndex,
            },
            terms: new Set(tokenize(chunk.content)),
        }));
    }

    static async fromFile(catalogPath: string, options: { maxResults?: number } = {}): Promise<LocalCourseStore> {
        let text: string;
        try {
            text = await readFile(catalogPath, 'utf8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new CatalogError(`Could not read course catalog at ${catalogPath}: ${reason}`, catalogPath);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new CatalogError(`Course catalog at ${catalogPath} is not valid JSON: ${reason}`, catalogPath);
        }

        return new LocalCourseStore(parseCatalog(raw, catalogPath), options);
    }

    /**
     * With a course or lesson filter every passage in scope is a candidate;
     * without one, a passage must share at least one term with the query.
     */
    async search(params: SearchParams): Promise<SearchResults> {
        let courseTitle: string | undefined;
        if (params.courseName) {
            const resolved = await this.resolveCourseName(params.courseName);
            if (!resolved) {
                return { documents: [], metadata: [], error: `No course found matching '${params.courseName}'` };
            }
            courseTitle = resolved;
        }

        const filtered = courseTitle !== undefined || params.lessonNumber !== undefined;
        const queryTerms = tokenize(params.query);

        const ranked = this.chunks
            .filter((chunk) => courseTitle === undefined || chunk.metadata.courseTitle === courseTitle)
            .filter((chunk) => params.lessonNumber === undefined || chunk.metadata.lessonNumber === params.lessonNumber)
            .map((chunk) => ({ chunk, score: overlap(queryTerms, chunk.terms) }))
            .filter(({ score }) => filtered || score > 0)
            .sort((a, b) => b.score - a.score || a.chunk.metadata.chunkIndex - b.chunk.metadata.chunkIndex)
            .slice(0, this.maxResults);

        return {
            documents: ranked.map(({ chunk }) => chunk.content),
            metadata: ranked.map(({ chunk }) => ({ ...chunk.metadata })),
        };
    }

    /**
     * Exact title, then containment either way, then the best term overlap.
     */
    async resolveCourseName(partialTitle: string): Promise<string | null> {
        const needle = partialTitle.trim().toLowerCase();
        if (!needle) return null;

        const exact = this.courses.find((course) => course.title.toLowerCase() === needle);
        if (exact) return exact.title;

        const containing = this.courses.find((course) => {
            const title = course.title.toLowerCase();
            return title.includes(needle) || needle.includes(title);
        });
        if (containing) return containing.title;

        const needleTerms = tokenize(needle);
        let best: { title: string; score: number } | null = null;
        for (const course of this.courses) {
            const score = overlap(needleTerms, new Set(tokenize(course.title)));
            if (score > 0 && (!best || score > best.score)) {
                best = { title: course.title, score };
            }
        }
        return best?.title ?? null;
    }

    async getAllCoursesMetadata(): Promise<CourseMetadata[]> {
        return this.courses.map((course) => ({
            ...course,
            lessons: course.lessons.map((lesson) => ({ ...lesson })),
        }));
    }

    async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
        const course = this.courses.find((c) => c.title === courseTitle);
        const lesson = course?.lessons.find((l) => l.lessonNumber === lessonNumber);
        return lesson?.lessonLink ?? null;
    }

    async getCourseCount(): Promise<number> {
        return this.courses.length;
    }

    async getCourseTitles(): Promise<string[]> {
        return this.courses.map((course) => course.title);
    }
}
