/**
 * Course store contract - the retrieval collaborators the tools delegate to.
 */

export interface ChunkMetadata {
    courseTitle: string;
    lessonNumber: number | null;
    chunkIndex: number;
}

export interface SearchResults {
    documents: string[];
    metadata: ChunkMetadata[];
    /** Set when the store could not run the search; tools return it verbatim. */
    error?: string;
}

export interface SearchParams {
    query: string;
    courseName?: string;
    lessonNumber?: number;
}

export interface LessonMetadata {
    lessonNumber: number;
    lessonTitle: string;
    lessonLink: string | null;
}

export interface CourseMetadata {
    title: string;
    courseLink: string | null;
    instructor: string | null;
    lessons: LessonMetadata[];
}

export interface CourseStore {
    /** Course-name matching is fuzzy on the store's side; filters pass through raw. */
    search(params: SearchParams): Promise<SearchResults>;
    resolveCourseName(partialTitle: string): Promise<string | null>;
    getAllCoursesMetadata(): Promise<CourseMetadata[]>;
    getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null>;
    getCourseCount(): Promise<number>;
    getCourseTitles(): Promise<string[]>;
}

export function isEmptyResults(results: SearchResults): boolean {
    return results.documents.length === 0;
}
