// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { TextEmbeddingModel } from "model-client";
import { queue } from "async";
import registerDebug from "debug";
import {
    CollectionItem,
    CollectionSettings,
    createSemanticCollection,
    loadCollectionRecords,
    saveCollection,
} from "vector-store";
import { Course, CourseChunk, getChunkId, Lesson } from "./models.js";

const debugIndex = registerDebug("course-rag:index");

export const CatalogCollectionName = "course_catalog";
export const ContentCollectionName = "course_content";

export type CatalogMetadata = {
    title: string;
    instructor?: string | undefined;
    course_link?: string | undefined;
    // Lessons serialized as JSON: collection metadata is flat
    lessons_json: string;
    lesson_count: number;
};

export type ContentMetadata = {
    course_title: string;
    lesson_number?: number | undefined;
    chunk_index: number;
};

/**
 * Restricts a content search. Both fields must match when both are given
 */
export type SearchFilter = {
    courseTitle?: string | undefined;
    lessonNumber?: number | undefined;
};

export type SearchMatch = {
    content: string;
    courseTitle: string;
    lessonNumber?: number | undefined;
};

/**
 * Outcome of a search. "courseNotFound" and "empty" are expected outcomes, not errors
 */
export type SearchOutcome =
    | { type: "matches"; matches: SearchMatch[]; filter: SearchFilter }
    | { type: "empty"; filter: SearchFilter }
    | { type: "courseNotFound"; courseName: string };

export type CourseIndexSettings = {
    // Default top-K for search
    maxResults: number;
    // Folder to load collections from and save them to
    indexPath?: string | undefined;
    collectionSettings?: CollectionSettings | undefined;
};

/**
 * Two collections: a catalog with one entry per course, used to resolve informal
 * course names, and the content chunks of every course
 */
export interface CourseIndex {
    readonly settings: CourseIndexSettings;
    /**
     * Load saved collections from settings.indexPath, if any
     */
    load(): Promise<void>;
    /**
     * Exact title of the course nearest to the given name; undefined if the catalog is empty
     */
    resolveCourseName(courseName: string): Promise<string | undefined>;
    search(
        query: string,
        courseName?: string,
        lessonNumber?: number,
        limit?: number,
    ): Promise<SearchOutcome>;
    /**
     * Add a course's catalog entry and its chunks together.
     * Courses already in the catalog are skipped.
     * Throws if a chunk is not of this course or its id belongs to another course's chunk
     * @returns true if the course was added
     */
    addCourse(course: Course, chunks: CourseChunk[]): Promise<boolean>;
    /**
     * Add a catalog entry only
     * @returns false if the course is already in the catalog
     */
    addCourseMetadata(course: Course): Promise<boolean>;
    /**
     * Add or replace chunks of courses already in the catalog.
     * Throws if a chunk's course is not in the catalog or its id belongs to another course's chunk
     */
    addCourseContent(chunks: CourseChunk[]): Promise<void>;
    getExistingCourseTitles(): string[];
    getCourseCount(): number;
    getChunkCount(): number;
    getAllCoursesMetadata(): Course[];
    getCourseOutline(courseTitle: string): Course | undefined;
    getCourseLink(courseTitle: string): string | undefined;
    getLessonLink(courseTitle: string, lessonNumber: number): string | undefined;
    clearAllData(): Promise<void>;
}

export function createCourseIndex(
    embeddingModel: TextEmbeddingModel,
    settings: CourseIndexSettings,
): CourseIndex {
    const catalog = createSemanticCollection<CatalogMetadata>(
        CatalogCollectionName,
        embeddingModel,
        settings.collectionSettings,
    );
    const content = createSemanticCollection<ContentMetadata>(
        ContentCollectionName,
        embeddingModel,
        settings.collectionSettings,
    );
    // Saves run one at a time, in order
    const saveQueue = queue<string>((indexPath, callback) => {
        saveCollections(indexPath).then(() => callback(), callback);
    }, 1);

    return {
        settings,
        load,
        resolveCourseName,
        search,
        addCourse,
        addCourseMetadata,
        addCourseContent,
        getExistingCourseTitles: () => catalog.getAll().map((r) => r.id),
        getCourseCount: () => catalog.size,
        getChunkCount: () => content.size,
        getAllCoursesMetadata,
        getCourseOutline,
        getCourseLink: (courseTitle) =>
            catalog.get(courseTitle)?.metadata.course_link,
        getLessonLink,
        clearAllData,
    };

    async function load(): Promise<void> {
        if (!settings.indexPath) {
            return;
        }
        const catalogRecords = await loadCollectionRecords(
            settings.indexPath,
            CatalogCollectionName,
            isCatalogMetadata,
        );
        const contentRecords = await loadCollectionRecords(
            settings.indexPath,
            ContentCollectionName,
            isContentMetadata,
        );
        catalog.clear();
        content.clear();
        if (catalogRecords) {
            catalog.put(catalogRecords);
        }
        if (contentRecords) {
            // Chunks of courses missing from the catalog cannot be resolved
            content.put(
                contentRecords.filter((r) =>
                    catalog.has(r.metadata.course_title),
                ),
            );
        }
        debugIndex(
            `Loaded ${catalog.size} courses, ${content.size} chunks from ${settings.indexPath}`,
        );
    }

    async function resolveCourseName(
        courseName: string,
    ): Promise<string | undefined> {
        const match = await catalog.nearest(courseName);
        if (match) {
            debugIndex(
                `Resolved '${courseName}' to '${match.item.id}' (${match.score})`,
            );
        }
        return match?.item.id;
    }

    async function search(
        query: string,
        courseName?: string,
        lessonNumber?: number,
        limit?: number,
    ): Promise<SearchOutcome> {
        let courseTitle: string | undefined;
        if (courseName) {
            courseTitle = await resolveCourseName(courseName);
            if (courseTitle === undefined) {
                return { type: "courseNotFound", courseName };
            }
        }
        const filter: SearchFilter = { courseTitle, lessonNumber };
        const results = await content.query(
            query,
            limit ?? settings.maxResults,
            {
                course_title: courseTitle,
                lesson_number: lessonNumber,
            },
        );
        if (results.length === 0) {
            return { type: "empty", filter };
        }
        return {
            type: "matches",
            matches: results.map((r) => ({
                content: r.item.document,
                courseTitle: r.item.metadata.course_title,
                lessonNumber: r.item.metadata.lesson_number,
            })),
            filter,
        };
    }

    async function addCourse(
        course: Course,
        chunks: CourseChunk[],
    ): Promise<boolean> {
        if (catalog.has(course.title)) {
            debugIndex(`Course already exists: ${course.title}`);
            return false;
        }
        const foreign = chunks.find((c) => c.courseTitle !== course.title);
        if (foreign) {
            throw new Error(
                `Chunk of course '${foreign.courseTitle}' added with course '${course.title}'`,
            );
        }
        checkChunkIds(chunks);
        const catalogRecords = await catalog.embed([toCatalogItem(course)]);
        const contentRecords = await content.embed(chunks.map(toContentItem));
        // Another ingest of the same course may have finished while embedding
        if (catalog.has(course.title)) {
            return false;
        }
        checkChunkIds(chunks);
        // No await between these: searches see both or neither
        catalog.put(catalogRecords);
        content.put(contentRecords);
        debugIndex(`Added course ${course.title}: ${chunks.length} chunks`);
        await save();
        return true;
    }

    async function addCourseMetadata(course: Course): Promise<boolean> {
        if (catalog.has(course.title)) {
            debugIndex(`Course already exists: ${course.title}`);
            return false;
        }
        const records = await catalog.embed([toCatalogItem(course)]);
        if (catalog.has(course.title)) {
            return false;
        }
        catalog.put(records);
        await save();
        return true;
    }

    async function addCourseContent(chunks: CourseChunk[]): Promise<void> {
        checkCatalogEntries(chunks);
        checkChunkIds(chunks);
        const records = await content.embed(chunks.map(toContentItem));
        // The catalog may have been cleared while embedding
        checkCatalogEntries(chunks);
        checkChunkIds(chunks);
        content.put(records);
        await save();
    }

    function checkCatalogEntries(chunks: CourseChunk[]): void {
        for (const chunk of chunks) {
            if (!catalog.has(chunk.courseTitle)) {
                throw new Error(
                    `Course '${chunk.courseTitle}' is not in the catalog`,
                );
            }
        }
    }

    // Distinct titles such as "Intro AI" and "Intro_AI" can map to the same chunk id
    function checkChunkIds(chunks: CourseChunk[]): void {
        for (const chunk of chunks) {
            const id = getChunkId(chunk);
            const owner = content.get(id)?.metadata.course_title;
            if (owner !== undefined && owner !== chunk.courseTitle) {
                throw new Error(
                    `Chunk id '${id}' of course '${chunk.courseTitle}' belongs to course '${owner}'`,
                );
            }
        }
    }

    function getAllCoursesMetadata(): Course[] {
        return catalog.getAll().map((r) => toCourse(r.metadata));
    }

    function getCourseOutline(courseTitle: string): Course | undefined {
        const record = catalog.get(courseTitle);
        return record ? toCourse(record.metadata) : undefined;
    }

    function getLessonLink(
        courseTitle: string,
        lessonNumber: number,
    ): string | undefined {
        return getCourseOutline(courseTitle)?.lessons.find(
            (l) => l.lessonNumber === lessonNumber,
        )?.link;
    }

    async function clearAllData(): Promise<void> {
        catalog.clear();
        content.clear();
        await save();
    }

    function save(): Promise<void> {
        const indexPath = settings.indexPath;
        if (!indexPath) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve, reject) => {
            saveQueue.push(indexPath, (err) => (err ? reject(err) : resolve()));
        });
    }

    async function saveCollections(indexPath: string): Promise<void> {
        await saveCollection(catalog, indexPath);
        await saveCollection(content, indexPath);
    }
}

function toCatalogItem(course: Course): CollectionItem<CatalogMetadata> {
    const metadata: CatalogMetadata = {
        title: course.title,
        instructor: course.instructor,
        course_link: course.link,
        lessons_json: JSON.stringify(course.lessons),
        lesson_count: course.lessons.length,
    };
    return { id: course.title, document: course.title, metadata };
}

function toContentItem(chunk: CourseChunk): CollectionItem<ContentMetadata> {
    const metadata: ContentMetadata = {
        course_title: chunk.courseTitle,
        lesson_number: chunk.lessonNumber,
        chunk_index: chunk.chunkIndex,
    };
    return { id: getChunkId(chunk), document: chunk.content, metadata };
}

function toCourse(metadata: CatalogMetadata): Course {
    return {
        title: metadata.title,
        link: metadata.course_link,
        instructor: metadata.instructor,
        lessons: parseLessons(metadata.lessons_json),
    };
}

function parseLessons(json: string): Lesson[] {
    const value: unknown = JSON.parse(json);
    if (!Array.isArray(value)) {
        throw new Error(`Invalid lessons: ${json}`);
    }
    return value.map((l) => {
        if (!isLesson(l)) {
            throw new Error(`Invalid lesson: ${JSON.stringify(l)}`);
        }
        return l;
    });
}

function isLesson(value: unknown): value is Lesson {
    return (
        typeof value === "object" &&
        value !== null &&
        "lessonNumber" in value &&
        typeof value.lessonNumber === "number" &&
        "title" in value &&
        typeof value.title === "string" &&
        (!("link" in value) ||
            value.link === undefined ||
            typeof value.link === "string")
    );
}

function isOptionalString(value: unknown): boolean {
    return value === undefined || typeof value === "string";
}

function isCatalogMetadata(value: unknown): value is CatalogMetadata {
    return (
        typeof value === "object" &&
        value !== null &&
        "title" in value &&
        typeof value.title === "string" &&
        "lessons_json" in value &&
        typeof value.lessons_json === "string" &&
        "lesson_count" in value &&
        typeof value.lesson_count === "number" &&
        isOptionalString(
            "instructor" in value ? value.instructor : undefined,
        ) &&
        isOptionalString(
            "course_link" in value ? value.course_link : undefined,
        )
    );
}

function isContentMetadata(value: unknown): value is ContentMetadata {
    return (
        typeof value === "object" &&
        value !== null &&
        "course_title" in value &&
        typeof value.course_title === "string" &&
        "chunk_index" in value &&
        typeof value.chunk_index === "number" &&
        (!("lesson_number" in value) ||
            value.lesson_number === undefined ||
            typeof value.lesson_number === "number")
    );
}
