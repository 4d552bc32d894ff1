// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type Lesson = {
    lessonNumber: number;
    title: string;
    link?: string | undefined;
};

/**
 * A course is identified by its title
 */
export type Course = {
    title: string;
    link?: string | undefined;
    instructor?: string | undefined;
    lessons: Lesson[];
};

export type LessonText = {
    lessonNumber: number;
    text: string;
};

/**
 * A parsed course document: course metadata plus the raw text of each lesson.
 * courseText holds text that belongs to no lesson
 */
export type CourseDocument = {
    course: Course;
    lessonTexts: LessonText[];
    courseText?: string | undefined;
};

/**
 * A context-prefixed segment of course text; the unit of retrieval
 */
export type CourseChunk = {
    content: string;
    courseTitle: string;
    // Undefined for course-level chunks
    lessonNumber?: number | undefined;
    // Sequence number within the course
    chunkIndex: number;
};

/**
 * Where an answer's supporting text came from
 */
export type Source = {
    label: string;
    courseTitle: string;
    lessonNumber?: number | undefined;
    link?: string | undefined;
};

export function getChunkId(chunk: CourseChunk): string {
    return `${chunk.courseTitle.replace(/ /g, "_")}_${chunk.chunkIndex}`;
}

export function getSourceLabel(
    courseTitle: string,
    lessonNumber?: number | undefined,
): string {
    return lessonNumber !== undefined
        ? `${courseTitle} - Lesson ${lessonNumber}`
        : courseTitle;
}
