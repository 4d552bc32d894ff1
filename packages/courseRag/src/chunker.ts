// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { CourseChunk, CourseDocument } from "./models.js";
import {
    hardSplit,
    normalizeWhitespace,
    splitIntoSentences,
} from "./textChunker.js";

export type ChunkSettings = {
    chunkSize: number;
    chunkOverlap: number;
};

/**
 * Split text into sentence-bounded chunks of at most chunkSize characters.
 * Each chunk after the first starts with the trailing sentences of the previous chunk
 * that fit in chunkOverlap characters.
 * Sentences longer than chunkSize are hard-split first
 */
export function chunkText(text: string, settings: ChunkSettings): string[] {
    const { chunkSize, chunkOverlap } = settings;
    const sentences = splitIntoSentences(normalizeWhitespace(text)).flatMap(
        (s) => (s.length > chunkSize ? hardSplit(s, chunkSize) : [s]),
    );

    const chunks: string[] = [];
    let i = 0;
    while (i < sentences.length) {
        const chunk: string[] = [];
        let chunkLength = 0;
        for (let j = i; j < sentences.length; ++j) {
            const sentence = sentences[j];
            const separatorLength = chunk.length > 0 ? 1 : 0;
            if (
                chunk.length > 0 &&
                chunkLength + separatorLength + sentence.length > chunkSize
            ) {
                break;
            }
            chunk.push(sentence);
            chunkLength += separatorLength + sentence.length;
        }
        chunks.push(chunk.join(" "));
        if (i + chunk.length >= sentences.length) {
            break;
        }

        let overlapLength = 0;
        let overlapCount = 0;
        for (let k = chunk.length - 1; k >= 0; --k) {
            const sentenceLength =
                chunk[k].length + (k < chunk.length - 1 ? 1 : 0);
            if (overlapLength + sentenceLength > chunkOverlap) {
                break;
            }
            overlapLength += sentenceLength;
            overlapCount++;
        }
        // Always advance by at least one sentence
        i = Math.max(i + chunk.length - overlapCount, i + 1);
    }
    return chunks;
}

/**
 * Chunk every lesson of a course document, prefixing each chunk with its course and lesson.
 * Text outside any lesson becomes course-level chunks. Chunk indexes run across the whole course
 */
export function chunkCourse(
    document: CourseDocument,
    settings: ChunkSettings,
): CourseChunk[] {
    const courseTitle = document.course.title;
    const chunks: CourseChunk[] = [];
    if (document.courseText) {
        for (const text of chunkText(document.courseText, settings)) {
            chunks.push({
                content: `Course ${courseTitle} content: ${text}`,
                courseTitle,
                chunkIndex: chunks.length,
            });
        }
    }
    for (const lesson of document.lessonTexts) {
        for (const text of chunkText(lesson.text, settings)) {
            chunks.push({
                content: `Course ${courseTitle} Lesson ${lesson.lessonNumber} content: ${text}`,
                courseTitle,
                lessonNumber: lesson.lessonNumber,
                chunkIndex: chunks.length,
            });
        }
    }
    return chunks;
}
