// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Result, success, error } from "typechat";
import { splitIntoLines } from "./textChunker.js";
import { CourseDocument, Lesson, LessonText } from "./models.js";

const courseTitlePattern = /^Course Title:\s*(.*)$/i;
const courseLinkPattern = /^Course Link:\s*(.*)$/i;
const courseInstructorPattern = /^Course Instructor:\s*(.*)$/i;
const lessonPattern = /^Lesson\s+(\d+):\s*(.*)$/i;
const lessonLinkPattern = /^Lesson Link:\s*(.*)$/i;

type LessonBuilder = {
    lesson: Lesson;
    lines: string[];
};

/**
 * Parse a plain-text course document:
 *
 *  Course Title: <title>
 *  Course Link: <url>
 *  Course Instructor: <name>
 *
 *  Lesson 0: <lesson title>
 *  Lesson Link: <url>
 *  <lesson text...>
 *
 * The title is required; everything else is optional.
 * Text before the first lesson that is not a header field is course-level text,
 * kept only if the document has no lessons
 */
export function parseCourseDocument(text: string): Result<CourseDocument> {
    const lines = splitIntoLines(text);
    let title: string | undefined;
    let link: string | undefined;
    let instructor: string | undefined;
    const courseLines: string[] = [];
    const lessons: LessonBuilder[] = [];
    let current: LessonBuilder | undefined;
    let expectLessonLink = false;

    for (const rawLine of lines) {
        const line = rawLine.trim();
        const lessonMatch = lessonPattern.exec(line);
        if (lessonMatch) {
            const lessonNumber = parseInt(lessonMatch[1]);
            if (lessons.some((l) => l.lesson.lessonNumber === lessonNumber)) {
                return error(`Duplicate lesson number ${lessonNumber}`);
            }
            current = {
                lesson: { lessonNumber, title: lessonMatch[2].trim() },
                lines: [],
            };
            lessons.push(current);
            expectLessonLink = true;
            continue;
        }
        if (current) {
            if (expectLessonLink && line.length > 0) {
                expectLessonLink = false;
                const linkMatch = lessonLinkPattern.exec(line);
                if (linkMatch) {
                    current.lesson.link = linkMatch[1].trim() || undefined;
                    continue;
                }
            }
            current.lines.push(rawLine);
            continue;
        }
        // Course header
        const header = parseHeaderLine(line);
        if (header?.field === "title" && title === undefined) {
            title = header.value;
        } else if (header?.field === "link" && link === undefined) {
            link = header.value || undefined;
        } else if (
            header?.field === "instructor" &&
            instructor === undefined
        ) {
            instructor = header.value || undefined;
        } else {
            courseLines.push(rawLine);
        }
    }

    if (!title) {
        return error("Missing 'Course Title:' header");
    }
    const lessonTexts: LessonText[] = [];
    for (const l of lessons) {
        const lessonText = l.lines.join("\n").trim();
        if (lessonText) {
            lessonTexts.push({
                lessonNumber: l.lesson.lessonNumber,
                text: lessonText,
            });
        }
    }
    const courseText = courseLines.join("\n").trim();
    return success({
        course: {
            title,
            link,
            instructor,
            lessons: lessons.map((l) => l.lesson),
        },
        lessonTexts,
        courseText: lessons.length === 0 && courseText ? courseText : undefined,
    });
}

type HeaderLine = {
    field: "title" | "link" | "instructor";
    value: string;
};

function parseHeaderLine(line: string): HeaderLine | undefined {
    let match = courseTitlePattern.exec(line);
    if (match) {
        return { field: "title", value: match[1].trim() };
    }
    match = courseLinkPattern.exec(line);
    if (match) {
        return { field: "link", value: match[1].trim() };
    }
    match = courseInstructorPattern.exec(line);
    if (match) {
        return { field: "instructor", value: match[1].trim() };
    }
    return undefined;
}
