// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { getData } from "typechat";
import { chunkCourse } from "../src/chunker.js";
import { DefaultRagConfig } from "../src/config.js";
import { parseCourseDocument } from "../src/documentParser.js";
import {
    createCourseToolRegistry,
    OutlineToolName,
    parseSearchArgs,
    SearchToolName,
    SourceList,
} from "../src/tools.js";
import {
    ComputerUseTitle,
    createTestIndex,
    createTestIndexWith,
    LinearAlgebraTitle,
    testCourseFiles,
} from "./common.js";

describe("tools", () => {
    test("definitions", () => {
        const registry = createCourseToolRegistry(createTestIndex());
        const definitions = registry.getDefinitions();
        expect(definitions.map((d) => d.name)).toEqual([
            SearchToolName,
            OutlineToolName,
        ]);
        expect(definitions[0].parameters.required).toEqual(["query"]);
        expect(registry.has(SearchToolName)).toBe(true);
        expect(registry.has("missing")).toBe(false);
    });
    test("searchLesson", async () => {
        const registry = createCourseToolRegistry(
            await createTestIndexWith(testCourseFiles),
        );
        const result = await registry.execute(SearchToolName, {
            query: "matrix multiplication",
            course_name: "linear algebra",
            lesson_number: "1",
        });
        expect(result.text).toBe(
            "[Linear Algebra for Machine Learning - Lesson 1]\n" +
                `Course ${LinearAlgebraTitle} Lesson 1 content: Matrix multiplication combines rows and columns. Each entry of the product is a dot product of a row and a column.`,
        );
        expect(result.sources).toEqual([
            {
                label: "Linear Algebra for Machine Learning - Lesson 1",
                courseTitle: LinearAlgebraTitle,
                lessonNumber: 1,
                link: "https://example.com/linear-algebra/lesson-1",
            },
        ]);
    });
    test("searchWithoutFilters", async () => {
        const registry = createCourseToolRegistry(
            await createTestIndexWith([testCourseFiles[0]]),
        );
        const result = await registry.execute(SearchToolName, {
            query: "What is lesson 1 about?",
        });
        expect(
            result.text.startsWith(
                "[Linear Algebra for Machine Learning - Lesson 1]\n",
            ),
        ).toBe(true);
        expect(result.text).toContain(
            "[Linear Algebra for Machine Learning - Lesson 0]\n",
        );
        expect(result.sources.map((s) => s.lessonNumber)).toEqual([1, 0]);
    });
    test("searchLessonWithoutLink", async () => {
        const registry = createCourseToolRegistry(
            await createTestIndexWith(testCourseFiles),
        );
        const result = await registry.execute(SearchToolName, {
            query: "prompt caching",
            course_name: "Anthropic",
            lesson_number: 1,
        });
        expect(result.sources).toEqual([
            {
                label: `${ComputerUseTitle} - Lesson 1`,
                courseTitle: ComputerUseTitle,
                lessonNumber: 1,
                link: undefined,
            },
        ]);
    });
    test("searchCourseLevelContent", async () => {
        const document = getData(
            parseCourseDocument(
                "Course Title: Flat Course\nCourse Link: https://example.com/flat\n\nAll of the text.",
            ),
        );
        const index = createTestIndex();
        await index.addCourse(
            document.course,
            chunkCourse(document, DefaultRagConfig),
        );
        const result = await createCourseToolRegistry(index).execute(
            SearchToolName,
            { query: "text" },
        );
        expect(result.text).toBe(
            "[Flat Course]\nCourse Flat Course content: All of the text.",
        );
        expect(result.sources).toEqual([
            {
                label: "Flat Course",
                courseTitle: "Flat Course",
                lessonNumber: undefined,
                link: "https://example.com/flat",
            },
        ]);
    });
    test("searchEmpty", async () => {
        const registry = createCourseToolRegistry(
            await createTestIndexWith(testCourseFiles),
        );
        const result = await registry.execute(SearchToolName, {
            query: "vectors",
            course_name: "Anthropic",
            lesson_number: 5,
        });
        expect(result).toEqual({
            text: "No relevant content found in course 'Anthropic' in lesson 5.",
            sources: [],
        });
    });
    test("searchEmptyIndex", async () => {
        const registry = createCourseToolRegistry(createTestIndex());
        expect(
            (await registry.execute(SearchToolName, { query: "vectors" }))
                .text,
        ).toBe("No relevant content found.");
        expect(
            (
                await registry.execute(SearchToolName, {
                    query: "vectors",
                    course_name: "Anthropic",
                })
            ).text,
        ).toBe("No course found matching 'Anthropic'");
    });
    test("invalidArguments", async () => {
        const registry = createCourseToolRegistry(createTestIndex());
        expect(
            await registry.execute(SearchToolName, { course_name: "x" }),
        ).toEqual({
            text: "Invalid arguments for tool 'search_course_content': query must be a non-empty string",
            sources: [],
        });
        expect(
            (
                await registry.execute(SearchToolName, {
                    query: "x",
                    lesson_number: "one",
                })
            ).text,
        ).toBe(
            "Invalid arguments for tool 'search_course_content': lesson_number must be an integer",
        );
        expect((await registry.execute(OutlineToolName, {})).text).toBe(
            "Invalid arguments for tool 'get_course_outline': course_name must be a non-empty string",
        );
    });
    test("unknownTool", async () => {
        const registry = createCourseToolRegistry(createTestIndex());
        expect(await registry.execute("missing", {})).toEqual({
            text: "Tool 'missing' not found",
            sources: [],
        });
    });
    test("outline", async () => {
        const registry = createCourseToolRegistry(
            await createTestIndexWith(testCourseFiles),
        );
        const result = await registry.execute(OutlineToolName, {
            course_name: "Anthropic",
        });
        expect(result.text).toBe(
            [
                `Course Title: ${ComputerUseTitle}`,
                "Course Link: https://example.com/computer-use",
                "Course Instructor: Sam Lee",
                "Lessons (3):",
                "Lesson 0: Overview",
                "Lesson 1: Prompting",
                "Lesson 2: Tool Calling",
            ].join("\n"),
        );
        expect(result.sources).toEqual([
            {
                label: ComputerUseTitle,
                courseTitle: ComputerUseTitle,
                link: "https://example.com/computer-use",
            },
        ]);
        const notFound = await createCourseToolRegistry(
            createTestIndex(),
        ).execute(OutlineToolName, { course_name: "Anthropic" });
        expect(notFound.text).toBe("No course found matching 'Anthropic'");
    });
    test("parseSearchArgs", () => {
        expect(parseSearchArgs({ query: "q", course_name: "" })).toEqual({
            success: true,
            data: { query: "q", courseName: undefined, lessonNumber: undefined },
        });
        expect(parseSearchArgs({ query: "q", lesson_number: 2.5 }).success).toBe(
            false,
        );
        expect(parseSearchArgs({ query: "q", course_name: 3 }).success).toBe(
            false,
        );
    });
    test("sourceList", () => {
        const sources = new SourceList();
        sources.add({ label: "A", courseTitle: "A" });
        sources.addAll([
            { label: "B", courseTitle: "B" },
            { label: "A", courseTitle: "A", lessonNumber: 1 },
        ]);
        expect(sources.values.map((s) => s.label)).toEqual(["A", "B"]);
    });
});
