// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { ToolArguments, ToolDefinition } from "model-client";
import registerDebug from "debug";
import { Result, success, error } from "typechat";
import { CourseIndex, SearchFilter, SearchOutcome } from "./courseIndex.js";
import { Course, getSourceLabel, Source } from "./models.js";

const debugTools = registerDebug("course-rag:tools");

/**
 * What a tool execution returns: text for the model, and the sources behind it
 */
export type ToolResult = {
    text: string;
    sources: Source[];
};

export const SearchToolName = "search_course_content";
export const OutlineToolName = "get_course_outline";

export const searchToolDefinition: ToolDefinition = {
    name: SearchToolName,
    description:
        "Search course materials with smart course name matching and lesson filtering",
    parameters: {
        type: "object",
        properties: {
            query: {
                type: "string",
                description: "What to search for in the course content",
            },
            course_name: {
                type: "string",
                description:
                    "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
            },
            lesson_number: {
                type: "integer",
                description:
                    "Specific lesson number to search within (e.g. 1, 2, 3)",
            },
        },
        required: ["query"],
    },
};

export const outlineToolDefinition: ToolDefinition = {
    name: OutlineToolName,
    description:
        "Get a course outline: its title, link, instructor and the numbered list of lessons",
    parameters: {
        type: "object",
        properties: {
            course_name: {
                type: "string",
                description:
                    "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
            },
        },
        required: ["course_name"],
    },
};

export type SearchToolArgs = {
    query: string;
    courseName?: string | undefined;
    lessonNumber?: number | undefined;
};

export type OutlineToolArgs = {
    courseName: string;
};

/**
 * The closed set of tools the answer generator can offer the model
 */
export type CourseTool =
    | { kind: "searchContent"; definition: ToolDefinition; index: CourseIndex }
    | { kind: "courseOutline"; definition: ToolDefinition; index: CourseIndex };

export function createSearchTool(index: CourseIndex): CourseTool {
    return { kind: "searchContent", definition: searchToolDefinition, index };
}

export function createOutlineTool(index: CourseIndex): CourseTool {
    return { kind: "courseOutline", definition: outlineToolDefinition, index };
}

/**
 * Run a tool. Invalid arguments produce a result the model can read, not an exception
 */
export async function executeTool(
    tool: CourseTool,
    args: ToolArguments,
): Promise<ToolResult> {
    switch (tool.kind) {
        case "searchContent": {
            const parsed = parseSearchArgs(args);
            if (!parsed.success) {
                return invalidArguments(tool, parsed.message);
            }
            return runSearch(tool.index, parsed.data);
        }
        case "courseOutline": {
            const parsed = parseOutlineArgs(args);
            if (!parsed.success) {
                return invalidArguments(tool, parsed.message);
            }
            return runOutline(tool.index, parsed.data);
        }
    }
}

function invalidArguments(tool: CourseTool, message: string): ToolResult {
    debugTools(`${tool.definition.name}: ${message}`);
    return {
        text: `Invalid arguments for tool '${tool.definition.name}': ${message}`,
        sources: [],
    };
}

async function runSearch(
    index: CourseIndex,
    args: SearchToolArgs,
): Promise<ToolResult> {
    const outcome = await index.search(
        args.query,
        args.courseName,
        args.lessonNumber,
    );
    return formatSearchOutcome(index, outcome, args);
}

/**
 * Render a search outcome as labeled passages: "[Course Title - Lesson n]\n{text}"
 */
export function formatSearchOutcome(
    index: CourseIndex,
    outcome: SearchOutcome,
    args: SearchToolArgs,
): ToolResult {
    switch (outcome.type) {
        case "courseNotFound":
            return {
                text: `No course found matching '${outcome.courseName}'`,
                sources: [],
            };
        case "empty":
            return {
                text: `No relevant content found${filterDescription(args, outcome.filter)}.`,
                sources: [],
            };
        case "matches": {
            const blocks: string[] = [];
            const sources = new SourceList();
            for (const match of outcome.matches) {
                const label = getSourceLabel(
                    match.courseTitle,
                    match.lessonNumber,
                );
                blocks.push(`[${label}]\n${match.content}`);
                sources.add({
                    label,
                    courseTitle: match.courseTitle,
                    lessonNumber: match.lessonNumber,
                    link:
                        match.lessonNumber !== undefined
                            ? index.getLessonLink(
                                  match.courseTitle,
                                  match.lessonNumber,
                              )
                            : index.getCourseLink(match.courseTitle),
                });
            }
            return { text: blocks.join("\n\n"), sources: sources.values };
        }
    }
}

function filterDescription(
    args: SearchToolArgs,
    filter: SearchFilter,
): string {
    let description = "";
    if (args.courseName) {
        description += ` in course '${args.courseName}'`;
    }
    if (filter.lessonNumber !== undefined) {
        description += ` in lesson ${filter.lessonNumber}`;
    }
    return description;
}

async function runOutline(
    index: CourseIndex,
    args: OutlineToolArgs,
): Promise<ToolResult> {
    const title = await index.resolveCourseName(args.courseName);
    const course = title ? index.getCourseOutline(title) : undefined;
    if (!course) {
        return {
            text: `No course found matching '${args.courseName}'`,
            sources: [],
        };
    }
    return {
        text: formatCourseOutline(course),
        sources: [
            {
                label: course.title,
                courseTitle: course.title,
                link: course.link,
            },
        ],
    };
}

export function formatCourseOutline(course: Course): string {
    const lines: string[] = [`Course Title: ${course.title}`];
    if (course.link) {
        lines.push(`Course Link: ${course.link}`);
    }
    if (course.instructor) {
        lines.push(`Course Instructor: ${course.instructor}`);
    }
    lines.push(`Lessons (${course.lessons.length}):`);
    for (const lesson of course.lessons) {
        lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}`);
    }
    return lines.join("\n");
}

export function parseSearchArgs(args: ToolArguments): Result<SearchToolArgs> {
    const query = args.query;
    if (typeof query !== "string" || query.length === 0) {
        return error("query must be a non-empty string");
    }
    const courseName = optionalString(args.course_name);
    if (!courseName.success) {
        return error(`course_name ${courseName.message}`);
    }
    const lessonNumber = optionalInteger(args.lesson_number);
    if (!lessonNumber.success) {
        return error(`lesson_number ${lessonNumber.message}`);
    }
    return success({
        query,
        courseName: courseName.data,
        lessonNumber: lessonNumber.data,
    });
}

export function parseOutlineArgs(args: ToolArguments): Result<OutlineToolArgs> {
    const courseName = args.course_name;
    if (typeof courseName !== "string" || courseName.length === 0) {
        return error("course_name must be a non-empty string");
    }
    return success({ courseName });
}

function optionalString(value: unknown): Result<string | undefined> {
    if (value === undefined || value === null || value === "") {
        return success(undefined);
    }
    return typeof value === "string"
        ? success(value)
        : error("must be a string");
}

// Models sometimes send integers as strings
function optionalInteger(value: unknown): Result<number | undefined> {
    if (value === undefined || value === null || value === "") {
        return success(undefined);
    }
    const num =
        typeof value === "string" && /^-?\d+$/.test(value.trim())
            ? parseInt(value)
            : value;
    return typeof num === "number" && Number.isInteger(num)
        ? success(num)
        : error("must be an integer");
}

/**
 * Sources in first-seen order, without duplicates
 */
export class SourceList {
    private labels = new Set<string>();
    public values: Source[] = [];

    public add(source: Source): void {
        if (!this.labels.has(source.label)) {
            this.labels.add(source.label);
            this.values.push(source);
        }
    }

    public addAll(sources: Source[]): void {
        for (const source of sources) {
            this.add(source);
        }
    }
}

/**
 * Tools by name
 */
export class ToolRegistry {
    private tools = new Map<string, CourseTool>();

    public register(tool: CourseTool): void {
        this.tools.set(tool.definition.name, tool);
    }

    public has(name: string): boolean {
        return this.tools.has(name);
    }

    public getDefinitions(): ToolDefinition[] {
        return [...this.tools.values()].map((t) => t.definition);
    }

    public async execute(
        name: string,
        args: ToolArguments,
    ): Promise<ToolResult> {
        const tool = this.tools.get(name);
        if (tool === undefined) {
            return { text: `Tool '${name}' not found`, sources: [] };
        }
        debugTools(`${name}(${JSON.stringify(args)})`);
        return executeTool(tool, args);
    }
}

/**
 * Registry holding the search and outline tools over the given index
 */
export function createCourseToolRegistry(index: CourseIndex): ToolRegistry {
    const registry = new ToolRegistry();
    registry.register(createSearchTool(index));
    registry.register(createOutlineTool(index));
    return registry;
}
